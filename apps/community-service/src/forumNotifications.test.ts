import { test } from "node:test";
import assert from "node:assert/strict";
import {
  contentPreview,
  extractMentions,
  extractQuotes,
  planForumNotifications
} from "./forumNotifications.js";

const recipient = (id: string, name: string, prefs: Partial<Record<"reply" | "mention" | "quote", boolean>> = {}) => ({
  id,
  display_name: name,
  is_active: true,
  notify_forum_reply: prefs.reply ?? true,
  notify_forum_mention: prefs.mention ?? true,
  notify_forum_quote: prefs.quote ?? true
});

const author = { id: "author", display_name: "Anna" };
const thread = { id: "thread-1", title: "Garden swap" };

test("previews strip markup, collapse whitespace and cut at 200 characters", () => {
  assert.equal(contentPreview("<p>Hello   <b>world</b></p>\n\nbye"), "Hello world bye");
  const long = "x".repeat(250);
  const preview = contentPreview(long);
  assert.equal(preview.length, 200);
  assert.equal(preview, `${"x".repeat(197)}...`);
});

test("mentions and quotes are collected once, lowercased", () => {
  assert.deepEqual(extractMentions("Thanks @Bernd and @bernd, also @Clara."), ["bernd", "clara"]);
  assert.deepEqual(extractMentions("mail me at someone@example.org"), []);
  assert.deepEqual(extractQuotes("[quote=Bernd]old text[/quote] agreed [QUOTE=dora]x[/quote]"), [
    "bernd",
    "dora"
  ]);
});

test("thread creator gets a reply notification with the post context", () => {
  const planned = planForumNotifications({
    author,
    thread,
    postId: "post-1",
    content: "<i>Count me in</i>",
    threadCreator: recipient("creator", "Bernd"),
    mentioned: [],
    quoted: []
  });
  assert.deepEqual(planned, [
    {
      userId: "creator",
      type: "forum_reply",
      title: 'New reply in "Garden swap"',
      message: "Anna replied to your thread",
      data: {
        threadId: "thread-1",
        postId: "post-1",
        threadTitle: "Garden swap",
        contentPreview: "Count me in",
        actorId: "author",
        actorName: "Anna"
      }
    }
  ]);
});

test("mention outranks reply, authors never notify themselves, preferences are honoured", () => {
  const planned = planForumNotifications({
    author,
    thread,
    postId: "post-2",
    content: "@Bernd @Anna @Clara [quote=Dora]hi[/quote]",
    threadCreator: recipient("creator", "Bernd"),
    mentioned: [recipient("creator", "Bernd"), recipient("author", "Anna"), recipient("clara", "Clara", { mention: false })],
    quoted: [recipient("dora", "Dora"), recipient("creator", "Bernd")]
  });
  assert.deepEqual(
    planned.map((entry) => [entry.userId, entry.type]),
    [
      ["creator", "forum_mention"],
      ["dora", "forum_quote"]
    ]
  );
});

test("no reply notification when the creator opted out or wrote the post", () => {
  const optedOut = planForumNotifications({
    author,
    thread,
    postId: "post-3",
    content: "hi",
    threadCreator: recipient("creator", "Bernd", { reply: false }),
    mentioned: [],
    quoted: []
  });
  assert.deepEqual(optedOut, []);

  const ownThread = planForumNotifications({
    author,
    thread,
    postId: "post-4",
    content: "hi",
    threadCreator: recipient("author", "Anna"),
    mentioned: [],
    quoted: []
  });
  assert.deepEqual(ownThread, []);
});
