import { DbClient, toBool } from "@community/db";
import { createNotifications, NewNotification } from "./notifications.js";
import { ForumThreadRow, UserRow } from "./rows.js";

const PREVIEW_LENGTH = 200;

export const contentPreview = (content: string) => {
  const text = content.replace(/<[^>]*>/g, " ").replace(/\s+/g, " ").trim();
  return text.length > PREVIEW_LENGTH ? `${text.slice(0, PREVIEW_LENGTH - 3)}...` : text;
};

const unique = (values: string[]) => [...new Set(values.map((value) => value.toLowerCase()))];

export const extractMentions = (content: string) =>
  unique([...content.matchAll(/(?:^|[^\p{L}\p{N}_])@([\p{L}\p{N}_.-]{2,20})/gu)].map((match) => (match[1] ?? "").replace(/[.-]+$/, "")))
    .filter((name) => name.length >= 2);

export const extractQuotes = (content: string) =>
  unique([...content.matchAll(/\[quote=([^\]\n]{2,20})\]/gi)].map((match) => (match[1] ?? "").trim())).filter(
    Boolean
  );

type Recipient = Pick<
  UserRow,
  "id" | "display_name" | "is_active" | "notify_forum_reply" | "notify_forum_mention" | "notify_forum_quote"
>;

/** One notification per recipient; a mention outranks a quote, which outranks a plain reply. */
export const planForumNotifications = (input: {
  author: Pick<UserRow, "id" | "display_name">;
  thread: Pick<ForumThreadRow, "id" | "title">;
  postId: string;
  content: string;
  threadCreator: Recipient | null;
  mentioned: Recipient[];
  quoted: Recipient[];
}): NewNotification[] => {
  const data = {
    threadId: input.thread.id,
    postId: input.postId,
    threadTitle: input.thread.title,
    contentPreview: contentPreview(input.content),
    actorId: input.author.id,
    actorName: input.author.display_name
  };
  const planned = new Map<string, NewNotification>();
  const eligible = (user: Recipient) =>
    user.id !== input.author.id && toBool(user.is_active) && !planned.has(user.id);

  for (const user of input.mentioned) {
    if (!eligible(user) || !toBool(user.notify_forum_mention)) continue;
    planned.set(user.id, {
      userId: user.id,
      type: "forum_mention",
      title: "You were mentioned",
      message: `${input.author.display_name} mentioned you in "${input.thread.title}"`,
      data
    });
  }
  for (const user of input.quoted) {
    if (!eligible(user) || !toBool(user.notify_forum_quote)) continue;
    planned.set(user.id, {
      userId: user.id,
      type: "forum_quote",
      title: "You were quoted",
      message: `${input.author.display_name} quoted you in "${input.thread.title}"`,
      data
    });
  }
  const creator = input.threadCreator;
  if (creator && eligible(creator) && toBool(creator.notify_forum_reply)) {
    planned.set(creator.id, {
      userId: creator.id,
      type: "forum_reply",
      title: `New reply in "${input.thread.title}"`,
      message: `${input.author.display_name} replied to your thread`,
      data
    });
  }
  return [...planned.values()];
};

const usersByDisplayName = async (db: DbClient, names: string[]) => {
  if (!names.length) {
    return [];
  }
  return db<UserRow>("users").whereRaw(
    `lower(display_name) in (${names.map(() => "?").join(", ")})`,
    names
  );
};

export const notifyForumPost = async (
  db: DbClient,
  input: { author: UserRow; thread: ForumThreadRow; postId: string; content: string }
) => {
  const threadCreator = await db<UserRow>("users").where({ id: input.thread.creator_id }).first();
  const mentioned = await usersByDisplayName(db, extractMentions(input.content));
  const quoted = await usersByDisplayName(db, extractQuotes(input.content));
  const planned = planForumNotifications({
    author: input.author,
    thread: input.thread,
    postId: input.postId,
    content: input.content,
    threadCreator: threadCreator ?? null,
    mentioned,
    quoted
  });
  await createNotifications(db, planned);
  return planned.length;
};
