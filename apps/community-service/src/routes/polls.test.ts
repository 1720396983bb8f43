import { test, after } from "node:test";
import assert from "node:assert/strict";
import { randomUUID } from "node:crypto";
import { bearer, createUser, startApp, stopApp } from "../testSupport.js";

const app = await startApp();
const { getDb } = await import("../db.js");

after(async () => {
  await stopApp(app);
});

const HOUR = 60 * 60 * 1000;

const admin = await createUser({ displayName: "PollAdmin", isAdmin: true });
const owner = await createUser({ displayName: "PollOwner" });
const firstVoter = await createUser({ displayName: "VoterOne" });
const secondVoter = await createUser({ displayName: "VoterTwo" });

const db = await getDb();
const now = new Date().toISOString();
const categoryId = randomUUID();
await db("forum_categories").insert({ id: categoryId, name: "Polls", created_at: now, updated_at: now });

const insertThread = async (locked: boolean) => {
  const id = randomUUID();
  await db("forum_threads").insert({
    id,
    title: "Summer fair",
    category_id: categoryId,
    creator_id: owner.id,
    is_locked: locked,
    created_at: now,
    updated_at: now
  });
  return id;
};

const openThread = await insertThread(false);
const lockedThread = await insertThread(true);

const createPoll = (token: string, payload: Record<string, unknown>) =>
  app.inject({
    method: "POST",
    url: "/v1/polls",
    headers: bearer(token),
    payload: { question: "Where should we meet?", options: ["Library", "Park"], ...payload }
  });

const vote = (token: string, pollId: string, optionId: string) =>
  app.inject({ method: "POST", url: `/v1/polls/${pollId}/vote`, headers: bearer(token), payload: { optionId } });

let pollId = "";
let libraryId = "";
let parkId = "";

test("poll creation checks type, thread and lock state", async () => {
  const adminPoll = await createPoll(owner.token, { pollType: "admin" });
  assert.equal(adminPoll.statusCode, 403);
  assert.equal(adminPoll.json().message, "Only admins can create admin polls");

  const attached = await createPoll(admin.token, { pollType: "admin", threadId: openThread });
  assert.equal(attached.json().message, "Admin polls cannot be attached to a thread");

  const missing = await createPoll(owner.token, { threadId: randomUUID() });
  assert.equal(missing.statusCode, 404);

  const locked = await createPoll(owner.token, { threadId: lockedThread });
  assert.equal(locked.json().message, "Thread is locked");

  const oneOption = await createPoll(owner.token, { threadId: openThread, options: ["Only"] });
  assert.equal(oneOption.statusCode, 400);

  const created = await createPoll(owner.token, { threadId: openThread });
  assert.equal(created.statusCode, 201);
  const poll = created.json();
  pollId = poll.id;
  assert.deepEqual(
    poll.options.map((option: { text: string; orderIndex: number }) => [option.text, option.orderIndex]),
    [
      ["Library", 0],
      ["Park", 1]
    ]
  );
  libraryId = poll.options[0].id;
  parkId = poll.options[1].id;
  assert.equal(poll.totalVotes, 0);
  assert.equal(poll.hasEnded, false);
});

test("suggested durations depend on poll type and audience", async () => {
  const before = Date.now();
  const large = await createPoll(owner.token, { threadId: openThread, autoSuggestDuration: true, expectedParticipants: 60 });
  const largeEnds = Date.parse(large.json().endsAt) - before;
  assert.ok(largeEnds >= 72 * HOUR && largeEnds < 72 * HOUR + 60 * 1000);

  const adminPoll = await createPoll(admin.token, { pollType: "admin", autoSuggestDuration: true });
  const adminEnds = Date.parse(adminPoll.json().endsAt) - before;
  assert.ok(adminEnds >= 168 * HOUR && adminEnds < 168 * HOUR + 60 * 1000);
});

test("a vote can be moved and results report the winner", async () => {
  assert.equal((await vote(firstVoter.token, pollId, libraryId)).statusCode, 201);
  assert.equal((await vote(firstVoter.token, pollId, parkId)).statusCode, 201);
  await vote(secondVoter.token, pollId, parkId);

  const detail = await app.inject({ method: "GET", url: `/v1/polls/${pollId}`, headers: bearer(firstVoter.token) });
  assert.equal(detail.json().totalVotes, 2);
  assert.equal(detail.json().userVote, parkId);

  const results = await app.inject({ method: "GET", url: `/v1/polls/${pollId}/results` });
  const body = results.json();
  assert.deepEqual(body.options, [
    { optionId: libraryId, text: "Library", votes: 0, percentage: 0 },
    { optionId: parkId, text: "Park", votes: 2, percentage: 100 }
  ]);
  assert.equal(body.resultType, "clear_winner");
  assert.equal(body.participationLevel, "low");
  assert.equal(body.isConcluded, false);

  const summary = await app.inject({ method: "GET", url: `/v1/polls/${pollId}/results?detailed=false` });
  assert.deepEqual(summary.json(), {
    pollId,
    totalVotes: 2,
    winners: [{ optionId: parkId, text: "Park", votes: 2 }],
    resultType: "clear_winner"
  });
});

test("votes must target an option of the same open poll", async () => {
  const other = (await createPoll(owner.token, { threadId: openThread, question: "Which day?" })).json();
  const wrongOption = await vote(firstVoter.token, pollId, other.options[0].id);
  assert.equal(wrongOption.json().message, "Invalid option for this poll");

  const endedId = randomUUID();
  const endedOption = randomUUID();
  await db("polls").insert({
    id: endedId,
    question: "Old question",
    poll_type: "thread",
    thread_id: openThread,
    creator_id: owner.id,
    is_active: true,
    ends_at: new Date(Date.now() - HOUR).toISOString(),
    created_at: now
  });
  await db("poll_options").insert({ id: endedOption, poll_id: endedId, text: "Yes", order_index: 0 });
  assert.equal((await vote(firstVoter.token, endedId, endedOption)).json().message, "Poll has ended");

  await db("polls").where({ id: endedId }).update({ is_active: false });
  const inactive = await vote(firstVoter.token, endedId, endedOption);
  assert.equal(inactive.statusCode, 404);
  assert.equal(inactive.json().message, "Poll not found or inactive");
});

test("options are frozen once votes exist", async () => {
  const frozen = await app.inject({
    method: "PUT",
    url: `/v1/polls/${pollId}`,
    headers: bearer(owner.token),
    payload: { options: ["Cafe", "Garden"] }
  });
  assert.equal(frozen.statusCode, 400);
  assert.equal(frozen.json().message, "Cannot modify options after votes have been cast");

  const renamed = await app.inject({
    method: "PUT",
    url: `/v1/polls/${pollId}`,
    headers: bearer(owner.token),
    payload: { question: "Where do we meet?" }
  });
  assert.equal(renamed.json().question, "Where do we meet?");
});

test("removing a vote and stats", async () => {
  const removed = await app.inject({
    method: "DELETE",
    url: `/v1/polls/${pollId}/vote`,
    headers: bearer(secondVoter.token)
  });
  assert.equal(removed.statusCode, 200);
  const again = await app.inject({
    method: "DELETE",
    url: `/v1/polls/${pollId}/vote`,
    headers: bearer(secondVoter.token)
  });
  assert.equal(again.json().message, "No vote to remove");

  const stats = await app.inject({ method: "GET", url: "/v1/polls/my/stats", headers: bearer(firstVoter.token) });
  assert.deepEqual(stats.json(), { pollsCreated: 0, votesCast: 1, engagementLevel: "low" });

  const votes = await app.inject({ method: "GET", url: "/v1/polls/my/votes", headers: bearer(firstVoter.token) });
  assert.deepEqual(
    votes.json().map((poll: { id: string }) => poll.id),
    [pollId]
  );
});

test("only the creator or an admin deletes a poll", async () => {
  const denied = await app.inject({ method: "DELETE", url: `/v1/polls/${pollId}`, headers: bearer(firstVoter.token) });
  assert.equal(denied.statusCode, 403);
  const removed = await app.inject({ method: "DELETE", url: `/v1/polls/${pollId}`, headers: bearer(owner.token) });
  assert.equal(removed.statusCode, 200);
  assert.equal((await db("poll_votes").where({ poll_id: pollId })).length, 0);
});

test("simultaneous votes by one user leave a single vote", async () => {
  const poll = (await createPoll(owner.token, { threadId: openThread, question: "Lunch or dinner?" })).json();
  const [lunch, dinner] = poll.options.map((option: { id: string }) => option.id);
  const responses = await Promise.all([
    vote(secondVoter.token, poll.id, lunch),
    vote(secondVoter.token, poll.id, dinner)
  ]);
  assert.deepEqual(
    responses.map((response) => response.statusCode),
    [201, 201]
  );
  assert.equal(responses[0].json().id, responses[1].json().id);
  const rows = await db("poll_votes").where({ poll_id: poll.id, user_id: secondVoter.id });
  assert.equal(rows.length, 1);
});
