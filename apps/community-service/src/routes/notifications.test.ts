import { test, after } from "node:test";
import assert from "node:assert/strict";
import { randomUUID } from "node:crypto";
import { bearer, createUser, hoursFromNow, startApp, stopApp } from "../testSupport.js";

const app = await startApp();
const { getDb } = await import("../db.js");

after(async () => {
  await stopApp(app);
});

const user = await createUser({ displayName: "Reader" });
const someoneElse = await createUser({ displayName: "Bystander" });
const db = await getDb();

const insertNotification = async (input: { userId: string; type: string; hoursAgo: number; isRead: boolean }) => {
  const id = randomUUID();
  await db("notifications").insert({
    id,
    user_id: input.userId,
    type: input.type,
    title: `A ${input.type}`,
    message: "Something happened",
    data: JSON.stringify({ threadId: "thread-1" }),
    is_read: input.isRead,
    created_at: hoursFromNow(-input.hoursAgo)
  });
  return id;
};

const oldest = await insertNotification({ userId: user.id, type: "forum_reply", hoursAgo: 3, isRead: false });
const middle = await insertNotification({ userId: user.id, type: "event_update", hoursAgo: 2, isRead: true });
const newest = await insertNotification({ userId: user.id, type: "forum_reply", hoursAgo: 1, isRead: false });
const foreign = await insertNotification({ userId: someoneElse.id, type: "system", hoursAgo: 1, isRead: false });

const get = (url: string) => app.inject({ method: "GET", url, headers: bearer(user.token) });
const ids = (body: Array<{ id: string }>) => body.map((entry) => entry.id);

test("listing filters by read state and type", async () => {
  const all = await get("/v1/notifications");
  assert.deepEqual(ids(all.json()), [newest, middle, oldest]);
  assert.deepEqual(all.json()[0].data, { threadId: "thread-1" });
  assert.equal(all.json()[0].isRead, false);

  assert.deepEqual(ids((await get("/v1/notifications?unreadOnly=true")).json()), [newest, oldest]);
  assert.deepEqual(ids((await get("/v1/notifications?type=event_update")).json()), [middle]);
  assert.equal((await get("/v1/notifications?type=gossip")).statusCode, 400);
});

test("stats count unread by type and list unread first", async () => {
  const stats = (await get("/v1/notifications/stats")).json();
  assert.equal(stats.totalUnread, 2);
  assert.deepEqual(stats.unreadByType, { forum_reply: 2 });
  assert.deepEqual(ids(stats.latest), [newest, oldest, middle]);
});

test("a notification is only changed by its recipient", async () => {
  const denied = await app.inject({
    method: "PUT",
    url: `/v1/notifications/${foreign}`,
    headers: bearer(user.token),
    payload: { isRead: true }
  });
  assert.equal(denied.statusCode, 403);

  const missing = await app.inject({
    method: "PUT",
    url: `/v1/notifications/${randomUUID()}`,
    headers: bearer(user.token),
    payload: { isRead: true }
  });
  assert.equal(missing.statusCode, 404);

  const marked = await app.inject({
    method: "PUT",
    url: `/v1/notifications/${oldest}`,
    headers: bearer(user.token),
    payload: { isRead: true }
  });
  assert.equal(marked.json().isRead, true);

  const deleteForeign = await app.inject({
    method: "DELETE",
    url: `/v1/notifications/${foreign}`,
    headers: bearer(user.token)
  });
  assert.equal(deleteForeign.statusCode, 403);
});

test("read-all and clearing read notifications", async () => {
  const readAll = await app.inject({
    method: "POST",
    url: "/v1/notifications/read-all?type=forum_reply",
    headers: bearer(user.token)
  });
  assert.deepEqual(readAll.json(), { updated: 1 });

  const cleared = await app.inject({ method: "DELETE", url: "/v1/notifications/read", headers: bearer(user.token) });
  assert.deepEqual(cleared.json(), { deleted: 3 });
  assert.deepEqual((await get("/v1/notifications")).json(), []);
  assert.equal((await db("notifications").where({ id: foreign })).length, 1);
});
