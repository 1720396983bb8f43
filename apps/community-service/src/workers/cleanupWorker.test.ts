import { test, after } from "node:test";
import assert from "node:assert/strict";
import { randomUUID } from "node:crypto";
import { createUser, hoursFromNow } from "../testSupport.js";

const { getDb } = await import("../db.js");
const { closeDb } = await import("@community/db");
const { runCleanupOnce } = await import("./cleanupWorker.js");

const db = await getDb();

after(async () => {
  await closeDb(db);
});

const user = await createUser({ displayName: "Tidy" });

const insertRefreshToken = async (expiresHours: number, revokedHours: number | null) => {
  const id = randomUUID();
  await db("refresh_tokens").insert({
    id,
    user_id: user.id,
    token_hash: `hash-${id}`,
    expires_at: hoursFromNow(expiresHours),
    revoked_at: revokedHours === null ? null : hoursFromNow(revokedHours),
    created_at: hoursFromNow(-72)
  });
  return id;
};

const insertOneTimeToken = async (table: string, expiresHours: number, used: boolean) => {
  const id = randomUUID();
  await db(table).insert({
    id,
    user_id: user.id,
    token_hash: `hash-${id}`,
    expires_at: hoursFromNow(expiresHours),
    used_at: used ? hoursFromNow(-1) : null,
    created_at: hoursFromNow(-2)
  });
  return id;
};

const insertNotification = async (daysAgo: number, isRead: boolean) => {
  const id = randomUUID();
  await db("notifications").insert({
    id,
    user_id: user.id,
    type: "system",
    title: "Notice",
    message: "Hello",
    data: "{}",
    is_read: isRead,
    created_at: hoursFromNow(-24 * daysAgo)
  });
  return id;
};

const insertMail = async (status: string, sentDaysAgo: number | null) => {
  const id = randomUUID();
  await db("mail_outbox").insert({
    id,
    recipient: user.email,
    subject: "Subject",
    body: "Body",
    template: "event_update",
    status,
    attempts: 0,
    next_attempt_at: hoursFromNow(-24 * 40),
    sent_at: sentDaysAgo === null ? null : hoursFromNow(-24 * sentDaysAgo),
    created_at: hoursFromNow(-24 * 40),
    updated_at: hoursFromNow(-24 * 40)
  });
  return id;
};

const expiredToken = await insertRefreshToken(-1, null);
const longRevoked = await insertRefreshToken(24, -48);
const freshlyRevoked = await insertRefreshToken(24, -1);
await insertOneTimeToken("email_verification_tokens", 1, true);
const openVerification = await insertOneTimeToken("email_verification_tokens", 1, false);
const expiredReset = await insertOneTimeToken("password_reset_tokens", -1, false);
const oldRead = await insertNotification(40, true);
const oldUnread = await insertNotification(40, false);
const recentRead = await insertNotification(2, true);
const oldSent = await insertMail("sent", 40);
const oldDead = await insertMail("dead", null);

const remainingIds = async (table: string) =>
  (await db(table).select("id")).map((row: { id: string }) => row.id);

test("cleanup removes stale tokens, read notifications and delivered mail", async () => {
  const result = await runCleanupOnce();
  assert.deepEqual(result, {
    refreshTokensDeleted: 2,
    oneTimeTokensDeleted: 2,
    notificationsDeleted: 1,
    mailDeleted: 1
  });

  const refreshTokens = await remainingIds("refresh_tokens");
  assert.equal(refreshTokens.includes(expiredToken), false);
  assert.equal(refreshTokens.includes(longRevoked), false);
  assert.equal(refreshTokens.includes(freshlyRevoked), true);
  assert.deepEqual(await remainingIds("email_verification_tokens"), [openVerification]);
  assert.equal((await remainingIds("password_reset_tokens")).includes(expiredReset), false);
  assert.deepEqual((await remainingIds("notifications")).sort(), [oldUnread, recentRead].sort());
  assert.equal((await remainingIds("notifications")).includes(oldRead), false);
  assert.deepEqual(await remainingIds("mail_outbox"), [oldDead]);
  assert.equal((await remainingIds("mail_outbox")).includes(oldSent), false);
});

test("a second run deletes nothing", async () => {
  assert.deepEqual(await runCleanupOnce(), {
    refreshTokensDeleted: 0,
    oneTimeTokensDeleted: 0,
    notificationsDeleted: 0,
    mailDeleted: 0
  });
});
