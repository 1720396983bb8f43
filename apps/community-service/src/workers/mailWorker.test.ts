import { test, after } from "node:test";
import assert from "node:assert/strict";
import "../testSupport.js";

process.env.MAIL_API_URL = "https://mail.example.test/send";
process.env.MAIL_API_TOKEN = "test-secret";
process.env.MAIL_MAX_ATTEMPTS = "2";

const { getDb } = await import("../db.js");
const { closeDb } = await import("@community/db");
const { enqueueMail } = await import("../mail.js");
const { getMailWorkerStatus, runMailOnce } = await import("./mailWorker.js");

const db = await getDb();

after(async () => {
  await closeDb(db);
});

type Delivery = {
  url: string;
  authorization: string | null;
  timed: boolean;
  payload: { from: string; to: string; subject: string; text: string };
};
const deliveries: Delivery[] = [];

const fetchImpl: typeof fetch = async (input, init) => {
  const payload = JSON.parse(String(init?.body));
  deliveries.push({
    url: String(input),
    authorization: new Headers(init?.headers).get("authorization"),
    timed: init?.signal instanceof AbortSignal,
    payload
  });
  return new Response(null, { status: payload.to === "bounce@example.test" ? 500 : 202 });
};

const delivered = await enqueueMail(db, {
  to: "reader@example.test",
  subject: "Welcome",
  body: "Hello there",
  template: "email_verification"
});
const bouncing = await enqueueMail(db, {
  to: "bounce@example.test",
  subject: "Update",
  body: "Something changed",
  template: "event_update"
});

const mailRow = async (id: string) => db("mail_outbox").where({ id }).first();

test("pending mail is posted to the mail API and failures are retried", async () => {
  const now = Date.now();
  assert.deepEqual(await runMailOnce({ now, fetchImpl }), { sent: 1, retried: 1, dead: 0 });

  assert.equal(deliveries.length, 2);
  const first = deliveries.find((delivery) => delivery.payload.to === "reader@example.test");
  assert.deepEqual(first, {
    url: "https://mail.example.test/send",
    authorization: "Bearer test-secret",
    timed: true,
    payload: { from: "no-reply@community.local", to: "reader@example.test", subject: "Welcome", text: "Hello there" }
  });

  const sent = await mailRow(delivered);
  assert.equal(sent.status, "sent");
  const retried = await mailRow(bouncing);
  assert.equal(retried.status, "pending");
  assert.equal(Number(retried.attempts), 1);
  assert.equal(retried.last_error, "mail_api_status_500");
  assert.equal(retried.next_attempt_at, new Date(now + 60 * 1000).toISOString());

  assert.deepEqual(await runMailOnce({ now, fetchImpl }), { sent: 0, retried: 0, dead: 0 });
  assert.equal(getMailWorkerStatus().lastRunAt, new Date(now).toISOString());
});

test("mail is marked dead once it runs out of attempts", async () => {
  const later = Date.now() + 2 * 60 * 1000;
  assert.deepEqual(await runMailOnce({ now: later, fetchImpl }), { sent: 0, retried: 0, dead: 1 });
  const dead = await mailRow(bouncing);
  assert.equal(dead.status, "dead");
  assert.equal(Number(dead.attempts), 2);
  assert.equal(deliveries.length, 3);
});

test("overlapping runs deliver each mail once", async () => {
  const posted: string[] = [];
  const slowFetch: typeof fetch = async (_input, init) => {
    posted.push(JSON.parse(String(init?.body)).to);
    await new Promise((resolve) => setTimeout(resolve, 50));
    return new Response(null, { status: 202 });
  };
  const queued = await enqueueMail(db, {
    to: "once@example.test",
    subject: "Reminder",
    body: "See you tomorrow",
    template: "event_update"
  });
  const now = Date.now();

  const results = await Promise.all([
    runMailOnce({ now, fetchImpl: slowFetch }),
    runMailOnce({ now, fetchImpl: slowFetch })
  ]);
  assert.deepEqual(posted, ["once@example.test"]);
  assert.equal(results[0].sent + results[1].sent, 1);
  assert.equal((await mailRow(queued)).status, "sent");
});
