import { test, after } from "node:test";
import assert from "node:assert/strict";
import { randomUUID } from "node:crypto";
import { createUser, hoursFromNow } from "../testSupport.js";

const { getDb } = await import("../db.js");
const { closeDb } = await import("@community/db");
const { getAttendanceWorkerStatus, runAttendanceOnce } = await import("./attendanceWorker.js");

const db = await getDb();

after(async () => {
  await closeDb(db);
});

const organizer = await createUser({ displayName: "Organizer" });
const guest = await createUser({ displayName: "Guest" });
const dropout = await createUser({ displayName: "Dropout" });

const insertEvent = async (input: { startHours: number; endHours: number | null; isActive?: boolean }) => {
  const id = randomUUID();
  await db("events").insert({
    id,
    title: `Event ${id.slice(0, 4)}`,
    description: "A neighbourhood meetup",
    start_datetime: hoursFromNow(input.startHours),
    end_datetime: input.endHours === null ? null : hoursFromNow(input.endHours),
    creator_id: organizer.id,
    is_active: input.isActive ?? true,
    created_at: hoursFromNow(-48),
    updated_at: hoursFromNow(-48)
  });
  return id;
};

const register = async (eventId: string, userId: string, status = "registered") => {
  await db("event_participations").insert({
    id: randomUUID(),
    event_id: eventId,
    user_id: userId,
    status,
    registered_at: hoursFromNow(-24),
    updated_at: hoursFromNow(-24)
  });
};

const statusOf = async (eventId: string, userId: string) => {
  const row = await db("event_participations").where({ event_id: eventId, user_id: userId }).first();
  return row.status;
};

const finished = await insertEvent({ startHours: -5, endHours: -3 });
const justEnded = await insertEvent({ startHours: -2, endHours: -0.5 });
const openEnded = await insertEvent({ startHours: -30, endHours: null });
const cancelled = await insertEvent({ startHours: -30, endHours: -28, isActive: false });
await register(finished, guest.id);
await register(finished, dropout.id, "cancelled");
for (const eventId of [justEnded, openEnded, cancelled]) {
  await register(eventId, guest.id);
}

test("events past their end plus the delay are completed", async () => {
  const result = await runAttendanceOnce();
  assert.deepEqual(result, { eventsCompleted: 1, participantsMarked: 1 });
  assert.equal(await statusOf(finished, guest.id), "attended");
  assert.equal(await statusOf(finished, dropout.id), "cancelled");
  assert.equal(await statusOf(justEnded, guest.id), "registered");
  assert.equal(await statusOf(openEnded, guest.id), "registered");
  assert.equal(await statusOf(cancelled, guest.id), "registered");
  assert.notEqual(getAttendanceWorkerStatus().lastRunAt, null);
});

test("a second run finds nothing left to complete", async () => {
  assert.deepEqual(await runAttendanceOnce(), { eventsCompleted: 0, participantsMarked: 0 });
});

test("the delay is measured from the given clock", async () => {
  const result = await runAttendanceOnce(Date.now() + 60 * 60 * 1000);
  assert.deepEqual(result, { eventsCompleted: 1, participantsMarked: 1 });
  assert.equal(await statusOf(justEnded, guest.id), "attended");
});
