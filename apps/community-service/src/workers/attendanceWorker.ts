import { getDb } from "../db.js";
import { config } from "../config.js";
import { log } from "../log.js";
import { metrics } from "../metrics.js";
import { completeEvent } from "../eventRules.js";

type WorkerStatus = { lastRunAt: string | null; lastError: string | null };

const workerStatus: WorkerStatus = { lastRunAt: null, lastError: null };

export const getAttendanceWorkerStatus = () => ({ ...workerStatus });

/** Marks registered participants as attended for every event past its end plus the delay. */
export const runAttendanceOnce = async (now = Date.now()) => {
  const db = await getDb();
  workerStatus.lastRunAt = new Date(now).toISOString();
  workerStatus.lastError = null;

  const cutoff = new Date(now - config.EVENT_AUTO_ATTENDANCE_DELAY_HOURS * 60 * 60 * 1000).toISOString();
  const due: Array<{ id: string }> = await db("events")
    .join("event_participations", "event_participations.event_id", "events.id")
    .where("events.is_active", true)
    .whereNotNull("events.end_datetime")
    .andWhere("events.end_datetime", "<=", cutoff)
    .andWhere("event_participations.status", "registered")
    .select("events.id as id")
    .groupBy("events.id");

  let participantsMarked = 0;
  for (const event of due) {
    participantsMarked += await completeEvent(db, event.id);
  }

  log.info("attendance.worker.run", { eventsCompleted: due.length, participantsMarked });
  return { eventsCompleted: due.length, participantsMarked };
};

export const startAttendanceWorker = () => {
  const tick = async () => {
    try {
      await runAttendanceOnce();
      metrics.incCounter("worker_runs_total", { worker: "attendance", status: "success" });
    } catch (error) {
      const message = error instanceof Error ? error.message : "attendance_failed";
      workerStatus.lastError = message;
      metrics.incCounter("worker_runs_total", { worker: "attendance", status: "failed" });
      log.error("attendance.worker.failed", { error: message });
    }
  };
  void tick();
  return setInterval(tick, config.ATTENDANCE_WORKER_POLL_MS);
};
