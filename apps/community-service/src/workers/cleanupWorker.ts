import { getDb } from "../db.js";
import { config } from "../config.js";
import { log } from "../log.js";
import { metrics } from "../metrics.js";

type WorkerStatus = { lastRunAt: string | null; lastError: string | null };

const workerStatus: WorkerStatus = { lastRunAt: null, lastError: null };

export const getCleanupWorkerStatus = () => ({ ...workerStatus });

const daysBefore = (now: number, days: number) => new Date(now - days * 24 * 60 * 60 * 1000).toISOString();

export const runCleanupOnce = async (now = Date.now()) => {
  const db = await getDb();
  const nowIso = new Date(now).toISOString();
  workerStatus.lastRunAt = nowIso;
  workerStatus.lastError = null;

  const revokedCutoff = daysBefore(now, 1);
  const refreshTokensDeleted = await db("refresh_tokens")
    .where((builder) => {
      builder.where("expires_at", "<", nowIso).orWhere("revoked_at", "<", revokedCutoff);
    })
    .del();

  let oneTimeTokensDeleted = 0;
  for (const table of ["email_verification_tokens", "password_reset_tokens"]) {
    oneTimeTokensDeleted += await db(table)
      .where((builder) => {
        builder.whereNotNull("used_at").orWhere("expires_at", "<", nowIso);
      })
      .del();
  }

  const retentionCutoff = daysBefore(now, config.READ_NOTIFICATION_RETENTION_DAYS);
  const notificationsDeleted = await db("notifications")
    .where({ is_read: true })
    .andWhere("created_at", "<", retentionCutoff)
    .del();

  const mailDeleted = await db("mail_outbox")
    .where({ status: "sent" })
    .andWhere("sent_at", "<", retentionCutoff)
    .del();

  const result = { refreshTokensDeleted, oneTimeTokensDeleted, notificationsDeleted, mailDeleted };
  log.info("cleanup.worker.run", result);
  return result;
};

export const startCleanupWorker = () => {
  const tick = async () => {
    try {
      await runCleanupOnce();
      metrics.incCounter("worker_runs_total", { worker: "cleanup", status: "success" });
    } catch (error) {
      const message = error instanceof Error ? error.message : "cleanup_failed";
      workerStatus.lastError = message;
      metrics.incCounter("worker_runs_total", { worker: "cleanup", status: "failed" });
      log.error("cleanup.worker.failed", { error: message });
    }
  };
  void tick();
  return setInterval(tick, config.CLEANUP_WORKER_POLL_MS);
};
