import { getDb } from "../db.js";
import { config } from "../config.js";
import { log } from "../log.js";
import { metrics } from "../metrics.js";
import { MailOutboxRow } from "../rows.js";

const BATCH_SIZE = 25;
const BASE_BACKOFF_MS = 30 * 1000;
// A claimed row is hidden from other runs for this long; a crashed run's rows come back after it.
const CLAIM_LEASE_MS = 5 * 60 * 1000;

type WorkerStatus = { lastRunAt: string | null; lastError: string | null };

const workerStatus: WorkerStatus = { lastRunAt: null, lastError: null };

export const getMailWorkerStatus = () => ({ ...workerStatus });

const deliver = async (row: MailOutboxRow, fetchImpl: typeof fetch) => {
  if (!config.MAIL_API_URL) {
    log.info("mail.dev.delivered", { mailId: row.id, to: row.recipient, subject: row.subject });
    return;
  }
  const headers: Record<string, string> = { "content-type": "application/json" };
  if (config.MAIL_API_TOKEN) {
    headers.authorization = `Bearer ${config.MAIL_API_TOKEN}`;
  }
  const response = await fetchImpl(config.MAIL_API_URL, {
    method: "POST",
    headers,
    body: JSON.stringify({
      from: config.MAIL_FROM,
      to: row.recipient,
      subject: row.subject,
      text: row.body
    }),
    signal: AbortSignal.timeout(config.MAIL_API_TIMEOUT_MS)
  });
  if (!response.ok) {
    throw new Error(`mail_api_status_${response.status}`);
  }
};

export const runMailOnce = async (input?: { now?: number; fetchImpl?: typeof fetch }) => {
  const now = input?.now ?? Date.now();
  const fetchImpl = input?.fetchImpl ?? fetch;
  const nowIso = new Date(now).toISOString();
  const db = await getDb();
  workerStatus.lastRunAt = nowIso;
  workerStatus.lastError = null;

  const due = await db<MailOutboxRow>("mail_outbox")
    .where({ status: "pending" })
    .andWhere("next_attempt_at", "<=", nowIso)
    .orderBy("created_at", "asc")
    .limit(BATCH_SIZE);

  const counts = { sent: 0, retried: 0, dead: 0 };
  for (const row of due) {
    const claimed = await db("mail_outbox")
      .where({ id: row.id, status: "pending" })
      .andWhere("next_attempt_at", "<=", nowIso)
      .update({ next_attempt_at: new Date(now + CLAIM_LEASE_MS).toISOString(), updated_at: nowIso });
    if (claimed !== 1) {
      continue;
    }
    try {
      await deliver(row, fetchImpl);
      await db("mail_outbox")
        .where({ id: row.id })
        .update({ status: "sent", sent_at: nowIso, last_error: null, updated_at: nowIso });
      counts.sent += 1;
    } catch (error) {
      const message = error instanceof Error ? error.message : "mail_delivery_failed";
      const attempts = Number(row.attempts) + 1;
      const dead = attempts >= config.MAIL_MAX_ATTEMPTS;
      await db("mail_outbox")
        .where({ id: row.id })
        .update({
          status: dead ? "dead" : "pending",
          attempts,
          last_error: message,
          next_attempt_at: new Date(now + BASE_BACKOFF_MS * 2 ** attempts).toISOString(),
          updated_at: nowIso
        });
      if (dead) {
        counts.dead += 1;
      } else {
        counts.retried += 1;
      }
      log.warn("mail.delivery.failed", { mailId: row.id, attempts, dead, error: message });
    }
  }
  log.info("mail.worker.run", counts);
  return counts;
};

export const startMailWorker = () => {
  let running = false;
  const tick = async () => {
    if (running) {
      return;
    }
    running = true;
    try {
      await runMailOnce();
      metrics.incCounter("worker_runs_total", { worker: "mail", status: "success" });
    } catch (error) {
      const message = error instanceof Error ? error.message : "mail_failed";
      workerStatus.lastError = message;
      metrics.incCounter("worker_runs_total", { worker: "mail", status: "failed" });
      log.error("mail.worker.failed", { error: message });
    } finally {
      running = false;
    }
  };
  void tick();
  return setInterval(tick, config.MAIL_WORKER_POLL_MS);
};
