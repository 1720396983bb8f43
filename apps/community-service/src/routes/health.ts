import { FastifyInstance } from "fastify";
import { getDb } from "../db.js";
import { metrics } from "../metrics.js";
import { getAttendanceWorkerStatus } from "../workers/attendanceWorker.js";
import { getCleanupWorkerStatus } from "../workers/cleanupWorker.js";
import { getMailWorkerStatus } from "../workers/mailWorker.js";

const workerGauges = () => {
  const statuses = {
    attendance: getAttendanceWorkerStatus(),
    cleanup: getCleanupWorkerStatus(),
    mail: getMailWorkerStatus()
  };
  for (const [worker, status] of Object.entries(statuses)) {
    if (status.lastRunAt) {
      metrics.setGauge(
        "worker_last_run_at_unix",
        { worker },
        Math.floor(Date.parse(status.lastRunAt) / 1000)
      );
    }
  }
  return statuses;
};

export const registerHealthRoutes = (app: FastifyInstance) => {
  app.get("/healthz", async () => {
    let dbOk = true;
    let mailPending = 0;
    let mailDead = 0;
    try {
      const db = await getDb();
      await db.raw("select 1");
      const pending = await db("mail_outbox")
        .where({ status: "pending" })
        .count<{ count: string | number }>("id as count")
        .first();
      mailPending = Number(pending?.count ?? 0);
      const dead = await db("mail_outbox")
        .where({ status: "dead" })
        .count<{ count: string | number }>("id as count")
        .first();
      mailDead = Number(dead?.count ?? 0);
    } catch {
      dbOk = false;
    }
    return {
      ok: dbOk,
      db: { ok: dbOk },
      workers: workerGauges(),
      mailOutbox: { pending: mailPending, dead: mailDead }
    };
  });

  app.get("/metrics", async (_request, reply) => {
    const db = await getDb();
    workerGauges();
    const outboxRows: Array<{ status: string; count: string | number }> = await db("mail_outbox")
      .select("status")
      .count("id as count")
      .groupBy("status");
    for (const row of outboxRows) {
      metrics.setGauge("mail_outbox_rows", { status: row.status }, Number(row.count ?? 0));
    }
    reply.header("content-type", "text/plain; version=0.0.4");
    return reply.send(metrics.render());
  });
};
