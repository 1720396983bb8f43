import { closeDb } from "@community/db";
import { log } from "./log.js";
import { config } from "./config.js";
import { getDb } from "./db.js";
import { buildServer } from "./server.js";
import { startAttendanceWorker } from "./workers/attendanceWorker.js";
import { startCleanupWorker } from "./workers/cleanupWorker.js";
import { startMailWorker } from "./workers/mailWorker.js";

await getDb();
const timers = config.WORKERS_ENABLED
  ? [startAttendanceWorker(), startCleanupWorker(), startMailWorker()]
  : [];
const app = buildServer();

const shutdown = async (signal: string) => {
  log.info("shutdown", { signal });
  for (const timer of timers) {
    clearInterval(timer);
  }
  await app.close();
  await closeDb(await getDb());
};

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((error) => {
      log.error("shutdown failed", { error });
      process.exitCode = 1;
    });
  });
}

app
  .listen({ port: config.PORT, host: config.SERVICE_BIND_ADDRESS })
  .then((address) => {
    log.info("listening", { address, workers: timers.length > 0 });
  })
  .catch((error) => {
    log.error("failed to start", { error });
    process.exit(1);
  });
