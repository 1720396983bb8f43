// Imported first by HTTP tests: configures an in-memory database before config loads.
import { randomUUID } from "node:crypto";

process.env.NODE_ENV = "test";
process.env.DATABASE_URL = "sqlite::memory:";
process.env.AUTO_MIGRATE = "true";
process.env.JWT_SECRET = process.env.JWT_SECRET ?? "test-secret-community-service-00000000";
process.env.RATE_LIMIT_PER_MINUTE = "100000";
process.env.CONTENT_RATE_LIMITS_ENABLED = process.env.CONTENT_RATE_LIMITS_ENABLED ?? "false";
process.env.MAIL_API_URL = "";
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? "error";

export const TEST_PASSWORD = "Test-pass1!";

export const startApp = async () => {
  const { buildServer } = await import("./server.js");
  const app = buildServer();
  await app.ready();
  return app;
};

/** Closes the server and the shared database handle so the test process can exit. */
export const stopApp = async (app: { close: () => PromiseLike<unknown> }) => {
  await app.close();
  const { getDb } = await import("./db.js");
  const { closeDb } = await import("@community/db");
  await closeDb(await getDb());
};

export const bearer = (token: string) => ({ authorization: `Bearer ${token}` });

export type TestUser = { id: string; email: string; displayName: string; token: string };

let counter = 0;

/** Inserts an active user directly and signs an access token for it. */
export const createUser = async (
  input: { displayName?: string; isAdmin?: boolean; createdAt?: string; emailVerified?: boolean } = {}
): Promise<TestUser> => {
  const { getDb } = await import("./db.js");
  const { hashPassword } = await import("@community/shared");
  const { issueTokens } = await import("./sessions.js");
  const db = await getDb();
  counter += 1;
  const id = randomUUID();
  const displayName = input.displayName ?? `user${counter}_${id.slice(0, 4)}`;
  const email = `${displayName.toLowerCase()}@example.test`;
  const now = input.createdAt ?? new Date().toISOString();
  await db("users").insert({
    id,
    display_name: displayName,
    email,
    password_hash: await hashPassword(TEST_PASSWORD),
    is_admin: input.isAdmin ?? false,
    email_verified: input.emailVerified ?? true,
    created_at: now,
    updated_at: now
  });
  const tokens = await issueTokens(db, { id });
  return { id, email, displayName, token: tokens.accessToken };
};

export const hoursFromNow = (hours: number) => new Date(Date.now() + hours * 60 * 60 * 1000).toISOString();
