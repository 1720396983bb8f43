import knex, { Knex } from "knex";
import * as usersAndAuth from "../migrations/001_users_and_auth.js";
import * as events from "../migrations/002_events.js";
import * as services from "../migrations/003_services.js";
import * as forum from "../migrations/004_forum.js";
import * as polls from "../migrations/005_polls.js";
import * as commentsNotificationsModeration from "../migrations/006_comments_notifications_moderation.js";
import * as mailOutbox from "../migrations/007_mail_outbox.js";

export type DbClient = Knex;

type NamedMigration = { name: string; migration: Knex.Migration };

// Listed explicitly so migrations load the same way from sources and from a build.
const migrations: NamedMigration[] = [
  { name: "001_users_and_auth", migration: usersAndAuth },
  { name: "002_events", migration: events },
  { name: "003_services", migration: services },
  { name: "004_forum", migration: forum },
  { name: "005_polls", migration: polls },
  { name: "006_comments_notifications_moderation", migration: commentsNotificationsModeration },
  { name: "007_mail_outbox", migration: mailOutbox }
];

const migrationSource: Knex.MigrationSource<NamedMigration> = {
  getMigrations: async () => migrations,
  getMigrationName: (entry) => entry.name,
  getMigration: async (entry) => entry.migration
};

type SqliteConnection = { pragma: (source: string) => unknown };

const SQLITE_PREFIX = "sqlite:";

export const createDb = (connectionString: string) => {
  if (connectionString.startsWith(SQLITE_PREFIX)) {
    // In-process database for tests and local tinkering; one connection keeps :memory: alive.
    return knex({
      client: "better-sqlite3",
      connection: { filename: connectionString.slice(SQLITE_PREFIX.length) || ":memory:" },
      useNullAsDefault: true,
      pool: {
        min: 1,
        max: 1,
        afterCreate: (conn: SqliteConnection, done: (error: Error | null, conn: SqliteConnection) => void) => {
          conn.pragma("foreign_keys = ON");
          done(null, conn);
        }
      }
    });
  }
  return knex({
    client: "pg",
    connection: connectionString,
    pool: { min: 0, max: 10 }
  });
};

export const runMigrations = async (db: DbClient) => {
  await db.migrate.latest({ migrationSource });
};

export const rollbackMigrations = async (db: DbClient) => {
  await db.migrate.rollback({ migrationSource }, true);
};

export const closeDb = async (db: DbClient) => {
  await db.destroy();
};

export {
  toIso,
  toIsoOrNull,
  toBool,
  toNumberOrNull,
  parseJsonColumn,
  asStringArray,
  asRecord
} from "./columns.js";
