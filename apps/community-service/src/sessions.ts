import { randomUUID } from "node:crypto";
import { DbClient, toIso } from "@community/db";
import { generateOpaqueToken, hashToken, signAccessToken } from "@community/shared";
import { config } from "./config.js";
import { OneTimeTokenRow, RefreshTokenRow, UserRow } from "./rows.js";

const DAY = 24 * 60 * 60 * 1000;

export type OneTimeTokenTable = "email_verification_tokens" | "password_reset_tokens";

export const issueTokens = async (db: DbClient, user: Pick<UserRow, "id">) => {
  const ttlSeconds = config.ACCESS_TOKEN_EXPIRE_MINUTES * 60;
  const accessToken = await signAccessToken({
    userId: user.id,
    secret: config.JWT_SECRET,
    ttlSeconds,
    issuer: config.APP_NAME
  });
  const refreshToken = generateOpaqueToken();
  const now = Date.now();
  await db("refresh_tokens").insert({
    id: randomUUID(),
    user_id: user.id,
    token_hash: hashToken(refreshToken),
    expires_at: new Date(now + config.REFRESH_TOKEN_EXPIRE_DAYS * DAY).toISOString(),
    created_at: new Date(now).toISOString()
  });
  return { accessToken, refreshToken, tokenType: "bearer" as const, expiresIn: ttlSeconds };
};

/** The stored row for a refresh token that is neither revoked nor expired. */
export const findLiveRefreshToken = async (db: DbClient, token: string) => {
  const row = await db<RefreshTokenRow>("refresh_tokens").where({ token_hash: hashToken(token) }).first();
  if (!row || row.revoked_at || Date.parse(toIso(row.expires_at)) <= Date.now()) {
    return null;
  }
  return row;
};

export const revokeRefreshToken = async (db: DbClient, token: string) =>
  db("refresh_tokens")
    .where({ token_hash: hashToken(token) })
    .whereNull("revoked_at")
    .update({ revoked_at: new Date().toISOString() });

export const revokeAllRefreshTokens = async (db: DbClient, userId: string) =>
  db("refresh_tokens")
    .where({ user_id: userId })
    .whereNull("revoked_at")
    .update({ revoked_at: new Date().toISOString() });

export const createOneTimeToken = async (
  db: DbClient,
  table: OneTimeTokenTable,
  userId: string,
  ttlMs: number
) => {
  const token = generateOpaqueToken();
  const now = Date.now();
  await db(table).insert({
    id: randomUUID(),
    user_id: userId,
    token_hash: hashToken(token),
    expires_at: new Date(now + ttlMs).toISOString(),
    created_at: new Date(now).toISOString()
  });
  return token;
};

/** Marks the token used and returns its row, or null when it is unknown, used or expired. */
export const consumeOneTimeToken = async (db: DbClient, table: OneTimeTokenTable, token: string) => {
  const row = await db<OneTimeTokenRow>(table).where({ token_hash: hashToken(token) }).first();
  if (!row || row.used_at || Date.parse(toIso(row.expires_at)) <= Date.now()) {
    return null;
  }
  const updated = await db(table)
    .where({ id: row.id })
    .whereNull("used_at")
    .update({ used_at: new Date().toISOString() });
  return updated ? row : null;
};

export const invalidateOneTimeTokens = async (db: DbClient, table: OneTimeTokenTable, userId: string) =>
  db(table).where({ user_id: userId }).whereNull("used_at").update({ used_at: new Date().toISOString() });
