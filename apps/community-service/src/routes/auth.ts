import { FastifyInstance } from "fastify";
import { randomUUID } from "node:crypto";
import { z } from "zod";
import { checkPasswordStrength, hashPassword, verifyPassword } from "@community/shared";
import { DbClient, toBool } from "@community/db";
import { config } from "../config.js";
import { getDb } from "../db.js";
import { log } from "../log.js";
import { metrics } from "../metrics.js";
import { requireUser } from "../auth.js";
import { badRequest, nowIso, sendError } from "../http.js";
import { isUniqueViolation } from "../queries.js";
import { enqueueMail, passwordResetMail, verificationMail } from "../mail.js";
import { UserRow } from "../rows.js";
import {
  consumeOneTimeToken,
  createOneTimeToken,
  findLiveRefreshToken,
  invalidateOneTimeTokens,
  issueTokens,
  revokeAllRefreshTokens,
  revokeRefreshToken
} from "../sessions.js";
import { findActiveUser, toPrivateUser } from "../users.js";

const emailSchema = z.string().trim().toLowerCase().email().max(254);
const displayNameSchema = z.string().trim().min(2).max(20);
const passwordSchema = z.string().min(1).max(128);

const registerSchema = z.object({
  displayName: displayNameSchema,
  email: emailSchema,
  password: passwordSchema
});

const loginSchema = z.object({ email: emailSchema, password: passwordSchema });
const refreshSchema = z.object({ refreshToken: z.string().min(1) });
const tokenSchema = z.object({ token: z.string().min(1) });
const forgotPasswordSchema = z.object({ email: emailSchema });
const resetPasswordSchema = z.object({ token: z.string().min(1), newPassword: passwordSchema });
const changePasswordSchema = z.object({ currentPassword: passwordSchema, newPassword: passwordSchema });
const changeEmailSchema = z.object({ newEmail: emailSchema, password: passwordSchema });
const deleteAccountSchema = z.object({ password: passwordSchema });

const HOUR = 60 * 60 * 1000;

export const emailTaken = async (db: DbClient, email: string, exceptUserId?: string) => {
  const query = db<UserRow>("users").where({ email });
  if (exceptUserId) query.whereNot({ id: exceptUserId });
  return Boolean(await query.first());
};

export const displayNameTaken = async (db: DbClient, displayName: string, exceptUserId?: string) => {
  const query = db<UserRow>("users").whereRaw("lower(display_name) = ?", [displayName.toLowerCase()]);
  if (exceptUserId) query.whereNot({ id: exceptUserId });
  return Boolean(await query.first());
};

const sendVerificationEmail = async (db: DbClient, user: Pick<UserRow, "id" | "email" | "display_name">) => {
  const token = await createOneTimeToken(
    db,
    "email_verification_tokens",
    user.id,
    config.EMAIL_VERIFICATION_TTL_HOURS * HOUR
  );
  await enqueueMail(db, verificationMail({ to: user.email, displayName: user.display_name, token }));
};

export const registerAuthRoutes = (app: FastifyInstance) => {
  app.post("/v1/auth/register", async (request, reply) => {
    const body = registerSchema.parse(request.body ?? {});
    const db = await getDb();
    if (await emailTaken(db, body.email)) {
      return badRequest(reply, "Email already registered");
    }
    if (await displayNameTaken(db, body.displayName)) {
      return badRequest(reply, "Display name already taken");
    }
    const problems = checkPasswordStrength(body.password);
    if (problems.length) {
      return badRequest(reply, "Password does not meet the requirements", problems.join("; "));
    }
    const id = randomUUID();
    const now = nowIso();
    try {
      await db("users").insert({
        id,
        display_name: body.displayName,
        email: body.email,
        password_hash: await hashPassword(body.password),
        created_at: now,
        updated_at: now
      });
    } catch (error) {
      if (!isUniqueViolation(error)) throw error;
      return badRequest(
        reply,
        (await emailTaken(db, body.email)) ? "Email already registered" : "Display name already taken"
      );
    }
    const user = await db<UserRow>("users").where({ id }).first();
    if (!user) {
      throw new Error("user_insert_failed");
    }
    await sendVerificationEmail(db, user);
    metrics.incCounter("auth_events_total", { outcome: "register" });
    log.info("auth.registered", { userId: id });
    return reply.code(201).send(toPrivateUser(user));
  });

  app.post("/v1/auth/login", async (request, reply) => {
    const body = loginSchema.parse(request.body ?? {});
    const db = await getDb();
    const user = await db<UserRow>("users").where({ email: body.email }).first();
    const valid = user ? await verifyPassword(body.password, user.password_hash) : false;
    if (!user || !valid || !toBool(user.is_active)) {
      metrics.incCounter("auth_events_total", { outcome: "login_failed" });
      log.warn("auth.login.failed", { userId: user?.id });
      return sendError(reply, "unauthorized", "Incorrect email or password");
    }
    metrics.incCounter("auth_events_total", { outcome: "login_success" });
    return reply.send(await issueTokens(db, user));
  });

  app.post("/v1/auth/refresh", async (request, reply) => {
    const body = refreshSchema.parse(request.body ?? {});
    const db = await getDb();
    const stored = await findLiveRefreshToken(db, body.refreshToken);
    const user = stored ? await findActiveUser(db, stored.user_id) : undefined;
    if (!stored || !user) {
      return sendError(reply, "unauthorized", "Invalid refresh token");
    }
    // Only the request that revokes the token gets a new pair.
    if ((await revokeRefreshToken(db, body.refreshToken)) !== 1) {
      return sendError(reply, "unauthorized", "Invalid refresh token");
    }
    metrics.incCounter("auth_events_total", { outcome: "refresh" });
    return reply.send(await issueTokens(db, user));
  });

  app.post("/v1/auth/logout", async (request, reply) => {
    const body = refreshSchema.parse(request.body ?? {});
    const db = await getDb();
    await revokeRefreshToken(db, body.refreshToken);
    return reply.send({ message: "Logged out" });
  });

  app.post("/v1/auth/logout-all", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const db = await getDb();
    const revoked = await revokeAllRefreshTokens(db, user.id);
    return reply.send({ message: "Logged out from all devices", revoked });
  });

  app.post("/v1/auth/verify-email", async (request, reply) => {
    const body = tokenSchema.parse(request.body ?? {});
    const db = await getDb();
    const row = await consumeOneTimeToken(db, "email_verification_tokens", body.token);
    if (!row) {
      return badRequest(reply, "Invalid or expired verification token");
    }
    const now = nowIso();
    await db("users")
      .where({ id: row.user_id })
      .update({ email_verified: true, email_verified_at: now, updated_at: now });
    return reply.send({ message: "Email verified" });
  });

  app.post("/v1/auth/resend-verification", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    if (toBool(user.email_verified)) {
      return sendError(reply, "conflict", "Email already verified");
    }
    const db = await getDb();
    await invalidateOneTimeTokens(db, "email_verification_tokens", user.id);
    await sendVerificationEmail(db, user);
    return reply.send({ message: "Verification email sent" });
  });

  app.post("/v1/auth/forgot-password", async (request, reply) => {
    const body = forgotPasswordSchema.parse(request.body ?? {});
    const db = await getDb();
    const user = await db<UserRow>("users").where({ email: body.email }).first();
    if (user && toBool(user.is_active)) {
      await invalidateOneTimeTokens(db, "password_reset_tokens", user.id);
      const token = await createOneTimeToken(
        db,
        "password_reset_tokens",
        user.id,
        config.PASSWORD_RESET_TTL_MINUTES * 60 * 1000
      );
      await enqueueMail(db, passwordResetMail({ to: user.email, displayName: user.display_name, token }));
    }
    return reply.send({ message: "If the email is registered, a reset link has been sent" });
  });

  app.post("/v1/auth/reset-password", async (request, reply) => {
    const body = resetPasswordSchema.parse(request.body ?? {});
    const problems = checkPasswordStrength(body.newPassword);
    if (problems.length) {
      return badRequest(reply, "Password does not meet the requirements", problems.join("; "));
    }
    const db = await getDb();
    const row = await consumeOneTimeToken(db, "password_reset_tokens", body.token);
    if (!row) {
      return badRequest(reply, "Invalid or expired reset token");
    }
    await db("users")
      .where({ id: row.user_id })
      .update({ password_hash: await hashPassword(body.newPassword), updated_at: nowIso() });
    await revokeAllRefreshTokens(db, row.user_id);
    log.info("auth.password.reset", { userId: row.user_id });
    return reply.send({ message: "Password has been reset" });
  });

  app.put("/v1/auth/password", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const body = changePasswordSchema.parse(request.body ?? {});
    if (!(await verifyPassword(body.currentPassword, user.password_hash))) {
      return badRequest(reply, "Incorrect password");
    }
    const problems = checkPasswordStrength(body.newPassword);
    if (problems.length) {
      return badRequest(reply, "Password does not meet the requirements", problems.join("; "));
    }
    const db = await getDb();
    await db("users")
      .where({ id: user.id })
      .update({ password_hash: await hashPassword(body.newPassword), updated_at: nowIso() });
    await revokeAllRefreshTokens(db, user.id);
    return reply.send({ message: "Password updated" });
  });

  app.put("/v1/auth/email", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const body = changeEmailSchema.parse(request.body ?? {});
    if (!(await verifyPassword(body.password, user.password_hash))) {
      return badRequest(reply, "Incorrect password");
    }
    const db = await getDb();
    if (await emailTaken(db, body.newEmail, user.id)) {
      return badRequest(reply, "Email already registered");
    }
    await db("users").where({ id: user.id }).update({
      email: body.newEmail,
      email_verified: false,
      email_verified_at: null,
      updated_at: nowIso()
    });
    await invalidateOneTimeTokens(db, "email_verification_tokens", user.id);
    await sendVerificationEmail(db, { ...user, email: body.newEmail });
    const updated = await db<UserRow>("users").where({ id: user.id }).first();
    return reply.send(updated ? toPrivateUser(updated) : { message: "Email updated" });
  });

  app.delete("/v1/auth/account", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const body = deleteAccountSchema.parse(request.body ?? {});
    if (!(await verifyPassword(body.password, user.password_hash))) {
      return badRequest(reply, "Incorrect password");
    }
    const db = await getDb();
    await revokeAllRefreshTokens(db, user.id);
    await db("users")
      .where({ id: user.id })
      .update({
        is_active: false,
        email: `deleted_${user.id}@deleted.local`,
        display_name: `deleted_user_${user.id.slice(0, 7)}`,
        first_name: null,
        last_name: null,
        bio: null,
        location: null,
        profile_image_url: null,
        updated_at: nowIso()
      });
    log.info("auth.account.deleted", { userId: user.id });
    return reply.send({ message: "Account deleted" });
  });

  app.get("/v1/auth/me", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    return reply.send(toPrivateUser(user));
  });

  app.get("/v1/auth/status", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    return reply.send({
      userId: user.id,
      emailVerified: toBool(user.email_verified),
      isAdmin: toBool(user.is_admin),
      isActive: toBool(user.is_active)
    });
  });
};
