import { FastifyInstance } from "fastify";
import { z } from "zod";
import { toIso, toIsoOrNull } from "@community/db";
import { getDb } from "../db.js";
import { log } from "../log.js";
import { requireAdmin } from "../auth.js";
import { contentLimiter, userTier } from "../contentLimits.js";
import { badRequest, idParamsSchema, notFound, nowIso, paginationSchema } from "../http.js";
import { flagReasons, reviewUserContent } from "../moderation.js";
import { countRows } from "../queries.js";
import { ModerationFlagRow } from "../rows.js";
import { findUserById, toPrivateUser } from "../users.js";
import { revokeAllRefreshTokens } from "../sessions.js";

const userUpdateSchema = z.object({
  isActive: z.boolean().optional(),
  isAdmin: z.boolean().optional()
});

const flagListQuerySchema = paginationSchema.extend({
  status: z.enum(["pending", "dismissed", "actioned"]).default("pending")
});

const flagResolutionSchema = z.object({ status: z.enum(["dismissed", "actioned"]) });

// Content types whose rows carry an is_active flag.
const DEACTIVATABLE_TABLES: Record<string, string> = {
  event: "events",
  service: "services",
  comment: "comments"
};

const toFlagView = (row: ModerationFlagRow) => ({
  id: row.id,
  contentType: row.content_type,
  contentId: row.content_id,
  userId: row.user_id,
  confidence: Number(row.confidence),
  reasons: flagReasons(row.reasons),
  status: row.status,
  resolvedBy: row.resolved_by,
  resolvedAt: toIsoOrNull(row.resolved_at),
  createdAt: toIso(row.created_at)
});

export const registerAdminRoutes = (app: FastifyInstance) => {
  app.get("/v1/admin/overview", async (request, reply) => {
    const admin = await requireAdmin(request, reply);
    if (!admin) return;
    const db = await getDb();
    const now = nowIso();
    return reply.send({
      users: {
        total: await countRows(db("users")),
        active: await countRows(db("users").where({ is_active: true })),
        verified: await countRows(db("users").where({ email_verified: true })),
        admins: await countRows(db("users").where({ is_admin: true }))
      },
      events: {
        total: await countRows(db("events").where({ is_active: true })),
        upcoming: await countRows(db("events").where({ is_active: true }).where("start_datetime", ">=", now))
      },
      services: { active: await countRows(db("services").where({ is_active: true })) },
      forum: {
        threads: await countRows(db("forum_threads")),
        posts: await countRows(db("forum_posts"))
      },
      polls: { active: await countRows(db("polls").where({ is_active: true })) },
      comments: { active: await countRows(db("comments").where({ is_active: true })) },
      moderation: { pendingFlags: await countRows(db("moderation_flags").where({ status: "pending" })) },
      mailOutbox: {
        pending: await countRows(db("mail_outbox").where({ status: "pending" })),
        dead: await countRows(db("mail_outbox").where({ status: "dead" }))
      }
    });
  });

  app.put("/v1/admin/users/:id", async (request, reply) => {
    const admin = await requireAdmin(request, reply);
    if (!admin) return;
    const { id } = idParamsSchema.parse(request.params);
    const body = userUpdateSchema.parse(request.body ?? {});
    const db = await getDb();
    const target = await findUserById(db, id);
    if (!target) {
      return notFound(reply, "User not found");
    }
    if (target.id === admin.id && (body.isAdmin === false || body.isActive === false)) {
      return badRequest(reply, "Admins cannot remove their own admin rights or deactivate themselves");
    }
    const changes: Record<string, unknown> = { updated_at: nowIso() };
    if (body.isActive !== undefined) changes.is_active = body.isActive;
    if (body.isAdmin !== undefined) changes.is_admin = body.isAdmin;
    await db("users").where({ id }).update(changes);
    if (body.isActive === false) {
      await revokeAllRefreshTokens(db, id);
    }
    log.info("admin.user.updated", { adminId: admin.id, userId: id, ...body });
    const updated = await findUserById(db, id);
    return reply.send(toPrivateUser(updated ?? target));
  });

  app.get("/v1/admin/moderation/flags", async (request, reply) => {
    const admin = await requireAdmin(request, reply);
    if (!admin) return;
    const query = flagListQuerySchema.parse(request.query ?? {});
    const db = await getDb();
    const rows = await db<ModerationFlagRow>("moderation_flags")
      .where({ status: query.status })
      .orderBy("created_at", "desc")
      .offset(query.skip)
      .limit(query.limit);
    return reply.send(rows.map(toFlagView));
  });

  app.put("/v1/admin/moderation/flags/:id", async (request, reply) => {
    const admin = await requireAdmin(request, reply);
    if (!admin) return;
    const { id } = idParamsSchema.parse(request.params);
    const body = flagResolutionSchema.parse(request.body ?? {});
    const db = await getDb();
    const flag = await db<ModerationFlagRow>("moderation_flags").where({ id }).first();
    if (!flag) {
      return notFound(reply, "Flag not found");
    }
    const resolvedAt = nowIso();
    await db("moderation_flags")
      .where({ id })
      .update({ status: body.status, resolved_by: admin.id, resolved_at: resolvedAt });
    let contentDeactivated = false;
    const table = DEACTIVATABLE_TABLES[flag.content_type];
    if (body.status === "actioned" && table) {
      contentDeactivated = (await db(table).where({ id: flag.content_id }).update({ is_active: false })) > 0;
    }
    log.info("admin.moderation.resolved", { flagId: id, status: body.status, contentDeactivated });
    return reply.send({
      ...toFlagView({ ...flag, status: body.status, resolved_by: admin.id, resolved_at: resolvedAt }),
      contentDeactivated
    });
  });

  app.get("/v1/admin/moderation/users/:id", async (request, reply) => {
    const admin = await requireAdmin(request, reply);
    if (!admin) return;
    const { id } = idParamsSchema.parse(request.params);
    const db = await getDb();
    if (!(await findUserById(db, id))) {
      return notFound(reply, "User not found");
    }
    return reply.send(await reviewUserContent(db, id));
  });

  app.get("/v1/admin/rate-limits/overview", async (request, reply) => {
    const admin = await requireAdmin(request, reply);
    if (!admin) return;
    return reply.send(contentLimiter.overview());
  });

  app.get("/v1/admin/rate-limits/users/:id", async (request, reply) => {
    const admin = await requireAdmin(request, reply);
    if (!admin) return;
    const { id } = idParamsSchema.parse(request.params);
    const db = await getDb();
    const user = await findUserById(db, id);
    if (!user) {
      return notFound(reply, "User not found");
    }
    return reply.send({ userId: id, tier: userTier(user), ...contentLimiter.usage(id) });
  });

  app.post("/v1/admin/rate-limits/users/:id/clear", async (request, reply) => {
    const admin = await requireAdmin(request, reply);
    if (!admin) return;
    const { id } = idParamsSchema.parse(request.params);
    const cleared = contentLimiter.clear(id);
    log.info("admin.rate_limits.cleared", { adminId: admin.id, userId: id, ...cleared });
    return reply.send({ userId: id, ...cleared });
  });
};
