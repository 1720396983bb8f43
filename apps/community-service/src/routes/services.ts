import { FastifyInstance } from "fastify";
import { randomUUID } from "node:crypto";
import { z } from "zod";
import { DbClient, asStringArray, parseJsonColumn, toBool, toIso, toIsoOrNull, toNumberOrNull } from "@community/db";
import { getDb } from "../db.js";
import { log } from "../log.js";
import { metrics } from "../metrics.js";
import { requireAdmin, requireUser } from "../auth.js";
import { enforceContentLimit } from "../contentLimits.js";
import { badRequest, forbidden, idParamsSchema, notFound, nowIso, paginationSchema, queryFlag } from "../http.js";
import { assessContent, recordModerationFlag, rejectFlagged } from "../moderation.js";
import { createNotification } from "../notifications.js";
import { countRows } from "../queries.js";
import { ServiceRow } from "../rows.js";
import { isAdmin, likeClause, likePattern, loadPublicUsers, PublicUser } from "../users.js";

const MAX_LOCATIONS = 5;
const MIN_SEARCH_LENGTH = 3;
const MAX_KEYWORDS = 5;

const meetingLocationsSchema = z
  .array(z.string().max(200))
  .transform((values) => values.map((value) => value.trim()).filter(Boolean))
  .refine((values) => values.length <= MAX_LOCATIONS, {
    message: `At most ${MAX_LOCATIONS} meeting locations`
  });

const serviceFields = {
  title: z.string().trim().min(1).max(100),
  description: z.string().trim().min(10).max(2000),
  isOffering: z.boolean(),
  meetingLocations: meetingLocationsSchema,
  priceType: z.enum(["free", "paid", "negotiable", "exchange"]),
  priceAmount: z.number().min(0).nullable(),
  priceCurrency: z.string().trim().length(3),
  estimatedDurationHours: z.number().min(0.25).max(168).nullable(),
  contactMethod: z.enum(["message", "phone", "email"]),
  responseTimeHours: z.number().int().min(1).max(168).nullable()
};

const createSchema = z.object({
  ...serviceFields,
  meetingLocations: serviceFields.meetingLocations.default([]),
  priceType: serviceFields.priceType.default("free"),
  priceAmount: serviceFields.priceAmount.optional(),
  priceCurrency: serviceFields.priceCurrency.default("EUR"),
  estimatedDurationHours: serviceFields.estimatedDurationHours.optional(),
  contactMethod: serviceFields.contactMethod.default("message"),
  responseTimeHours: serviceFields.responseTimeHours.optional()
});

const updateSchema = z.object(serviceFields).partial().extend({ isCompleted: z.boolean().optional() });

const listQuerySchema = paginationSchema.extend({
  isOffering: queryFlag.optional(),
  search: z.string().trim().max(100).optional()
});

const recommendationsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(50).default(10)
});

const interestSchema = z.object({ message: z.string().trim().max(500).optional() });

const adminUpdateSchema = z.object({
  isActive: z.boolean().optional(),
  adminNotes: z.string().trim().max(1000).nullable().optional(),
  serviceType: z.enum(["user_service", "platform_feature"]).optional()
});

export const slugify = (title: string, id: string) => {
  const base = title
    .toLowerCase()
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .slice(0, 60)
    .replace(/-+$/g, "");
  return `${base || "service"}-${id.slice(0, 8)}`;
};

/** Distinct lowercase words of 3 to 15 letters, in order of first appearance. */
export const extractKeywords = (texts: string[], max = MAX_KEYWORDS) => {
  const keywords: string[] = [];
  for (const text of texts) {
    for (const word of text.toLowerCase().match(/\p{L}+/gu) ?? []) {
      if (word.length >= 3 && word.length <= 15 && !keywords.includes(word)) {
        keywords.push(word);
      }
    }
  }
  return keywords.slice(0, max);
};

const toServiceView = (row: ServiceRow, owner: PublicUser | null) => ({
  id: row.id,
  userId: row.user_id,
  title: row.title,
  description: row.description,
  isOffering: toBool(row.is_offering),
  meetingLocations: asStringArray(parseJsonColumn(row.meeting_locations)),
  priceType: row.price_type,
  priceAmount: toNumberOrNull(row.price_amount),
  priceCurrency: row.price_currency,
  estimatedDurationHours: toNumberOrNull(row.estimated_duration_hours),
  contactMethod: row.contact_method,
  responseTimeHours: row.response_time_hours,
  isCompleted: toBool(row.is_completed),
  completedAt: toIsoOrNull(row.completed_at),
  viewCount: Number(row.view_count),
  interestCount: Number(row.interest_count),
  serviceType: row.service_type,
  slug: row.slug,
  isActive: toBool(row.is_active),
  createdAt: toIso(row.created_at),
  updatedAt: toIso(row.updated_at),
  owner
});

const withOwners = async (db: DbClient, rows: ServiceRow[]) => {
  const owners = await loadPublicUsers(
    db,
    rows.map((row) => row.user_id)
  );
  return rows.map((row) => toServiceView(row, owners.get(row.user_id) ?? null));
};

const findActiveService = (db: DbClient, id: string) =>
  db<ServiceRow>("services").where({ id, is_active: true }).first();

const activeServices = (db: DbClient) => db<ServiceRow>("services").where({ is_active: true });

export const registerServiceRoutes = (app: FastifyInstance) => {
  app.get("/v1/services", async (request, reply) => {
    const query = listQuerySchema.parse(request.query ?? {});
    if (query.search !== undefined && query.search.length < MIN_SEARCH_LENGTH) {
      return badRequest(reply, `Search term must be at least ${MIN_SEARCH_LENGTH} characters`);
    }
    const db = await getDb();
    const builder = activeServices(db);
    if (query.isOffering !== undefined) {
      builder.where({ is_offering: query.isOffering });
    }
    if (query.search) {
      const pattern = likePattern(query.search);
      builder.where((inner) => {
        inner.whereRaw(likeClause("title"), [pattern]).orWhereRaw(likeClause("description"), [pattern]);
      });
    }
    const rows = await builder.orderBy("created_at", "desc").offset(query.skip).limit(query.limit);
    return reply.send(await withOwners(db, rows));
  });

  app.get("/v1/services/my", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const db = await getDb();
    const rows = await activeServices(db).where({ user_id: user.id }).orderBy("created_at", "desc");
    return reply.send(await withOwners(db, rows));
  });

  app.get("/v1/services/stats", async (_request, reply) => {
    const db = await getDb();
    const servicesOffered = await countRows(activeServices(db).where({ is_offering: true }));
    const servicesRequested = await countRows(activeServices(db).where({ is_offering: false }));
    return reply.send({
      totalActiveServices: servicesOffered + servicesRequested,
      servicesOffered,
      servicesRequested
    });
  });

  app.get("/v1/services/recommendations", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const { limit } = recommendationsQuerySchema.parse(request.query ?? {});
    const db = await getDb();
    const own = await activeServices(db).where({ user_id: user.id }).orderBy("created_at", "desc");
    const keywords = extractKeywords(own.flatMap((row) => [row.title, row.description]));
    const [latest] = own;
    if (!latest || !keywords.length) {
      const rows = await activeServices(db)
        .whereNot({ user_id: user.id })
        .orderBy("created_at", "desc")
        .limit(limit);
      return reply.send(await withOwners(db, rows));
    }
    const targetOffering = !toBool(latest.is_offering);
    const ofTargetType = () =>
      activeServices(db).where({ is_offering: targetOffering }).whereNot({ user_id: user.id });
    const matches = await ofTargetType()
      .where((inner) => {
        for (const keyword of keywords) {
          const pattern = likePattern(keyword);
          inner.orWhereRaw(likeClause("title"), [pattern]).orWhereRaw(likeClause("description"), [pattern]);
        }
      })
      .orderBy("created_at", "desc")
      .limit(limit);
    const rows = matches.length
      ? matches
      : await ofTargetType().orderBy("created_at", "desc").limit(limit);
    return reply.send(await withOwners(db, rows));
  });

  app.get("/v1/services/:id", async (request, reply) => {
    const { id } = idParamsSchema.parse(request.params);
    const db = await getDb();
    if (!(await findActiveService(db, id))) {
      return notFound(reply, "Service not found");
    }
    await db("services").where({ id }).increment("view_count", 1);
    const service = await findActiveService(db, id);
    if (!service) {
      return notFound(reply, "Service not found");
    }
    const [view] = await withOwners(db, [service]);
    return reply.send(view);
  });

  app.post("/v1/services", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const body = createSchema.parse(request.body ?? {});
    if (!(await enforceContentLimit(reply, user, "service_create"))) return;
    const moderation = assessContent(body.title, body.description);
    if (await rejectFlagged(reply, "service", moderation)) return;

    const db = await getDb();
    const id = randomUUID();
    const now = nowIso();
    await db("services").insert({
      id,
      user_id: user.id,
      title: body.title,
      description: body.description,
      is_offering: body.isOffering,
      meeting_locations: JSON.stringify(body.meetingLocations),
      price_type: body.priceType,
      price_amount: body.priceAmount ?? null,
      price_currency: body.priceCurrency,
      estimated_duration_hours: body.estimatedDurationHours ?? null,
      contact_method: body.contactMethod,
      response_time_hours: body.responseTimeHours ?? null,
      slug: slugify(body.title, id),
      is_active: true,
      created_at: now,
      updated_at: now
    });
    await recordModerationFlag(db, { contentType: "service", contentId: id, userId: user.id, result: moderation });
    metrics.incCounter("content_action_total", { type: "service", decision: "created" });
    log.info("service.created", { serviceId: id, userId: user.id });
    const created = await findActiveService(db, id);
    if (!created) {
      throw new Error("service_insert_failed");
    }
    const [view] = await withOwners(db, [created]);
    return reply.code(201).send(view);
  });

  app.put("/v1/services/:id", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const { id } = idParamsSchema.parse(request.params);
    const body = updateSchema.parse(request.body ?? {});
    const db = await getDb();
    const service = await findActiveService(db, id);
    if (!service) {
      return notFound(reply, "Service not found");
    }
    if (service.user_id !== user.id && !isAdmin(user)) {
      return forbidden(reply);
    }
    const moderation = assessContent(body.title, body.description);
    if (await rejectFlagged(reply, "service", moderation)) return;

    const now = nowIso();
    const changes: Record<string, unknown> = { updated_at: now };
    if (body.title !== undefined) changes.title = body.title;
    if (body.description !== undefined) changes.description = body.description;
    if (body.isOffering !== undefined) changes.is_offering = body.isOffering;
    if (body.meetingLocations !== undefined) changes.meeting_locations = JSON.stringify(body.meetingLocations);
    if (body.priceType !== undefined) changes.price_type = body.priceType;
    if (body.priceAmount !== undefined) changes.price_amount = body.priceAmount;
    if (body.priceCurrency !== undefined) changes.price_currency = body.priceCurrency;
    if (body.estimatedDurationHours !== undefined) changes.estimated_duration_hours = body.estimatedDurationHours;
    if (body.contactMethod !== undefined) changes.contact_method = body.contactMethod;
    if (body.responseTimeHours !== undefined) changes.response_time_hours = body.responseTimeHours;
    if (body.isCompleted !== undefined) {
      changes.is_completed = body.isCompleted;
      if (!body.isCompleted) {
        changes.completed_at = null;
      } else if (!toBool(service.is_completed)) {
        changes.completed_at = now;
      }
    }
    await db("services").where({ id }).update(changes);
    await recordModerationFlag(db, { contentType: "service", contentId: id, userId: user.id, result: moderation });
    const updated = await findActiveService(db, id);
    if (!updated) {
      return notFound(reply, "Service not found");
    }
    const [view] = await withOwners(db, [updated]);
    return reply.send(view);
  });

  app.delete("/v1/services/:id", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const { id } = idParamsSchema.parse(request.params);
    const db = await getDb();
    const service = await findActiveService(db, id);
    if (!service) {
      return notFound(reply, "Service not found");
    }
    if (service.user_id !== user.id && !isAdmin(user)) {
      return forbidden(reply);
    }
    await db("services").where({ id }).update({ is_active: false, updated_at: nowIso() });
    return reply.send({ message: "Service deleted" });
  });

  app.post("/v1/services/:id/interest", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const { id } = idParamsSchema.parse(request.params);
    const body = interestSchema.parse(request.body ?? {});
    const db = await getDb();
    const service = await findActiveService(db, id);
    if (!service) {
      return notFound(reply, "Service not found");
    }
    if (service.user_id === user.id) {
      return badRequest(reply, "Cannot express interest in your own service");
    }
    await db("services").where({ id }).increment("interest_count", 1);
    await createNotification(db, {
      userId: service.user_id,
      type: "service_interest",
      title: `New interest in "${service.title}"`,
      message: body.message
        ? `${user.display_name} is interested: ${body.message}`
        : `${user.display_name} is interested in your service`,
      data: {
        serviceId: service.id,
        serviceTitle: service.title,
        interestedUserId: user.id,
        interestedUserName: user.display_name
      }
    });
    return reply.send({ message: "Interest sent", interestCount: Number(service.interest_count) + 1 });
  });

  app.put("/v1/admin/services/:id", async (request, reply) => {
    const admin = await requireAdmin(request, reply);
    if (!admin) return;
    const { id } = idParamsSchema.parse(request.params);
    const body = adminUpdateSchema.parse(request.body ?? {});
    const db = await getDb();
    const service = await db<ServiceRow>("services").where({ id }).first();
    if (!service) {
      return notFound(reply, "Service not found");
    }
    const changes: Record<string, unknown> = { updated_at: nowIso() };
    if (body.isActive !== undefined) changes.is_active = body.isActive;
    if (body.adminNotes !== undefined) changes.admin_notes = body.adminNotes;
    if (body.serviceType !== undefined) changes.service_type = body.serviceType;
    await db("services").where({ id }).update(changes);
    log.info("admin.service.updated", { serviceId: id, adminId: admin.id });
    const updated = await db<ServiceRow>("services").where({ id }).first();
    if (!updated) {
      return notFound(reply, "Service not found");
    }
    const [view] = await withOwners(db, [updated]);
    return reply.send({ ...view, adminNotes: updated.admin_notes });
  });
};
