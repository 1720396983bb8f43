import { FastifyInstance } from "fastify";
import { randomUUID } from "node:crypto";
import { z } from "zod";
import { DbClient, toBool, toIso, toIsoOrNull } from "@community/db";
import { config } from "../config.js";
import { getDb } from "../db.js";
import { log } from "../log.js";
import { metrics } from "../metrics.js";
import { optionalUser, requireAdmin, requireUser } from "../auth.js";
import { enforceContentLimit } from "../contentLimits.js";
import {
  attendanceStats,
  capacityInfo,
  completeEvent,
  isEligibleForCompletion,
  POLITICAL_CATEGORY_MARKER,
  registrationClosesAt
} from "../eventRules.js";
import { badRequest, forbidden, idParamsSchema, notFound, nowIso, paginationSchema, queryFlag } from "../http.js";
import { enqueueMail, eventChangeMail } from "../mail.js";
import { assessContent, recordModerationFlag, rejectFlagged } from "../moderation.js";
import { createNotifications } from "../notifications.js";
import { countBy, countRows } from "../queries.js";
import { EventCategoryRow, EventRow, ParticipationRow, ParticipationStatus, UserRow } from "../rows.js";
import { isAdmin, likeClause, likePattern, loadPublicUsers } from "../users.js";
import { toCategoryView } from "./eventCategories.js";

const isoDate = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value).toISOString());

const eventFields = {
  title: z.string().trim().min(1).max(100),
  description: z.string().trim().min(1).max(2000),
  startDatetime: isoDate,
  endDatetime: isoDate.nullable().optional(),
  location: z.string().trim().max(300).nullable().optional(),
  maxParticipants: z.number().int().positive().nullable().optional(),
  categoryId: z.string().min(1).nullable().optional()
};

const createSchema = z.object({ ...eventFields, isCivic: z.boolean().optional() });
const updateSchema = z.object(eventFields).partial();

const listQuerySchema = paginationSchema.extend({
  categoryId: z.string().min(1).optional(),
  upcomingOnly: queryFlag.default("true"),
  politicalOnly: queryFlag.optional(),
  excludePolitical: queryFlag.optional()
});

const attendanceSchema = z.object({ userIds: z.array(z.string().min(1)).min(1).max(500) });

const toEventView = (
  row: EventRow,
  extras: { participantCount: number; category: EventCategoryRow | null }
) => ({
  id: row.id,
  title: row.title,
  description: row.description,
  startDatetime: toIso(row.start_datetime),
  endDatetime: toIsoOrNull(row.end_datetime),
  location: row.location,
  maxParticipants: row.max_participants,
  categoryId: row.category_id,
  creatorId: row.creator_id,
  isActive: toBool(row.is_active),
  createdAt: toIso(row.created_at),
  updatedAt: toIso(row.updated_at),
  participantCount: extras.participantCount,
  category: extras.category ? toCategoryView(extras.category) : null
});

const toParticipationView = (row: ParticipationRow) => ({
  id: row.id,
  eventId: row.event_id,
  userId: row.user_id,
  status: row.status,
  registeredAt: toIso(row.registered_at),
  updatedAt: toIso(row.updated_at)
});

const politicalCategories = async (db: DbClient) =>
  db<EventCategoryRow>("event_categories")
    .whereRaw(likeClause("name"), [likePattern(POLITICAL_CATEGORY_MARKER)])
    .orderBy("name", "asc");

const registeredCount = (db: DbClient, eventId: string) =>
  countRows(db("event_participations").where({ event_id: eventId, status: "registered" }));

const summarize = async (db: DbClient, rows: EventRow[]) => {
  if (!rows.length) {
    return [];
  }
  const ids = rows.map((row) => row.id);
  const counts = await countBy(
    db("event_participations").whereIn("event_id", ids).where({ status: "registered" }),
    "event_id"
  );
  const categoryIds = [...new Set(rows.flatMap((row) => (row.category_id ? [row.category_id] : [])))];
  const categories = new Map<string, EventCategoryRow>();
  if (categoryIds.length) {
    for (const category of await db<EventCategoryRow>("event_categories").whereIn("id", categoryIds)) {
      categories.set(category.id, category);
    }
  }
  return rows.map((row) =>
    toEventView(row, {
      participantCount: counts.get(row.id) ?? 0,
      category: row.category_id ? (categories.get(row.category_id) ?? null) : null
    })
  );
};

const findActiveEvent = (db: DbClient, id: string) =>
  db<EventRow>("events").where({ id, is_active: true }).first();

/** In-app notice to every registered participant except the actor, plus email where they opted in. */
const notifyParticipants = async (
  db: DbClient,
  event: EventRow,
  actorId: string,
  kind: "event_update" | "event_cancelled",
  summary: string
) => {
  const participations = await db<ParticipationRow>("event_participations")
    .where({ event_id: event.id, status: "registered" })
    .whereNot({ user_id: actorId });
  if (!participations.length) {
    return 0;
  }
  const users = await db<UserRow>("users")
    .whereIn(
      "id",
      participations.map((row) => row.user_id)
    )
    .where({ is_active: true });
  const cancelled = kind === "event_cancelled";
  await createNotifications(
    db,
    users.map((user) => ({
      userId: user.id,
      type: kind,
      title: cancelled ? `Event cancelled: ${event.title}` : `Event updated: ${event.title}`,
      message: summary,
      data: { eventId: event.id, eventTitle: event.title }
    }))
  );
  for (const user of users) {
    if (toBool(user.email_notifications_events)) {
      await enqueueMail(
        db,
        eventChangeMail({
          to: user.email,
          displayName: user.display_name,
          eventTitle: event.title,
          cancelled,
          summary
        })
      );
    }
  }
  return users.length;
};

const describeChange = (before: EventRow, after: EventRow) => {
  const parts: string[] = [];
  if (toIso(before.start_datetime) !== toIso(after.start_datetime)) {
    parts.push(`now starts at ${toIso(after.start_datetime)}`);
  }
  if ((before.location ?? "") !== (after.location ?? "")) {
    parts.push(`now takes place at ${after.location ?? "a location to be announced"}`);
  }
  return parts.length ? `"${after.title}" ${parts.join(" and ")}.` : null;
};

export const registerEventRoutes = (app: FastifyInstance) => {
  const listEvents = async (query: z.infer<typeof listQuerySchema>) => {
    const db = await getDb();
    const builder = db<EventRow>("events").where({ is_active: true });
    if (query.categoryId) {
      builder.where({ category_id: query.categoryId });
    }
    if (query.upcomingOnly) {
      builder.where("start_datetime", ">=", nowIso());
    }
    if (query.politicalOnly || query.excludePolitical) {
      const politicalIds = (await politicalCategories(db)).map((category) => category.id);
      if (query.politicalOnly) {
        if (!politicalIds.length) {
          return [];
        }
        builder.whereIn("category_id", politicalIds);
      } else if (politicalIds.length) {
        builder.where((inner) => {
          inner.whereNull("category_id").orWhereNotIn("category_id", politicalIds);
        });
      }
    }
    const rows = await builder.orderBy("start_datetime", "asc").offset(query.skip).limit(query.limit);
    return summarize(db, rows);
  };

  app.get("/v1/events", async (request, reply) => {
    const query = listQuerySchema.parse(request.query ?? {});
    return reply.send(await listEvents(query));
  });

  app.get("/v1/events/civic", async (request, reply) => {
    const query = listQuerySchema.parse(request.query ?? {});
    return reply.send(await listEvents({ ...query, politicalOnly: true, excludePolitical: undefined }));
  });

  app.get("/v1/events/regular", async (request, reply) => {
    const query = listQuerySchema.parse(request.query ?? {});
    return reply.send(await listEvents({ ...query, politicalOnly: undefined, excludePolitical: true }));
  });

  app.get("/v1/events/my/created", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const query = paginationSchema.parse(request.query ?? {});
    const db = await getDb();
    const rows = await db<EventRow>("events")
      .where({ creator_id: user.id, is_active: true })
      .orderBy("start_datetime", "desc")
      .offset(query.skip)
      .limit(query.limit);
    return reply.send(await summarize(db, rows));
  });

  app.get("/v1/events/my/joined", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const query = paginationSchema.parse(request.query ?? {});
    const db = await getDb();
    const participations = await db<ParticipationRow>("event_participations")
      .where({ user_id: user.id })
      .whereIn("status", ["registered", "attended"]);
    const statusByEvent = new Map(participations.map((row) => [row.event_id, row.status]));
    if (!statusByEvent.size) {
      return reply.send([]);
    }
    const rows = await db<EventRow>("events")
      .whereIn("id", [...statusByEvent.keys()])
      .where({ is_active: true })
      .orderBy("start_datetime", "asc")
      .offset(query.skip)
      .limit(query.limit);
    const summaries = await summarize(db, rows);
    return reply.send(
      summaries.map((summary) => ({ ...summary, myStatus: statusByEvent.get(summary.id) ?? null }))
    );
  });

  app.get("/v1/events/my/stats", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const db = await getDb();
    const counts = await countBy(db("event_participations").where({ user_id: user.id }), "status");
    return reply.send(
      attendanceStats({
        registered: counts.get("registered") ?? 0,
        attended: counts.get("attended") ?? 0,
        cancelled: counts.get("cancelled") ?? 0
      })
    );
  });

  app.get("/v1/events/:id", async (request, reply) => {
    const { id } = idParamsSchema.parse(request.params);
    const db = await getDb();
    const event = await findActiveEvent(db, id);
    if (!event) {
      return notFound(reply, "Event not found");
    }
    const [summary] = await summarize(db, [event]);
    const creators = await loadPublicUsers(db, [event.creator_id]);
    const capacity = capacityInfo(event.max_participants, summary?.participantCount ?? 0);
    const viewer = await optionalUser(request);
    let myStatus: ParticipationStatus | null = null;
    if (viewer) {
      const participation = await db<ParticipationRow>("event_participations")
        .where({ event_id: id, user_id: viewer.id })
        .first();
      myStatus = participation?.status ?? null;
    }
    return reply.send({
      ...summary,
      creator: creators.get(event.creator_id) ?? null,
      isFull: capacity.isFull,
      capacity: {
        maxParticipants: capacity.maxParticipants,
        registered: capacity.registered,
        availableSpots: capacity.availableSpots,
        utilizationPercent: capacity.utilizationPercent
      },
      myStatus
    });
  });

  app.post("/v1/events", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const body = createSchema.parse(request.body ?? {});
    if (!(await enforceContentLimit(reply, user, "event_create"))) return;
    if (Date.parse(body.startDatetime) <= Date.now()) {
      return badRequest(reply, "Event start time must be in the future");
    }
    if (body.endDatetime && Date.parse(body.endDatetime) <= Date.parse(body.startDatetime)) {
      return badRequest(reply, "End time must be after start time");
    }
    const db = await getDb();
    let categoryId = body.categoryId ?? null;
    if (body.isCivic) {
      const [civic] = await politicalCategories(db);
      if (!civic) {
        return badRequest(reply, "No civic category configured");
      }
      categoryId = civic.id;
    } else if (categoryId && !(await db("event_categories").where({ id: categoryId }).first())) {
      return badRequest(reply, "Category not found");
    }
    const moderation = assessContent(body.title, body.description, body.location);
    if (await rejectFlagged(reply, "event", moderation)) return;

    const id = randomUUID();
    const now = nowIso();
    await db("events").insert({
      id,
      title: body.title,
      description: body.description,
      start_datetime: body.startDatetime,
      end_datetime: body.endDatetime ?? null,
      location: body.location ?? null,
      max_participants: body.maxParticipants ?? null,
      category_id: categoryId,
      creator_id: user.id,
      is_active: true,
      created_at: now,
      updated_at: now
    });
    await recordModerationFlag(db, { contentType: "event", contentId: id, userId: user.id, result: moderation });
    metrics.incCounter("content_action_total", { type: "event", decision: "created" });
    log.info("event.created", { eventId: id, userId: user.id });
    const created = await findActiveEvent(db, id);
    if (!created) {
      throw new Error("event_insert_failed");
    }
    const [summary] = await summarize(db, [created]);
    return reply.code(201).send(summary);
  });

  app.put("/v1/events/:id", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const { id } = idParamsSchema.parse(request.params);
    const body = updateSchema.parse(request.body ?? {});
    const db = await getDb();
    const event = await findActiveEvent(db, id);
    if (!event) {
      return notFound(reply, "Event not found");
    }
    if (event.creator_id !== user.id && !isAdmin(user)) {
      return forbidden(reply);
    }
    if (body.startDatetime && Date.parse(body.startDatetime) <= Date.now()) {
      return badRequest(reply, "Event start time must be in the future");
    }
    const start = body.startDatetime ?? toIso(event.start_datetime);
    const end = body.endDatetime === undefined ? toIsoOrNull(event.end_datetime) : body.endDatetime;
    if (end && Date.parse(end) <= Date.parse(start)) {
      return badRequest(reply, "End time must be after start time");
    }
    if (body.categoryId && !(await db("event_categories").where({ id: body.categoryId }).first())) {
      return badRequest(reply, "Category not found");
    }
    const moderation = assessContent(body.title, body.description, body.location);
    if (await rejectFlagged(reply, "event", moderation)) return;

    const changes: Partial<EventRow> = { updated_at: nowIso() };
    if (body.title !== undefined) changes.title = body.title;
    if (body.description !== undefined) changes.description = body.description;
    if (body.startDatetime !== undefined) changes.start_datetime = body.startDatetime;
    if (body.endDatetime !== undefined) changes.end_datetime = body.endDatetime;
    if (body.location !== undefined) changes.location = body.location;
    if (body.maxParticipants !== undefined) changes.max_participants = body.maxParticipants;
    if (body.categoryId !== undefined) changes.category_id = body.categoryId;
    await db("events").where({ id }).update(changes);
    await recordModerationFlag(db, { contentType: "event", contentId: id, userId: user.id, result: moderation });

    const updated = await findActiveEvent(db, id);
    if (!updated) {
      return notFound(reply, "Event not found");
    }
    const change = describeChange(event, updated);
    if (change) {
      await notifyParticipants(db, updated, user.id, "event_update", change);
    }
    const [summary] = await summarize(db, [updated]);
    return reply.send(summary);
  });

  app.delete("/v1/events/:id", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const { id } = idParamsSchema.parse(request.params);
    const db = await getDb();
    const event = await findActiveEvent(db, id);
    if (!event) {
      return notFound(reply, "Event not found");
    }
    if (event.creator_id !== user.id && !isAdmin(user)) {
      return forbidden(reply);
    }
    await db("events").where({ id }).update({ is_active: false, updated_at: nowIso() });
    const notified = await notifyParticipants(
      db,
      event,
      user.id,
      "event_cancelled",
      `"${event.title}" has been cancelled by the organizer.`
    );
    log.info("event.cancelled", { eventId: id, userId: user.id, notified });
    return reply.send({ message: "Event deleted" });
  });

  app.post("/v1/events/:id/join", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const { id } = idParamsSchema.parse(request.params);
    const db = await getDb();
    const event = await findActiveEvent(db, id);
    if (!event) {
      return notFound(reply, "Event not found");
    }
    const now = Date.now();
    if (Date.parse(toIso(event.start_datetime)) <= now) {
      return badRequest(reply, "Cannot join past events");
    }
    const existing = await db<ParticipationRow>("event_participations")
      .where({ event_id: id, user_id: user.id })
      .first();
    if (existing && existing.status !== "cancelled") {
      return badRequest(reply, "Already registered for this event");
    }
    if (event.max_participants !== null && (await registeredCount(db, id)) >= event.max_participants) {
      return badRequest(reply, "Event is full");
    }
    const deadlineHours = config.EVENT_REGISTRATION_DEADLINE_HOURS;
    if (now >= registrationClosesAt(event, deadlineHours)) {
      return badRequest(reply, `Registration deadline passed (${deadlineHours}h before event)`);
    }
    const timestamp = nowIso();
    let participationId: string;
    if (existing) {
      participationId = existing.id;
      await db("event_participations")
        .where({ id: existing.id })
        .update({ status: "registered", registered_at: timestamp, updated_at: timestamp });
    } else {
      participationId = randomUUID();
      await db("event_participations").insert({
        id: participationId,
        event_id: id,
        user_id: user.id,
        status: "registered",
        registered_at: timestamp,
        updated_at: timestamp
      });
    }
    const participation = await db<ParticipationRow>("event_participations")
      .where({ id: participationId })
      .first();
    if (!participation) {
      throw new Error("participation_write_failed");
    }
    return reply.code(201).send(toParticipationView(participation));
  });

  app.delete("/v1/events/:id/join", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const { id } = idParamsSchema.parse(request.params);
    const db = await getDb();
    const participation = await db<ParticipationRow>("event_participations")
      .where({ event_id: id, user_id: user.id, status: "registered" })
      .first();
    if (!participation) {
      return badRequest(reply, "Not participating in this event");
    }
    await db("event_participations")
      .where({ id: participation.id })
      .update({ status: "cancelled", updated_at: nowIso() });
    return reply.send({ message: "Left event" });
  });

  app.get("/v1/events/:id/participants", async (request, reply) => {
    const { id } = idParamsSchema.parse(request.params);
    const db = await getDb();
    const event = await findActiveEvent(db, id);
    if (!event) {
      return notFound(reply, "Event not found");
    }
    const participations = await db<ParticipationRow>("event_participations")
      .where({ event_id: id })
      .whereIn("status", ["registered", "attended"])
      .orderBy("registered_at", "asc");
    const users = await loadPublicUsers(
      db,
      participations.map((row) => row.user_id)
    );
    return reply.send(
      participations.map((row) => ({
        userId: row.user_id,
        status: row.status,
        registeredAt: toIso(row.registered_at),
        user: users.get(row.user_id) ?? null
      }))
    );
  });

  app.post("/v1/events/:id/attendance", async (request, reply) => {
    const admin = await requireAdmin(request, reply);
    if (!admin) return;
    const { id } = idParamsSchema.parse(request.params);
    const body = attendanceSchema.parse(request.body ?? {});
    const db = await getDb();
    if (!(await db("events").where({ id }).first())) {
      return notFound(reply, "Event not found");
    }
    const marked = await db("event_participations")
      .where({ event_id: id, status: "registered" })
      .whereIn("user_id", body.userIds)
      .update({ status: "attended", updated_at: nowIso() });
    log.info("event.attendance.marked", { eventId: id, marked, adminId: admin.id });
    return reply.send({ marked });
  });

  app.post("/v1/events/:id/complete", async (request, reply) => {
    const admin = await requireAdmin(request, reply);
    if (!admin) return;
    const { id } = idParamsSchema.parse(request.params);
    const db = await getDb();
    const event = await db<EventRow>("events").where({ id }).first();
    if (!event) {
      return notFound(reply, "Event not found");
    }
    if (!isEligibleForCompletion(event, config.EVENT_AUTO_ATTENDANCE_DELAY_HOURS)) {
      return badRequest(reply, "Event not yet eligible for completion");
    }
    const marked = await completeEvent(db, id);
    log.info("event.completed", { eventId: id, marked, adminId: admin.id });
    return reply.send({ eventId: id, marked });
  });
};
