import { FastifyInstance } from "fastify";
import { z } from "zod";
import { getDb } from "../db.js";
import { optionalUser, requireAdmin, requireUser } from "../auth.js";
import { badRequest, idParamsSchema, nowIso, notFound, paginationSchema, queryFlag } from "../http.js";
import { communityScore } from "../eventRules.js";
import { countRows } from "../queries.js";
import { UserRow } from "../rows.js";
import { findActiveUser, likeClause, likePattern, toPrivateUser, toPublicUser } from "../users.js";
import { displayNameTaken } from "./auth.js";

const listQuerySchema = paginationSchema.extend({
  search: z.string().trim().min(1).max(100).optional(),
  messagesEnabledOnly: queryFlag.optional()
});

const adminListQuerySchema = paginationSchema.extend({
  search: z.string().trim().min(1).max(100).optional(),
  isActive: queryFlag.optional(),
  isAdmin: queryFlag.optional(),
  emailVerified: queryFlag.optional()
});

const optionalText = (max: number) => z.string().trim().max(max).nullable().optional();

const updateSchema = z
  .object({
    displayName: z.string().trim().min(2).max(20).optional(),
    firstName: optionalText(50),
    lastName: optionalText(50),
    bio: optionalText(500),
    location: optionalText(100),
    profileImageUrl: z.string().url().max(500).nullable().optional(),
    emailPrivate: z.boolean().optional(),
    firstNamePrivate: z.boolean().optional(),
    lastNamePrivate: z.boolean().optional(),
    bioPrivate: z.boolean().optional(),
    locationPrivate: z.boolean().optional(),
    createdAtPrivate: z.boolean().optional(),
    messagesEnabled: z.boolean().optional(),
    notifyForumReply: z.boolean().optional(),
    notifyForumMention: z.boolean().optional(),
    notifyForumQuote: z.boolean().optional(),
    emailNotificationsEvents: z.boolean().optional(),
    emailNotificationsMessages: z.boolean().optional(),
    emailNotificationsNewsletter: z.boolean().optional()
  })
  .strict();

const COLUMN_BY_FIELD: Record<keyof z.infer<typeof updateSchema>, keyof UserRow> = {
  displayName: "display_name",
  firstName: "first_name",
  lastName: "last_name",
  bio: "bio",
  location: "location",
  profileImageUrl: "profile_image_url",
  emailPrivate: "email_private",
  firstNamePrivate: "first_name_private",
  lastNamePrivate: "last_name_private",
  bioPrivate: "bio_private",
  locationPrivate: "location_private",
  createdAtPrivate: "created_at_private",
  messagesEnabled: "messages_enabled",
  notifyForumReply: "notify_forum_reply",
  notifyForumMention: "notify_forum_mention",
  notifyForumQuote: "notify_forum_quote",
  emailNotificationsEvents: "email_notifications_events",
  emailNotificationsMessages: "email_notifications_messages",
  emailNotificationsNewsletter: "email_notifications_newsletter"
};

const columnByField = new Map<string, keyof UserRow>(Object.entries(COLUMN_BY_FIELD));

export const registerUserRoutes = (app: FastifyInstance) => {
  app.get("/v1/users", async (request, reply) => {
    const query = listQuerySchema.parse(request.query ?? {});
    const db = await getDb();
    const builder = db<UserRow>("users").where({ is_active: true });
    if (query.search) {
      const pattern = likePattern(query.search);
      builder.where((inner) => {
        inner
          .whereRaw(likeClause("display_name"), [pattern])
          .orWhereRaw(likeClause("first_name"), [pattern])
          .orWhereRaw(likeClause("last_name"), [pattern]);
      });
    }
    if (query.messagesEnabledOnly) {
      builder.where({ messages_enabled: true });
    }
    const rows = await builder.orderBy("display_name", "asc").offset(query.skip).limit(query.limit);
    return reply.send(rows.map(toPublicUser));
  });

  app.get("/v1/users/admin-list", async (request, reply) => {
    const admin = await requireAdmin(request, reply);
    if (!admin) return;
    const query = adminListQuerySchema.parse(request.query ?? {});
    const db = await getDb();
    const builder = db<UserRow>("users");
    if (query.search) {
      const pattern = likePattern(query.search);
      builder.where((inner) => {
        inner
          .whereRaw(likeClause("display_name"), [pattern])
          .orWhereRaw(likeClause("email"), [pattern])
          .orWhereRaw(likeClause("first_name"), [pattern])
          .orWhereRaw(likeClause("last_name"), [pattern]);
      });
    }
    if (query.isActive !== undefined) builder.where({ is_active: query.isActive });
    if (query.isAdmin !== undefined) builder.where({ is_admin: query.isAdmin });
    if (query.emailVerified !== undefined) builder.where({ email_verified: query.emailVerified });
    const rows = await builder.orderBy("created_at", "desc").offset(query.skip).limit(query.limit);
    return reply.send(rows.map(toPrivateUser));
  });

  app.get("/v1/users/me", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    return reply.send(toPrivateUser(user));
  });

  app.put("/v1/users/me", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const body = updateSchema.parse(request.body ?? {});
    const db = await getDb();
    if (body.displayName && (await displayNameTaken(db, body.displayName, user.id))) {
      return badRequest(reply, "Display name already taken");
    }
    const changes: Record<string, unknown> = {};
    for (const [field, value] of Object.entries(body)) {
      const column = columnByField.get(field);
      if (column && value !== undefined) {
        changes[column] = value === "" ? null : value;
      }
    }
    if (Object.keys(changes).length) {
      await db("users").where({ id: user.id }).update({ ...changes, updated_at: nowIso() });
    }
    const updated = await findActiveUser(db, user.id);
    return reply.send(toPrivateUser(updated ?? user));
  });

  app.get("/v1/users/me/stats", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const db = await getDb();
    const eventsAttended = await countRows(
      db("event_participations").where({ user_id: user.id, status: "attended" })
    );
    const eventsOrganized = await countRows(db("events").where({ creator_id: user.id, is_active: true }));
    const servicesOffered = await countRows(
      db("services").where({ user_id: user.id, is_active: true, is_offering: true })
    );
    const servicesRequested = await countRows(
      db("services").where({ user_id: user.id, is_active: true, is_offering: false })
    );
    const threadsCreated = await countRows(db("forum_threads").where({ creator_id: user.id }));
    const postsCreated = await countRows(db("forum_posts").where({ author_id: user.id }));
    return reply.send({
      eventsAttended,
      eventsOrganized,
      servicesOffered,
      servicesRequested,
      threadsCreated,
      postsCreated,
      communityScore: communityScore({
        attended: eventsAttended,
        organized: eventsOrganized,
        services: servicesOffered + servicesRequested
      })
    });
  });

  app.get("/v1/users/:id", async (request, reply) => {
    const { id } = idParamsSchema.parse(request.params);
    const db = await getDb();
    const target = await findActiveUser(db, id);
    if (!target) {
      return notFound(reply, "User not found");
    }
    const viewer = await optionalUser(request);
    return reply.send(viewer?.id === target.id ? toPrivateUser(target) : toPublicUser(target));
  });
};
