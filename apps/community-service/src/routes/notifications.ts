import { FastifyInstance } from "fastify";
import { z } from "zod";
import { getDb } from "../db.js";
import { requireUser } from "../auth.js";
import { forbidden, idParamsSchema, notFound, paginationSchema, queryFlag } from "../http.js";
import { NOTIFICATION_TYPES, toNotificationView } from "../notifications.js";
import { countBy } from "../queries.js";
import { NotificationRow } from "../rows.js";

const typeSchema = z.enum(NOTIFICATION_TYPES);

const listQuerySchema = paginationSchema.extend({
  unreadOnly: queryFlag.optional(),
  type: typeSchema.optional()
});

const readAllQuerySchema = z.object({ type: typeSchema.optional() });
const updateSchema = z.object({ isRead: z.boolean() });

const LATEST_COUNT = 5;

export const registerNotificationRoutes = (app: FastifyInstance) => {
  app.get("/v1/notifications", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const query = listQuerySchema.parse(request.query ?? {});
    const db = await getDb();
    const builder = db<NotificationRow>("notifications").where({ user_id: user.id });
    if (query.unreadOnly) builder.where({ is_read: false });
    if (query.type) builder.where({ type: query.type });
    const rows = await builder.orderBy("created_at", "desc").offset(query.skip).limit(query.limit);
    return reply.send(rows.map(toNotificationView));
  });

  app.get("/v1/notifications/stats", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const db = await getDb();
    const unreadByType = Object.fromEntries(
      await countBy(db("notifications").where({ user_id: user.id, is_read: false }), "type")
    );
    const totalUnread = Object.values(unreadByType).reduce((sum, count) => sum + count, 0);
    const latest = await db<NotificationRow>("notifications")
      .where({ user_id: user.id })
      .orderBy([
        { column: "is_read", order: "asc" },
        { column: "created_at", order: "desc" }
      ])
      .limit(LATEST_COUNT);
    return reply.send({ totalUnread, unreadByType, latest: latest.map(toNotificationView) });
  });

  app.post("/v1/notifications/read-all", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const query = readAllQuerySchema.parse(request.query ?? {});
    const db = await getDb();
    const builder = db("notifications").where({ user_id: user.id, is_read: false });
    if (query.type) builder.where({ type: query.type });
    const updated = await builder.update({ is_read: true });
    return reply.send({ updated });
  });

  app.delete("/v1/notifications/read", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const db = await getDb();
    const deleted = await db("notifications").where({ user_id: user.id, is_read: true }).del();
    return reply.send({ deleted });
  });

  app.put("/v1/notifications/:id", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const { id } = idParamsSchema.parse(request.params);
    const body = updateSchema.parse(request.body ?? {});
    const db = await getDb();
    const row = await db<NotificationRow>("notifications").where({ id }).first();
    if (!row) {
      return notFound(reply, "Notification not found");
    }
    if (row.user_id !== user.id) {
      return forbidden(reply);
    }
    await db("notifications").where({ id }).update({ is_read: body.isRead });
    return reply.send(toNotificationView({ ...row, is_read: body.isRead }));
  });

  app.delete("/v1/notifications/:id", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const { id } = idParamsSchema.parse(request.params);
    const db = await getDb();
    const row = await db<NotificationRow>("notifications").where({ id }).first();
    if (!row) {
      return notFound(reply, "Notification not found");
    }
    if (row.user_id !== user.id) {
      return forbidden(reply);
    }
    await db("notifications").where({ id }).del();
    return reply.send({ message: "Notification deleted" });
  });
};
