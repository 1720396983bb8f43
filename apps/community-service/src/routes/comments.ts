import { FastifyInstance, FastifyReply } from "fastify";
import { randomUUID } from "node:crypto";
import { z } from "zod";
import { DbClient, toIso, toIsoOrNull } from "@community/db";
import { getDb } from "../db.js";
import { log } from "../log.js";
import { metrics } from "../metrics.js";
import { requireUser } from "../auth.js";
import { enforceContentLimit } from "../contentLimits.js";
import { badRequest, forbidden, idParamsSchema, notFound, nowIso, paginationSchema } from "../http.js";
import { assessContent, recordModerationFlag, rejectFlagged } from "../moderation.js";
import { CommentRow } from "../rows.js";
import { isAdmin, loadPublicUsers, PublicUser } from "../users.js";

const contentSchema = z.string().trim().min(1).max(1000);

const targetFields = {
  eventId: z.string().min(1).optional(),
  serviceId: z.string().min(1).optional()
};

const createSchema = z.object({ content: contentSchema, parentId: z.string().min(1).optional(), ...targetFields });
const updateSchema = z.object({ content: contentSchema });
const listQuerySchema = paginationSchema.extend({ parentId: z.string().min(1).optional(), ...targetFields });

type Target = { column: "event_id"; id: string } | { column: "service_id"; id: string };

/** Sends 400 and resolves to null unless exactly one target is named. */
const resolveTarget = async (
  reply: FastifyReply,
  input: { eventId?: string; serviceId?: string }
): Promise<Target | null> => {
  if (input.eventId && !input.serviceId) {
    return { column: "event_id", id: input.eventId };
  }
  if (input.serviceId && !input.eventId) {
    return { column: "service_id", id: input.serviceId };
  }
  await badRequest(reply, "Must specify exactly one of: eventId, serviceId");
  return null;
};

const toCommentView = (row: CommentRow, author: PublicUser | null) => ({
  id: row.id,
  content: row.content,
  authorId: row.author_id,
  eventId: row.event_id,
  serviceId: row.service_id,
  parentId: row.parent_id,
  createdAt: toIso(row.created_at),
  updatedAt: toIsoOrNull(row.updated_at),
  author
});

const withReplies = async (db: DbClient, rows: CommentRow[]) => {
  const replies = rows.length
    ? await db<CommentRow>("comments")
        .whereIn(
          "parent_id",
          rows.map((row) => row.id)
        )
        .where({ is_active: true })
        .orderBy("created_at", "asc")
    : [];
  const authors = await loadPublicUsers(db, [...rows, ...replies].map((row) => row.author_id));
  const view = (row: CommentRow) => toCommentView(row, authors.get(row.author_id) ?? null);
  return rows.map((row) => ({
    ...view(row),
    replies: replies.filter((reply) => reply.parent_id === row.id).map(view)
  }));
};

const findActiveComment = (db: DbClient, id: string) =>
  db<CommentRow>("comments").where({ id, is_active: true }).first();

export const registerCommentRoutes = (app: FastifyInstance) => {
  app.get("/v1/comments", async (request, reply) => {
    const query = listQuerySchema.parse(request.query ?? {});
    const target = await resolveTarget(reply, query);
    if (!target) return;
    const db = await getDb();
    const builder = db<CommentRow>("comments").where(target.column, target.id).where({ is_active: true });
    if (query.parentId) {
      builder.where({ parent_id: query.parentId });
    } else {
      builder.whereNull("parent_id");
    }
    const rows = await builder.orderBy("created_at", "desc").offset(query.skip).limit(query.limit);
    return reply.send(await withReplies(db, rows));
  });

  app.get("/v1/comments/my", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const query = paginationSchema.parse(request.query ?? {});
    const db = await getDb();
    const rows = await db<CommentRow>("comments")
      .where({ author_id: user.id, is_active: true })
      .orderBy("created_at", "desc")
      .offset(query.skip)
      .limit(query.limit);
    const authors = await loadPublicUsers(db, [user.id]);
    return reply.send(rows.map((row) => toCommentView(row, authors.get(user.id) ?? null)));
  });

  app.get("/v1/comments/:id", async (request, reply) => {
    const { id } = idParamsSchema.parse(request.params);
    const db = await getDb();
    const comment = await findActiveComment(db, id);
    if (!comment) {
      return notFound(reply, "Comment not found");
    }
    const [view] = await withReplies(db, [comment]);
    return reply.send(view);
  });

  app.post("/v1/comments", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const body = createSchema.parse(request.body ?? {});
    const target = await resolveTarget(reply, body);
    if (!target) return;
    const db = await getDb();
    const targetTable = target.column === "event_id" ? "events" : "services";
    if (!(await db(targetTable).where({ id: target.id, is_active: true }).first())) {
      return notFound(reply, target.column === "event_id" ? "Event not found" : "Service not found");
    }
    if (body.parentId) {
      const parent = await findActiveComment(db, body.parentId);
      if (!parent) {
        return notFound(reply, "Parent comment not found");
      }
      if (parent[target.column] !== target.id) {
        return badRequest(reply, "Parent comment does not belong to the same target");
      }
      if (parent.parent_id) {
        return badRequest(reply, "Replies can only be one level deep");
      }
    }
    if (!(await enforceContentLimit(reply, user, "comment"))) return;
    const moderation = assessContent(body.content);
    if (await rejectFlagged(reply, "comment", moderation)) return;

    const comment: CommentRow = {
      id: randomUUID(),
      content: body.content,
      author_id: user.id,
      event_id: target.column === "event_id" ? target.id : null,
      service_id: target.column === "service_id" ? target.id : null,
      parent_id: body.parentId ?? null,
      is_active: true,
      created_at: nowIso(),
      updated_at: null
    };
    await db("comments").insert(comment);
    await recordModerationFlag(db, { contentType: "comment", contentId: comment.id, userId: user.id, result: moderation });
    metrics.incCounter("content_action_total", { type: "comment", decision: "created" });
    log.info("comment.created", { commentId: comment.id, userId: user.id });
    const authors = await loadPublicUsers(db, [user.id]);
    return reply.code(201).send(toCommentView(comment, authors.get(user.id) ?? null));
  });

  app.put("/v1/comments/:id", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const { id } = idParamsSchema.parse(request.params);
    const body = updateSchema.parse(request.body ?? {});
    const db = await getDb();
    const comment = await findActiveComment(db, id);
    if (!comment) {
      return notFound(reply, "Comment not found");
    }
    if (comment.author_id !== user.id && !isAdmin(user)) {
      return forbidden(reply);
    }
    const moderation = assessContent(body.content);
    if (await rejectFlagged(reply, "comment", moderation)) return;
    const updatedAt = nowIso();
    await db("comments").where({ id }).update({ content: body.content, updated_at: updatedAt });
    await recordModerationFlag(db, { contentType: "comment", contentId: id, userId: user.id, result: moderation });
    const authors = await loadPublicUsers(db, [comment.author_id]);
    return reply.send(
      toCommentView({ ...comment, content: body.content, updated_at: updatedAt }, authors.get(comment.author_id) ?? null)
    );
  });

  app.delete("/v1/comments/:id", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const { id } = idParamsSchema.parse(request.params);
    const db = await getDb();
    const comment = await findActiveComment(db, id);
    if (!comment) {
      return notFound(reply, "Comment not found");
    }
    if (comment.author_id !== user.id && !isAdmin(user)) {
      return forbidden(reply);
    }
    await db("comments").where({ id }).update({ is_active: false, updated_at: nowIso() });
    return reply.send({ message: "Comment deleted" });
  });
};
