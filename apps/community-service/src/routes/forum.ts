import { FastifyInstance } from "fastify";
import { randomUUID } from "node:crypto";
import { z } from "zod";
import { DbClient, toBool, toIso, toIsoOrNull } from "@community/db";
import { getDb } from "../db.js";
import { log } from "../log.js";
import { metrics } from "../metrics.js";
import { requireAdmin, requireUser } from "../auth.js";
import { enforceContentLimit } from "../contentLimits.js";
import { notifyForumPost } from "../forumNotifications.js";
import { badRequest, forbidden, idParamsSchema, notFound, nowIso, paginationSchema, queryFlag } from "../http.js";
import { assessContent, recordModerationFlag, rejectFlagged } from "../moderation.js";
import { countBy, countRows } from "../queries.js";
import { ForumCategoryRow, ForumPostRow, ForumThreadRow } from "../rows.js";
import { isAdmin, loadPublicUsers } from "../users.js";

const categoryFields = {
  name: z.string().trim().min(1).max(100),
  description: z.string().trim().max(500).nullable(),
  color: z.string().regex(/^#[0-9A-Fa-f]{6}$/),
  icon: z.string().trim().max(50).nullable(),
  displayOrder: z.number().int()
};

const createCategorySchema = z.object({
  ...categoryFields,
  description: categoryFields.description.optional(),
  color: categoryFields.color.default("#4F46E5"),
  icon: categoryFields.icon.optional(),
  displayOrder: categoryFields.displayOrder.default(0)
});

const updateCategorySchema = z
  .object(categoryFields)
  .partial()
  .extend({ isActive: z.boolean().optional() });

const contentSchema = z.string().trim().min(1).max(5000);

const createThreadSchema = z.object({
  title: z.string().trim().min(1).max(200),
  categoryId: z.string().min(1),
  content: contentSchema.optional()
});

const updateThreadSchema = z.object({
  title: z.string().trim().min(1).max(200).optional(),
  categoryId: z.string().min(1).optional(),
  isPinned: z.boolean().optional(),
  isLocked: z.boolean().optional()
});

const postSchema = z.object({ content: contentSchema });

const threadListQuerySchema = paginationSchema.extend({
  categoryId: z.string().min(1).optional(),
  pinnedFirst: queryFlag.default("true")
});

const toCategoryView = (row: ForumCategoryRow) => ({
  id: row.id,
  name: row.name,
  description: row.description,
  color: row.color,
  icon: row.icon,
  isActive: toBool(row.is_active),
  displayOrder: Number(row.display_order),
  createdAt: toIso(row.created_at),
  updatedAt: toIso(row.updated_at)
});

const toPostView = (row: ForumPostRow) => ({
  id: row.id,
  threadId: row.thread_id,
  authorId: row.author_id,
  content: row.content,
  createdAt: toIso(row.created_at),
  updatedAt: toIsoOrNull(row.updated_at)
});

const latestPostOf = async (db: DbClient, threadId: string) => {
  const row = await db<ForumPostRow>("forum_posts")
    .where({ thread_id: threadId })
    .orderBy("created_at", "desc")
    .first();
  return row ? { id: row.id, authorId: row.author_id, createdAt: toIso(row.created_at) } : null;
};

const describeThreads = async (db: DbClient, rows: ForumThreadRow[]) => {
  if (!rows.length) {
    return [];
  }
  const ids = rows.map((row) => row.id);
  const postCounts = await countBy(db("forum_posts").whereIn("thread_id", ids), "thread_id");
  const creators = await loadPublicUsers(
    db,
    rows.map((row) => row.creator_id)
  );
  const views = [];
  for (const row of rows) {
    views.push({
      id: row.id,
      title: row.title,
      categoryId: row.category_id,
      creatorId: row.creator_id,
      isPinned: toBool(row.is_pinned),
      isLocked: toBool(row.is_locked),
      createdAt: toIso(row.created_at),
      updatedAt: toIso(row.updated_at),
      postCount: postCounts.get(row.id) ?? 0,
      latestPost: await latestPostOf(db, row.id),
      creator: creators.get(row.creator_id) ?? null
    });
  }
  return views;
};

const describePosts = async (db: DbClient, rows: ForumPostRow[]) => {
  const authors = await loadPublicUsers(
    db,
    rows.map((row) => row.author_id)
  );
  return rows.map((row) => ({ ...toPostView(row), author: authors.get(row.author_id) ?? null }));
};

const findThread = (db: DbClient, id: string) => db<ForumThreadRow>("forum_threads").where({ id }).first();

const findActiveCategory = (db: DbClient, id: string) =>
  db<ForumCategoryRow>("forum_categories").where({ id, is_active: true }).first();

const categoryNameTaken = async (db: DbClient, name: string, exceptId?: string) => {
  const query = db<ForumCategoryRow>("forum_categories").whereRaw("lower(name) = ?", [name.toLowerCase()]);
  if (exceptId) query.whereNot({ id: exceptId });
  return Boolean(await query.first());
};

export const registerForumRoutes = (app: FastifyInstance) => {
  app.get("/v1/forum/categories", async (_request, reply) => {
    const db = await getDb();
    const rows = await db<ForumCategoryRow>("forum_categories")
      .where({ is_active: true })
      .orderBy([
        { column: "display_order", order: "asc" },
        { column: "name", order: "asc" }
      ]);
    const threadCounts = await countBy(db("forum_threads"), "category_id");
    const views = [];
    for (const row of rows) {
      const latest = await db<ForumThreadRow>("forum_threads")
        .where({ category_id: row.id })
        .orderBy("updated_at", "desc")
        .first();
      views.push({
        ...toCategoryView(row),
        threadCount: threadCounts.get(row.id) ?? 0,
        latestThread: latest ? { id: latest.id, title: latest.title, updatedAt: toIso(latest.updated_at) } : null
      });
    }
    return reply.send(views);
  });

  app.post("/v1/forum/categories", async (request, reply) => {
    const admin = await requireAdmin(request, reply);
    if (!admin) return;
    const body = createCategorySchema.parse(request.body ?? {});
    const db = await getDb();
    if (await categoryNameTaken(db, body.name)) {
      return badRequest(reply, "Category name already exists");
    }
    const id = randomUUID();
    const now = nowIso();
    await db("forum_categories").insert({
      id,
      name: body.name,
      description: body.description ?? null,
      color: body.color,
      icon: body.icon ?? null,
      is_active: true,
      display_order: body.displayOrder,
      created_at: now,
      updated_at: now
    });
    const row = await db<ForumCategoryRow>("forum_categories").where({ id }).first();
    if (!row) {
      throw new Error("forum_category_insert_failed");
    }
    return reply.code(201).send(toCategoryView(row));
  });

  app.put("/v1/forum/categories/:id", async (request, reply) => {
    const admin = await requireAdmin(request, reply);
    if (!admin) return;
    const { id } = idParamsSchema.parse(request.params);
    const body = updateCategorySchema.parse(request.body ?? {});
    const db = await getDb();
    const existing = await db<ForumCategoryRow>("forum_categories").where({ id }).first();
    if (!existing) {
      return notFound(reply, "Category not found");
    }
    if (body.name && (await categoryNameTaken(db, body.name, id))) {
      return badRequest(reply, "Category name already exists");
    }
    const changes: Partial<ForumCategoryRow> = { updated_at: nowIso() };
    if (body.name !== undefined) changes.name = body.name;
    if (body.description !== undefined) changes.description = body.description;
    if (body.color !== undefined) changes.color = body.color;
    if (body.icon !== undefined) changes.icon = body.icon;
    if (body.displayOrder !== undefined) changes.display_order = body.displayOrder;
    if (body.isActive !== undefined) changes.is_active = body.isActive;
    await db("forum_categories").where({ id }).update(changes);
    return reply.send(toCategoryView({ ...existing, ...changes }));
  });

  app.delete("/v1/forum/categories/:id", async (request, reply) => {
    const admin = await requireAdmin(request, reply);
    if (!admin) return;
    const { id } = idParamsSchema.parse(request.params);
    const db = await getDb();
    if (!(await db("forum_categories").where({ id }).first())) {
      return notFound(reply, "Category not found");
    }
    if ((await countRows(db("forum_threads").where({ category_id: id }))) > 0) {
      return badRequest(reply, "Cannot delete category with existing threads");
    }
    await db("forum_categories").where({ id }).del();
    return reply.send({ message: "Category deleted" });
  });

  app.get("/v1/forum/threads", async (request, reply) => {
    const query = threadListQuerySchema.parse(request.query ?? {});
    const db = await getDb();
    const builder = db<ForumThreadRow>("forum_threads");
    if (query.categoryId) {
      builder.where({ category_id: query.categoryId });
    }
    if (query.pinnedFirst) {
      builder.orderBy("is_pinned", "desc");
    }
    const rows = await builder.orderBy("updated_at", "desc").offset(query.skip).limit(query.limit);
    return reply.send(await describeThreads(db, rows));
  });

  app.get("/v1/forum/my/threads", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const query = paginationSchema.parse(request.query ?? {});
    const db = await getDb();
    const rows = await db<ForumThreadRow>("forum_threads")
      .where({ creator_id: user.id })
      .orderBy("updated_at", "desc")
      .offset(query.skip)
      .limit(query.limit);
    return reply.send(await describeThreads(db, rows));
  });

  app.get("/v1/forum/my/posts", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const query = paginationSchema.parse(request.query ?? {});
    const db = await getDb();
    const rows = await db<ForumPostRow>("forum_posts")
      .where({ author_id: user.id })
      .orderBy("created_at", "desc")
      .offset(query.skip)
      .limit(query.limit);
    return reply.send(rows.map(toPostView));
  });

  app.get("/v1/forum/threads/:id", async (request, reply) => {
    const { id } = idParamsSchema.parse(request.params);
    const db = await getDb();
    const thread = await findThread(db, id);
    if (!thread) {
      return notFound(reply, "Thread not found");
    }
    const [view] = await describeThreads(db, [thread]);
    return reply.send(view);
  });

  app.post("/v1/forum/threads", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const body = createThreadSchema.parse(request.body ?? {});
    const db = await getDb();
    if (!(await findActiveCategory(db, body.categoryId))) {
      return badRequest(reply, "Category not found or inactive");
    }
    if (!(await enforceContentLimit(reply, user, "forum_post"))) return;
    const moderation = assessContent(body.title, body.content);
    if (await rejectFlagged(reply, "thread", moderation)) return;

    const threadId = randomUUID();
    const now = nowIso();
    const thread: ForumThreadRow = {
      id: threadId,
      title: body.title,
      category_id: body.categoryId,
      creator_id: user.id,
      is_pinned: false,
      is_locked: false,
      created_at: now,
      updated_at: now
    };
    await db("forum_threads").insert(thread);
    let postId: string | null = null;
    if (body.content) {
      postId = randomUUID();
      await db("forum_posts").insert({
        id: postId,
        thread_id: threadId,
        author_id: user.id,
        content: body.content,
        created_at: now
      });
    }
    await recordModerationFlag(db, { contentType: "thread", contentId: threadId, userId: user.id, result: moderation });
    if (postId && body.content) {
      await notifyForumPost(db, { author: user, thread, postId, content: body.content });
    }
    metrics.incCounter("content_action_total", { type: "thread", decision: "created" });
    log.info("forum.thread.created", { threadId, userId: user.id });
    const [view] = await describeThreads(db, [thread]);
    return reply.code(201).send(view);
  });

  app.put("/v1/forum/threads/:id", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const { id } = idParamsSchema.parse(request.params);
    const body = updateThreadSchema.parse(request.body ?? {});
    const db = await getDb();
    const thread = await findThread(db, id);
    if (!thread) {
      return notFound(reply, "Thread not found");
    }
    const admin = isAdmin(user);
    if (thread.creator_id !== user.id && !admin) {
      return forbidden(reply);
    }
    if ((body.isPinned !== undefined || body.isLocked !== undefined) && !admin) {
      return forbidden(reply, "Only admins can pin or lock threads");
    }
    if (body.categoryId && !(await findActiveCategory(db, body.categoryId))) {
      return badRequest(reply, "Category not found or inactive");
    }
    const moderation = assessContent(body.title);
    if (await rejectFlagged(reply, "thread", moderation)) return;
    const changes: Partial<ForumThreadRow> = { updated_at: nowIso() };
    if (body.title !== undefined) changes.title = body.title;
    if (body.categoryId !== undefined) changes.category_id = body.categoryId;
    if (body.isPinned !== undefined) changes.is_pinned = body.isPinned;
    if (body.isLocked !== undefined) changes.is_locked = body.isLocked;
    await db("forum_threads").where({ id }).update(changes);
    const [view] = await describeThreads(db, [{ ...thread, ...changes }]);
    return reply.send(view);
  });

  app.delete("/v1/forum/threads/:id", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const { id } = idParamsSchema.parse(request.params);
    const db = await getDb();
    const thread = await findThread(db, id);
    if (!thread) {
      return notFound(reply, "Thread not found");
    }
    if (thread.creator_id !== user.id && !isAdmin(user)) {
      return forbidden(reply);
    }
    await db.transaction(async (trx) => {
      await trx("polls").where({ thread_id: id }).del();
      await trx("forum_posts").where({ thread_id: id }).del();
      await trx("forum_threads").where({ id }).del();
    });
    log.info("forum.thread.deleted", { threadId: id, userId: user.id });
    return reply.send({ message: "Thread deleted" });
  });

  app.get("/v1/forum/threads/:id/posts", async (request, reply) => {
    const { id } = idParamsSchema.parse(request.params);
    const query = paginationSchema.parse(request.query ?? {});
    const db = await getDb();
    if (!(await findThread(db, id))) {
      return notFound(reply, "Thread not found");
    }
    const rows = await db<ForumPostRow>("forum_posts")
      .where({ thread_id: id })
      .orderBy("created_at", "asc")
      .offset(query.skip)
      .limit(query.limit);
    return reply.send(await describePosts(db, rows));
  });

  app.post("/v1/forum/threads/:id/posts", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const { id } = idParamsSchema.parse(request.params);
    const body = postSchema.parse(request.body ?? {});
    const db = await getDb();
    const thread = await findThread(db, id);
    if (!thread) {
      return notFound(reply, "Thread not found");
    }
    if (toBool(thread.is_locked) && !isAdmin(user)) {
      return badRequest(reply, "Thread is locked");
    }
    if (!(await enforceContentLimit(reply, user, "forum_reply"))) return;
    const moderation = assessContent(body.content);
    if (await rejectFlagged(reply, "post", moderation)) return;

    const postId = randomUUID();
    const now = nowIso();
    await db("forum_posts").insert({
      id: postId,
      thread_id: id,
      author_id: user.id,
      content: body.content,
      created_at: now
    });
    await db("forum_threads").where({ id }).update({ updated_at: now });
    await recordModerationFlag(db, { contentType: "post", contentId: postId, userId: user.id, result: moderation });
    const notified = await notifyForumPost(db, { author: user, thread, postId, content: body.content });
    metrics.incCounter("content_action_total", { type: "post", decision: "created" });
    log.info("forum.post.created", { postId, threadId: id, userId: user.id, notified });
    const post = await db<ForumPostRow>("forum_posts").where({ id: postId }).first();
    if (!post) {
      throw new Error("forum_post_insert_failed");
    }
    const [view] = await describePosts(db, [post]);
    return reply.code(201).send(view);
  });

  app.put("/v1/forum/posts/:id", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const { id } = idParamsSchema.parse(request.params);
    const body = postSchema.parse(request.body ?? {});
    const db = await getDb();
    const post = await db<ForumPostRow>("forum_posts").where({ id }).first();
    if (!post) {
      return notFound(reply, "Post not found");
    }
    if (post.author_id !== user.id && !isAdmin(user)) {
      return forbidden(reply);
    }
    const moderation = assessContent(body.content);
    if (await rejectFlagged(reply, "post", moderation)) return;
    const updatedAt = nowIso();
    await db("forum_posts").where({ id }).update({ content: body.content, updated_at: updatedAt });
    await recordModerationFlag(db, { contentType: "post", contentId: id, userId: user.id, result: moderation });
    const [view] = await describePosts(db, [{ ...post, content: body.content, updated_at: updatedAt }]);
    return reply.send(view);
  });

  app.delete("/v1/forum/posts/:id", async (request, reply) => {
    const user = await requireUser(request, reply);
    if (!user) return;
    const { id } = idParamsSchema.parse(request.params);
    const db = await getDb();
    const post = await db<ForumPostRow>("forum_posts").where({ id }).first();
    if (!post) {
      return notFound(reply, "Post not found");
    }
    if (post.author_id !== user.id && !isAdmin(user)) {
      return forbidden(reply);
    }
    await db("forum_posts").where({ id }).del();
    return reply.send({ message: "Post deleted" });
  });
};
