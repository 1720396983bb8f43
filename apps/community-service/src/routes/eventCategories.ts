import { FastifyInstance } from "fastify";
import { randomUUID } from "node:crypto";
import { z } from "zod";
import { DbClient, toIso } from "@community/db";
import { getDb } from "../db.js";
import { requireAdmin } from "../auth.js";
import { badRequest, idParamsSchema, notFound, nowIso } from "../http.js";
import { countRows } from "../queries.js";
import { EventCategoryRow } from "../rows.js";

const createSchema = z.object({
  name: z.string().trim().min(1).max(100),
  description: z.string().trim().max(500).nullable().optional()
});

const updateSchema = createSchema.partial();

export const toCategoryView = (row: EventCategoryRow) => ({
  id: row.id,
  name: row.name,
  description: row.description,
  createdAt: toIso(row.created_at)
});

const nameTaken = async (db: DbClient, name: string, exceptId?: string) => {
  const query = db<EventCategoryRow>("event_categories").whereRaw("lower(name) = ?", [name.toLowerCase()]);
  if (exceptId) query.whereNot({ id: exceptId });
  return Boolean(await query.first());
};

export const registerEventCategoryRoutes = (app: FastifyInstance) => {
  app.get("/v1/event-categories", async (_request, reply) => {
    const db = await getDb();
    const rows = await db<EventCategoryRow>("event_categories").orderBy("name", "asc");
    return reply.send(rows.map(toCategoryView));
  });

  app.get("/v1/event-categories/:id", async (request, reply) => {
    const { id } = idParamsSchema.parse(request.params);
    const db = await getDb();
    const row = await db<EventCategoryRow>("event_categories").where({ id }).first();
    if (!row) {
      return notFound(reply, "Category not found");
    }
    return reply.send(toCategoryView(row));
  });

  app.post("/v1/event-categories", async (request, reply) => {
    const admin = await requireAdmin(request, reply);
    if (!admin) return;
    const body = createSchema.parse(request.body ?? {});
    const db = await getDb();
    if (await nameTaken(db, body.name)) {
      return badRequest(reply, "Category name already exists");
    }
    const id = randomUUID();
    await db("event_categories").insert({
      id,
      name: body.name,
      description: body.description ?? null,
      created_at: nowIso()
    });
    const row = await db<EventCategoryRow>("event_categories").where({ id }).first();
    if (!row) {
      throw new Error("category_insert_failed");
    }
    return reply.code(201).send(toCategoryView(row));
  });

  app.put("/v1/event-categories/:id", async (request, reply) => {
    const admin = await requireAdmin(request, reply);
    if (!admin) return;
    const { id } = idParamsSchema.parse(request.params);
    const body = updateSchema.parse(request.body ?? {});
    const db = await getDb();
    const existing = await db<EventCategoryRow>("event_categories").where({ id }).first();
    if (!existing) {
      return notFound(reply, "Category not found");
    }
    if (body.name && (await nameTaken(db, body.name, id))) {
      return badRequest(reply, "Category name already exists");
    }
    const changes: Partial<EventCategoryRow> = {};
    if (body.name !== undefined) changes.name = body.name;
    if (body.description !== undefined) changes.description = body.description;
    if (Object.keys(changes).length) {
      await db("event_categories").where({ id }).update(changes);
    }
    return reply.send(toCategoryView({ ...existing, ...changes }));
  });

  app.delete("/v1/event-categories/:id", async (request, reply) => {
    const admin = await requireAdmin(request, reply);
    if (!admin) return;
    const { id } = idParamsSchema.parse(request.params);
    const db = await getDb();
    const existing = await db<EventCategoryRow>("event_categories").where({ id }).first();
    if (!existing) {
      return notFound(reply, "Category not found");
    }
    const inUse = await countRows(db("events").where({ category_id: id }));
    if (inUse > 0) {
      return badRequest(reply, `Cannot delete category. ${inUse} events are using this category.`);
    }
    await db("event_categories").where({ id }).del();
    return reply.send({ message: "Category deleted" });
  });
};
