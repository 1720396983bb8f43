import { Knex } from "knex";

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable("comments", (table) => {
    table.text("id").primary();
    table.text("content").notNullable();
    table.text("author_id").notNullable().references("id").inTable("users");
    table.text("event_id").references("id").inTable("events");
    table.text("service_id").references("id").inTable("services");
    table.text("parent_id").references("id").inTable("comments");
    table.boolean("is_active").notNullable().defaultTo(true);
    table.timestamp("created_at", { useTz: true }).notNullable().defaultTo(knex.fn.now());
    table.timestamp("updated_at", { useTz: true });
    table.index(["event_id"]);
    table.index(["service_id"]);
    table.index(["parent_id"]);
  });

  await knex.schema.createTable("notifications", (table) => {
    table.text("id").primary();
    table.text("user_id").notNullable().references("id").inTable("users").onDelete("CASCADE");
    table.text("type").notNullable();
    table.text("title").notNullable();
    table.text("message").notNullable();
    table.jsonb("data").notNullable().defaultTo("{}");
    table.boolean("is_read").notNullable().defaultTo(false);
    table.timestamp("created_at", { useTz: true }).notNullable().defaultTo(knex.fn.now());
    table.index(["user_id", "is_read"]);
  });

  await knex.schema.createTable("moderation_flags", (table) => {
    table.text("id").primary();
    table.text("content_type").notNullable();
    table.text("content_id").notNullable();
    table.text("user_id").notNullable().references("id").inTable("users");
    table.float("confidence").notNullable();
    table.jsonb("reasons").notNullable().defaultTo("[]");
    table.text("status").notNullable().defaultTo("pending");
    table.text("resolved_by");
    table.timestamp("resolved_at", { useTz: true });
    table.timestamp("created_at", { useTz: true }).notNullable().defaultTo(knex.fn.now());
    table.index(["status"]);
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists("moderation_flags");
  await knex.schema.dropTableIfExists("notifications");
  await knex.schema.dropTableIfExists("comments");
}
