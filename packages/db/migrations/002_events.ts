import { Knex } from "knex";

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable("event_categories", (table) => {
    table.text("id").primary();
    table.text("name").notNullable().unique();
    table.text("description");
    table.timestamp("created_at", { useTz: true }).notNullable().defaultTo(knex.fn.now());
  });

  await knex.schema.createTable("events", (table) => {
    table.text("id").primary();
    table.text("title").notNullable();
    table.text("description").notNullable();
    table.timestamp("start_datetime", { useTz: true }).notNullable();
    table.timestamp("end_datetime", { useTz: true });
    table.text("location");
    table.integer("max_participants");
    table.text("category_id").references("id").inTable("event_categories");
    table.text("creator_id").notNullable().references("id").inTable("users");
    table.boolean("is_active").notNullable().defaultTo(true);
    table.timestamp("created_at", { useTz: true }).notNullable().defaultTo(knex.fn.now());
    table.timestamp("updated_at", { useTz: true }).notNullable().defaultTo(knex.fn.now());
    table.index(["is_active", "start_datetime"]);
    table.index(["creator_id"]);
  });

  await knex.schema.createTable("event_participations", (table) => {
    table.text("id").primary();
    table.text("event_id").notNullable().references("id").inTable("events").onDelete("CASCADE");
    table.text("user_id").notNullable().references("id").inTable("users").onDelete("CASCADE");
    table.text("status").notNullable().defaultTo("registered");
    table.timestamp("registered_at", { useTz: true }).notNullable().defaultTo(knex.fn.now());
    table.timestamp("updated_at", { useTz: true }).notNullable().defaultTo(knex.fn.now());
    table.unique(["event_id", "user_id"]);
    table.index(["user_id", "status"]);
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists("event_participations");
  await knex.schema.dropTableIfExists("events");
  await knex.schema.dropTableIfExists("event_categories");
}
