import { Knex } from "knex";

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable("polls", (table) => {
    table.text("id").primary();
    table.text("question").notNullable();
    table.text("poll_type").notNullable();
    table.text("thread_id").references("id").inTable("forum_threads").onDelete("CASCADE");
    table.text("creator_id").notNullable().references("id").inTable("users");
    table.boolean("is_active").notNullable().defaultTo(true);
    table.timestamp("ends_at", { useTz: true });
    table.timestamp("created_at", { useTz: true }).notNullable().defaultTo(knex.fn.now());
    table.index(["poll_type", "is_active"]);
  });

  await knex.schema.createTable("poll_options", (table) => {
    table.text("id").primary();
    table.text("poll_id").notNullable().references("id").inTable("polls").onDelete("CASCADE");
    table.text("text").notNullable();
    table.integer("order_index").notNullable().defaultTo(0);
    table.index(["poll_id"]);
  });

  await knex.schema.createTable("poll_votes", (table) => {
    table.text("id").primary();
    table.text("poll_id").notNullable().references("id").inTable("polls").onDelete("CASCADE");
    table.text("option_id").notNullable().references("id").inTable("poll_options").onDelete("CASCADE");
    table.text("user_id").notNullable().references("id").inTable("users");
    table.timestamp("created_at", { useTz: true }).notNullable().defaultTo(knex.fn.now());
    table.unique(["poll_id", "user_id"]);
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists("poll_votes");
  await knex.schema.dropTableIfExists("poll_options");
  await knex.schema.dropTableIfExists("polls");
}
