import { Knex } from "knex";

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable("forum_categories", (table) => {
    table.text("id").primary();
    table.text("name").notNullable().unique();
    table.text("description");
    table.text("color").notNullable().defaultTo("#4F46E5");
    table.text("icon");
    table.boolean("is_active").notNullable().defaultTo(true);
    table.integer("display_order").notNullable().defaultTo(0);
    table.timestamp("created_at", { useTz: true }).notNullable().defaultTo(knex.fn.now());
    table.timestamp("updated_at", { useTz: true }).notNullable().defaultTo(knex.fn.now());
  });

  await knex.schema.createTable("forum_threads", (table) => {
    table.text("id").primary();
    table.text("title").notNullable();
    table.text("category_id").notNullable().references("id").inTable("forum_categories");
    table.text("creator_id").notNullable().references("id").inTable("users");
    table.boolean("is_pinned").notNullable().defaultTo(false);
    table.boolean("is_locked").notNullable().defaultTo(false);
    table.timestamp("created_at", { useTz: true }).notNullable().defaultTo(knex.fn.now());
    table.timestamp("updated_at", { useTz: true }).notNullable().defaultTo(knex.fn.now());
    table.index(["category_id"]);
  });

  await knex.schema.createTable("forum_posts", (table) => {
    table.text("id").primary();
    table.text("thread_id").notNullable().references("id").inTable("forum_threads").onDelete("CASCADE");
    table.text("author_id").notNullable().references("id").inTable("users");
    table.text("content").notNullable();
    table.timestamp("created_at", { useTz: true }).notNullable().defaultTo(knex.fn.now());
    table.timestamp("updated_at", { useTz: true });
    table.index(["thread_id", "created_at"]);
    table.index(["author_id"]);
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists("forum_posts");
  await knex.schema.dropTableIfExists("forum_threads");
  await knex.schema.dropTableIfExists("forum_categories");
}
