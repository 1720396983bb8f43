import { Knex } from "knex";

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable("users", (table) => {
    table.text("id").primary();
    table.text("display_name").notNullable().unique();
    table.text("email").notNullable().unique();
    table.text("password_hash").notNullable();
    table.text("first_name");
    table.text("last_name");
    table.text("bio");
    table.text("location");
    table.text("profile_image_url");
    table.boolean("is_active").notNullable().defaultTo(true);
    table.boolean("is_admin").notNullable().defaultTo(false);
    table.boolean("email_verified").notNullable().defaultTo(false);
    table.timestamp("email_verified_at", { useTz: true });
    table.boolean("email_private").notNullable().defaultTo(true);
    table.boolean("first_name_private").notNullable().defaultTo(false);
    table.boolean("last_name_private").notNullable().defaultTo(false);
    table.boolean("bio_private").notNullable().defaultTo(false);
    table.boolean("location_private").notNullable().defaultTo(false);
    table.boolean("created_at_private").notNullable().defaultTo(false);
    table.boolean("messages_enabled").notNullable().defaultTo(true);
    table.boolean("notify_forum_reply").notNullable().defaultTo(true);
    table.boolean("notify_forum_mention").notNullable().defaultTo(true);
    table.boolean("notify_forum_quote").notNullable().defaultTo(true);
    table.boolean("email_notifications_events").notNullable().defaultTo(true);
    table.boolean("email_notifications_messages").notNullable().defaultTo(false);
    table.boolean("email_notifications_newsletter").notNullable().defaultTo(true);
    table.timestamp("created_at", { useTz: true }).notNullable().defaultTo(knex.fn.now());
    table.timestamp("updated_at", { useTz: true }).notNullable().defaultTo(knex.fn.now());
  });

  await knex.schema.createTable("refresh_tokens", (table) => {
    table.text("id").primary();
    table.text("user_id").notNullable().references("id").inTable("users").onDelete("CASCADE");
    table.text("token_hash").notNullable().unique();
    table.timestamp("expires_at", { useTz: true }).notNullable();
    table.timestamp("revoked_at", { useTz: true });
    table.timestamp("created_at", { useTz: true }).notNullable().defaultTo(knex.fn.now());
    table.index(["user_id"]);
  });

  for (const name of ["email_verification_tokens", "password_reset_tokens"]) {
    await knex.schema.createTable(name, (table) => {
      table.text("id").primary();
      table.text("user_id").notNullable().references("id").inTable("users").onDelete("CASCADE");
      table.text("token_hash").notNullable().unique();
      table.timestamp("expires_at", { useTz: true }).notNullable();
      table.timestamp("used_at", { useTz: true });
      table.timestamp("created_at", { useTz: true }).notNullable().defaultTo(knex.fn.now());
      table.index(["user_id"]);
    });
  }
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists("password_reset_tokens");
  await knex.schema.dropTableIfExists("email_verification_tokens");
  await knex.schema.dropTableIfExists("refresh_tokens");
  await knex.schema.dropTableIfExists("users");
}
