import { Knex } from "knex";

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable("services", (table) => {
    table.text("id").primary();
    table.text("user_id").notNullable().references("id").inTable("users");
    table.text("title").notNullable();
    table.text("description").notNullable();
    table.boolean("is_offering").notNullable();
    table.jsonb("meeting_locations").notNullable().defaultTo("[]");
    table.text("price_type").notNullable().defaultTo("free");
    table.decimal("price_amount", 10, 2);
    table.text("price_currency").notNullable().defaultTo("EUR");
    table.float("estimated_duration_hours");
    table.text("contact_method").notNullable().defaultTo("message");
    table.integer("response_time_hours");
    table.boolean("is_completed").notNullable().defaultTo(false);
    table.timestamp("completed_at", { useTz: true });
    table.integer("view_count").notNullable().defaultTo(0);
    table.integer("interest_count").notNullable().defaultTo(0);
    table.text("service_type").notNullable().defaultTo("user_service");
    table.text("slug").notNullable().unique();
    table.text("admin_notes");
    table.boolean("is_active").notNullable().defaultTo(true);
    table.timestamp("created_at", { useTz: true }).notNullable().defaultTo(knex.fn.now());
    table.timestamp("updated_at", { useTz: true }).notNullable().defaultTo(knex.fn.now());
    table.index(["is_active", "is_offering"]);
    table.index(["user_id"]);
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists("services");
}
