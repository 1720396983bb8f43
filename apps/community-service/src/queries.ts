import { Knex } from "knex";

export const countRows = async (query: Knex.QueryBuilder) => {
  const row = await query.clone().clearSelect().clearOrder().count<{ count: string | number }>("* as count").first();
  return Number(row?.count ?? 0);
};

/** Counts of `column` values, e.g. registered participants per event. */
export const countBy = async (query: Knex.QueryBuilder, column: string) => {
  const rows: Array<{ key: string; count: string | number }> = await query
    .clone()
    .clearSelect()
    .clearOrder()
    .select(`${column} as key`)
    .count("* as count")
    .groupBy(column);
  return new Map(rows.map((row) => [String(row.key), Number(row.count)]));
};

/** True for a unique-constraint violation from either driver. */
export const isUniqueViolation = (error: unknown) =>
  error instanceof Error &&
  "code" in error &&
  (error.code === "23505" || error.code === "SQLITE_CONSTRAINT_UNIQUE");
