import type { Row } from "@tally/shared";

/**
 * Case-insensitive substring match on the `name` column, applied after the
 * rows come back from the store. Rows without a string name never match.
 * A blank needle keeps every row.
 */
export function filterRowsByName(rows: Row[], search?: string | null): Row[] {
  const needle = search?.trim().toLowerCase();
  if (!needle) return rows;

  return rows.filter((row) => {
    const name = row.name;
    return typeof name === "string" && name.toLowerCase().includes(needle);
  });
}
