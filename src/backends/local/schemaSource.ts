import { readFile } from "node:fs/promises";
import { parse } from "csv-parse/sync";
import type { Schema } from "../../core/types.js";

export function parseSchemaHeader(
  raw: string,
  sourceName = "schema source",
): Schema {
  const records: unknown = parse(raw, {
    bom: true,
    to_line: 1,
    relax_column_count: true,
  });

  const header: unknown = Array.isArray(records) ? records[0] : undefined;
  if (!Array.isArray(header) || header.length === 0) {
    throw new Error(
      `Empty ${sourceName}: expected a header record of column names.`,
    );
  }

  return header.map((column) => String(column));
}

/** Reads the first CSV record of a reference feature file as the schema. */
export async function readSchemaHeader(path: string): Promise<Schema> {
  const raw = await readFile(path, "utf-8");
  return parseSchemaHeader(raw, `schema source ${path}`);
}
