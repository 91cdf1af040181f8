import { existsSync, promises as fs } from "fs";
import { fileURLToPath } from "url";
import type * as pg from "pg";

// Sources live in src/db, compiled output in dist/src/db.
const SCHEMA_CANDIDATES = ["../../db/schema.sql", "../../../db/schema.sql"].map((rel) =>
  fileURLToPath(new URL(rel, import.meta.url))
);

export function defaultSchemaPath(): string {
  const found = SCHEMA_CANDIDATES.find((p) => existsSync(p));
  if (!found) throw new Error(`db/schema.sql not found (looked in ${SCHEMA_CANDIDATES.join(", ")})`);
  return found;
}

export async function applySqlFile(pool: pg.Pool, filePath: string = defaultSchemaPath()): Promise<void> {
  const sql = await fs.readFile(filePath, "utf8");
  if (!sql.trim()) return;
  await pool.query(sql);
}
