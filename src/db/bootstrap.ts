import { promises as fs } from "fs";
import path from "path";
import type * as pg from "pg";

export const SCHEMA_PATH = "db/schema.sql";

export async function applySqlFile(pool: pg.Pool, filePath: string): Promise<void> {
  const sql = await fs.readFile(filePath, "utf8");
  if (!sql.trim()) return;
  await pool.query(sql);
}

export async function applySchema(pool: pg.Pool, schemaPath: string = SCHEMA_PATH): Promise<void> {
  await applySqlFile(pool, path.resolve(schemaPath));
}
