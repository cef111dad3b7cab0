import path from "path";
import { newDb } from "pg-mem";
import type * as pg from "pg";
import type { Kysely } from "kysely";

import { applySqlFile } from "../src/db/bootstrap.js";
import { createDb } from "../src/db/connection.js";
import type { DB } from "../src/db/types.js";
import type { ToolId, ToolRunResult } from "../src/core/scan.js";
import type { ParseContext } from "../src/tools/types.js";

export async function memoryDb(): Promise<{ pool: pg.Pool; db: Kysely<DB> }> {
  const mem = newDb({ autoCreateForeignKeyIndices: true });
  const adapter = mem.adapters.createPg();
  const pool = new adapter.Pool() as unknown as pg.Pool;
  await applySqlFile(pool, path.resolve("db/schema.sql"));
  return { pool, db: createDb(pool) };
}

/** argv running a short inline script with the current node binary. */
export function nodeScript(source: string): string[] {
  return [process.execPath, "-e", source];
}

export const parseCtx: ParseContext = {
  root: "proj",
  cwd: "/work/proj",
  target: "/work/proj",
  minConfidence: 50
};

export function runResult(toolId: ToolId, over: Partial<ToolRunResult> = {}): ToolRunResult {
  return {
    toolId,
    command: [[toolId, "."]],
    cwd: "/work/proj",
    state: "completed",
    exitCode: 0,
    durationMs: 5,
    stdout: "",
    stderr: "",
    parsedJson: null,
    startedAt: "2026-01-02T03:04:05.000Z",
    finishedAt: "2026-01-02T03:04:06.000Z",
    ...over
  };
}
