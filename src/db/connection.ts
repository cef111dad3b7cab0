import * as pg from "pg";
import { Kysely, PostgresDialect } from "kysely";
import { newDb } from "pg-mem";
import type { DB } from "./types.js";

export function createPgPool(databaseUrl: string): pg.Pool {
  return new pg.Pool({ connectionString: databaseUrl });
}

/** In-process Postgres for runs without DATABASE_URL; contents vanish with the process. */
export function createMemoryPool(): pg.Pool {
  const mem = newDb({ autoCreateForeignKeyIndices: true });
  const adapter = mem.adapters.createPg();
  return new adapter.Pool() as unknown as pg.Pool;
}

export interface CreateDbOptions {
  /** Log every executed statement to stderr. */
  echoSql?: boolean;
}

export function createDb(pool: pg.Pool, opts: CreateDbOptions = {}): Kysely<DB> {
  return new Kysely<DB>({
    dialect: new PostgresDialect({ pool }),
    log: opts.echoSql
      ? (event) => {
          if (event.level === "query") {
            process.stderr.write(`[sql] ${event.query.sql} (${event.queryDurationMillis.toFixed(1)}ms)\n`);
          } else {
            process.stderr.write(`[sql] error: ${event.query.sql}\n`);
          }
        }
      : undefined
  });
}
