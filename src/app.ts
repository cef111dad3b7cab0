import { promises as fs } from "fs";
import type * as pg from "pg";
import type { Kysely } from "kysely";
import { Orchestrator } from "./audit/orchestrator.js";
import { AuditConfig, DEFAULT_CONFIG_PATH } from "./config/auditConfig.js";
import { readRuntimeEnv, type RuntimeEnv } from "./config/env.js";
import { ResultConverter } from "./convert/resultConverter.js";
import { applySchema } from "./db/bootstrap.js";
import { createDb, createMemoryPool, createPgPool } from "./db/connection.js";
import type { DB } from "./db/types.js";
import type { ProcessRunner } from "./execution/backends/types.js";
import { PersistenceGateway } from "./store/persistenceGateway.js";
import { ScanStore } from "./store/scanStore.js";
import { builtinTools } from "./tools/builtin/index.js";
import { ToolRegistry } from "./tools/registry.js";
import { ToolRunner } from "./tools/toolRunner.js";
import type { ToolTable } from "./tools/types.js";

export interface AuditApp {
  env: RuntimeEnv;
  config: AuditConfig;
  db: Kysely<DB>;
  registry: ToolRegistry;
  runner: ToolRunner;
  converter: ResultConverter;
  gateway: PersistenceGateway;
  store: ScanStore;
  orchestrator: Orchestrator;
  close(): Promise<void>;
}

export interface CreateAuditAppOptions {
  env?: RuntimeEnv;
  config?: AuditConfig;
  /** Externally managed pool; the schema is then left to the caller. */
  pool?: pg.Pool;
  tools?: ToolTable;
  processRunner?: ProcessRunner;
  log?: (line: string) => void;
}

async function fileExists(filePath: string): Promise<boolean> {
  return fs.access(filePath).then(
    () => true,
    () => false
  );
}

/** The bundled default config is optional; an explicitly named one must exist. */
export async function loadConfig(env: RuntimeEnv): Promise<AuditConfig> {
  if (env.configPath === DEFAULT_CONFIG_PATH && !(await fileExists(env.configPath))) {
    return AuditConfig.defaults();
  }
  return AuditConfig.loadFromFile(env.configPath);
}

export async function createAuditApp(opts: CreateAuditAppOptions = {}): Promise<AuditApp> {
  const env = opts.env ?? readRuntimeEnv();
  const config = opts.config ?? (await loadConfig(env));

  let pool = opts.pool;
  if (!pool) {
    pool = env.databaseUrl ? createPgPool(env.databaseUrl) : createMemoryPool();
    if (!env.databaseUrl || env.autoSchema) await applySchema(pool);
  }

  const db = createDb(pool, { echoSql: env.echoSql });
  const registry = new ToolRegistry(opts.tools ?? builtinTools);
  const runner = new ToolRunner(registry, { processRunner: opts.processRunner, minConfidence: config.minConfidence });
  const converter = new ResultConverter(registry, { minConfidence: config.minConfidence });
  const gateway = new PersistenceGateway(db);
  const store = new ScanStore(db);
  const orchestrator = new Orchestrator({
    registry,
    runner,
    converter,
    gateway,
    defaults: {
      jobs: config.jobs,
      timeoutMs: config.timeoutMs,
      tools: config.tools,
      excludeDirs: config.excludeDirs,
      countMetricsAsIssues: config.countMetricsAsIssues
    },
    log: opts.log
  });

  return {
    env,
    config,
    db,
    registry,
    runner,
    converter,
    gateway,
    store,
    orchestrator,
    close: () => db.destroy()
  };
}
