import { DEFAULT_CONFIG_PATH } from "./auditConfig.js";

export interface RuntimeEnv {
  databaseUrl: string | null;
  echoSql: boolean;
  autoSchema: boolean;
  configPath: string;
}

function flag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === "") return fallback;
  return !["0", "false", "no", "off"].includes(value.trim().toLowerCase());
}

export function readRuntimeEnv(env: NodeJS.ProcessEnv = process.env): RuntimeEnv {
  const url = env.DATABASE_URL?.trim();
  return {
    databaseUrl: url ? url : null,
    echoSql: flag(env.AUDITOR_SQL_ECHO, false),
    autoSchema: flag(env.AUTO_SCHEMA, true),
    configPath: env.AUDITOR_CONFIG?.trim() || DEFAULT_CONFIG_PATH
  };
}
