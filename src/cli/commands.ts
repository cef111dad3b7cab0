import { promises as fs } from "fs";
import path from "path";
import type { AuditApp } from "../app.js";
import { createAuditApp } from "../app.js";
import type { AuditSummary } from "../audit/orchestrator.js";
import { readRuntimeEnv } from "../config/env.js";
import { ConfigurationError } from "../core/errors.js";
import { applySchema } from "../db/bootstrap.js";
import { createMemoryPool, createPgPool } from "../db/connection.js";
import { exportFindings, writeExport } from "../export/exportFindings.js";
import { assertKnownOptions, lastFlag, parseArgs } from "./args.js";

export interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  createApp: () => Promise<AuditApp>;
}

const defaultIo: CliIo = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
  createApp: () => createAuditApp()
};

export const DEFAULT_EXPORT_PATH = "findings_export.json";

export function usage(): string {
  return [
    "usage:",
    "  staticaudit seed-db",
    "  staticaudit run-tool <tool> <target> [--timeout-seconds N] [--json-out PATH]",
    "  staticaudit audit <path> [--tool ID ...] [--jobs N] [--stop-on-error] [--multi] [--timeout-seconds N]",
    "  staticaudit export [--output-path PATH] [--include-metrics]",
    "",
    "env:",
    "  DATABASE_URL      Postgres connection string (unset: in-memory database for this process)",
    "  AUDITOR_CONFIG    config file (default config/auditor.yaml)",
    "  AUDITOR_SQL_ECHO  1 to log every SQL statement to stderr",
    "  AUTO_SCHEMA       false to skip applying db/schema.sql on start",
    ""
  ].join("\n");
}

function positiveNumber(raw: string | undefined, name: string): number | undefined {
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (!Number.isFinite(n) || n <= 0) throw new ConfigurationError(`--${name} must be a positive number, got ${raw}`);
  return n;
}

function positiveInt(raw: string | undefined, name: string): number | undefined {
  const n = positiveNumber(raw, name);
  if (n !== undefined && !Number.isInteger(n)) throw new ConfigurationError(`--${name} must be an integer, got ${raw}`);
  return n;
}

function secondsToMs(seconds: number | undefined): number | undefined {
  return seconds === undefined ? undefined : Math.round(seconds * 1000);
}

export function formatAuditSummary(summary: AuditSummary): string {
  const lines: string[] = [];
  for (const project of summary.projects) {
    lines.push(`${project.root} (${project.projectPath})`);
    for (const o of project.outcomes) {
      const exit = o.exitCode === null ? "-" : String(o.exitCode);
      const tail = o.failure ? `  ${o.failure}` : "";
      lines.push(`  ${o.toolId.padEnd(8)} ${o.state.padEnd(13)} exit=${exit} rows=${o.submitted} new=${o.newlyPersisted}${tail}`);
    }
    lines.push(`  issues: ${project.issueCount}`);
  }
  if (summary.fatal) lines.push("stopped on first failure");
  return lines.join("\n") + "\n";
}

async function withApp<T>(io: CliIo, fn: (app: AuditApp) => Promise<T>): Promise<T> {
  const app = await io.createApp();
  try {
    return await fn(app);
  } finally {
    await app.close();
  }
}

async function seedDb(io: CliIo): Promise<number> {
  const env = readRuntimeEnv();
  const pool = env.databaseUrl ? createPgPool(env.databaseUrl) : createMemoryPool();
  try {
    await applySchema(pool);
  } finally {
    await pool.end();
  }
  io.stdout(env.databaseUrl ? "schema applied\n" : "schema applied to an in-memory database (set DATABASE_URL to keep it)\n");
  return 0;
}

async function runTool(io: CliIo, argv: readonly string[]): Promise<number> {
  const args = parseArgs(argv, []);
  assertKnownOptions(args, ["timeout-seconds", "json-out"]);
  const [toolId, target, ...rest] = args.positionals;
  if (!toolId || !target || rest.length) throw new ConfigurationError(`run-tool takes <tool> <target>\n\n${usage()}`);
  const timeoutSeconds = positiveNumber(lastFlag(args, "timeout-seconds"), "timeout-seconds");
  const jsonOut = lastFlag(args, "json-out");

  return withApp(io, async (app) => {
    const run = await app.runner.run(toolId, target, secondsToMs(timeoutSeconds) ?? app.config.timeoutMs);
    io.stdout(`${run.toolId} ${run.state} exit=${run.exitCode} duration=${run.durationMs}ms cwd=${run.cwd}\n`);
    for (const argvLine of run.command) io.stdout(`  $ ${argvLine.join(" ")}\n`);
    if (jsonOut) {
      await fs.mkdir(path.dirname(path.resolve(jsonOut)), { recursive: true });
      await fs.writeFile(jsonOut, JSON.stringify(run, null, 2) + "\n", "utf8");
      io.stdout(`wrote ${jsonOut}\n`);
    }
    return run.state === "completed" ? 0 : 1;
  });
}

async function audit(io: CliIo, argv: readonly string[]): Promise<number> {
  const args = parseArgs(argv, ["stop-on-error", "multi"]);
  assertKnownOptions(args, ["tool", "jobs", "timeout-seconds", "stop-on-error", "multi"]);
  const [root, ...rest] = args.positionals;
  if (!root || rest.length) throw new ConfigurationError(`audit takes exactly one <path>\n\n${usage()}`);

  const request = {
    root,
    toolIds: args.flags.get("tool"),
    jobs: positiveInt(lastFlag(args, "jobs"), "jobs"),
    timeoutMs: secondsToMs(positiveNumber(lastFlag(args, "timeout-seconds"), "timeout-seconds")),
    multi: args.switches.has("multi"),
    stopOnError: args.switches.has("stop-on-error")
  };

  return withApp(io, async (app) => {
    const summary = await app.orchestrator.audit(request);
    io.stdout(formatAuditSummary(summary));
    return summary.fatal ? 1 : 0;
  });
}

async function exportCommand(io: CliIo, argv: readonly string[]): Promise<number> {
  const args = parseArgs(argv, ["include-metrics"]);
  assertKnownOptions(args, ["output-path", "include-metrics"]);
  if (args.positionals.length) throw new ConfigurationError(`export takes no positional arguments\n\n${usage()}`);
  const outputPath = lastFlag(args, "output-path") ?? DEFAULT_EXPORT_PATH;

  return withApp(io, async (app) => {
    if (!app.env.databaseUrl) {
      io.stderr("warning: DATABASE_URL is not set; exporting from a fresh in-memory database, which holds no earlier audits\n");
    }
    const bundle = await exportFindings(app.store, {
      includeMetrics: args.switches.has("include-metrics") || undefined,
      countMetricsAsIssues: app.config.countMetricsAsIssues
    });
    await writeExport(outputPath, bundle);
    io.stdout(`wrote ${bundle.findings.length} finding(s) to ${outputPath}\n`);
    return 0;
  });
}

/** Returns the process exit code. */
export async function runCli(argv: readonly string[], io: CliIo = defaultIo): Promise<number> {
  const [command, ...rest] = argv;
  try {
    switch (command) {
      case "seed-db":
        return await seedDb(io);
      case "run-tool":
        return await runTool(io, rest);
      case "audit":
        return await audit(io, rest);
      case "export":
        return await exportCommand(io, rest);
      case undefined:
      case "help":
      case "--help":
        io.stdout(usage());
        return command === undefined ? 1 : 0;
      default:
        throw new ConfigurationError(`unknown command: ${command}\n\n${usage()}`);
    }
  } catch (err) {
    if (err instanceof ConfigurationError) {
      io.stderr(`error: ${err.message}\n`);
      return 1;
    }
    throw err;
  }
}
