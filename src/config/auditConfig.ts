import { promises as fs } from "fs";
import YAML from "yaml";
import * as z from "zod/v4";
import { ConfigurationError, errorMessage } from "../core/errors.js";
import { isJsonObject } from "../core/json.js";
import { BUILTIN_TOOL_IDS, type ToolId } from "../core/scan.js";

export const DEFAULT_CONFIG_PATH = "config/auditor.yaml";

const zToolId = z.enum(BUILTIN_TOOL_IDS);

const zAuditConfig = z.object({
  version: z.literal(1),
  defaults: z
    .object({
      jobs: z.number().int().min(1).default(4),
      timeout_seconds: z.number().positive().default(300),
      tools: z.array(zToolId).min(1).default([...BUILTIN_TOOL_IDS])
    })
    .default({ jobs: 4, timeout_seconds: 300, tools: [...BUILTIN_TOOL_IDS] }),
  dead_code: z
    .object({
      min_confidence: z.number().int().min(0).max(100).default(50)
    })
    .default({ min_confidence: 50 }),
  workspace: z
    .object({
      exclude_dirs: z.array(z.string().min(1)).default([])
    })
    .default({ exclude_dirs: [] }),
  metrics: z
    .object({
      count_as_issues: z.boolean().default(false)
    })
    .default({ count_as_issues: false })
});

export type AuditConfigData = z.infer<typeof zAuditConfig>;

/** `${VAR}` or `$VAR` resolves from the environment; an unset variable resolves to null. */
export function expandEnvToken(value: string): string | null {
  const m = /^\$\{([A-Z0-9_]+)\}$|^\$([A-Z0-9_]+)$/.exec(value.trim());
  if (!m) return value;
  const varName = m[1] ?? m[2];
  if (!varName) return null;
  const v = process.env[varName]?.trim();
  return v ? v : null;
}

function expandEnv(value: unknown): unknown {
  if (typeof value === "string") return expandEnvToken(value);
  if (Array.isArray(value)) {
    return value.map(expandEnv).filter((v) => v !== null);
  }
  if (isJsonObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      const expanded = expandEnv(v);
      if (expanded !== null) out[k] = expanded;
    }
    return out;
  }
  return value;
}

export class AuditConfig {
  constructor(private readonly data: AuditConfigData) {}

  static parse(raw: unknown, source = "config"): AuditConfig {
    const result = zAuditConfig.safeParse(expandEnv(raw));
    if (!result.success) {
      const issues = result.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`).join("; ");
      throw new ConfigurationError(`invalid config at ${source}: ${issues}`);
    }
    return new AuditConfig(result.data);
  }

  static async loadFromFile(filePath: string): Promise<AuditConfig> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, "utf8");
    } catch (err) {
      throw new ConfigurationError(`cannot read config ${filePath}: ${errorMessage(err)}`);
    }
    return AuditConfig.parse(YAML.parse(raw) as unknown, filePath);
  }

  static defaults(): AuditConfig {
    return AuditConfig.parse({ version: 1 });
  }

  get jobs(): number {
    return this.data.defaults.jobs;
  }

  get timeoutMs(): number {
    return Math.round(this.data.defaults.timeout_seconds * 1000);
  }

  get tools(): ToolId[] {
    return [...this.data.defaults.tools];
  }

  get minConfidence(): number {
    return this.data.dead_code.min_confidence;
  }

  get excludeDirs(): string[] {
    return [...this.data.workspace.exclude_dirs];
  }

  get countMetricsAsIssues(): boolean {
    return this.data.metrics.count_as_issues;
  }
}
