import type { FindingKey, ScanId } from "./ids.js";
import type { JsonObject } from "./json.js";

export const BUILTIN_TOOL_IDS = ["bandit", "semgrep", "mypy", "radon", "vulture", "eslint"] as const;
export type ToolId = (typeof BUILTIN_TOOL_IDS)[number];

export const TOOL_KINDS = ["security", "type-check", "complexity", "dead-code", "lint"] as const;
export type ToolKind = (typeof TOOL_KINDS)[number];

export type RunState = "completed" | "timed_out" | "launch_failed";
export type InvocationState = "pending" | "running" | RunState | "skipped";

export const LAUNCH_FAILED_EXIT_CODE = -1;
export const TIMED_OUT_EXIT_CODE = 124;

export function isToolId(value: string): value is ToolId {
  return (BUILTIN_TOOL_IDS as readonly string[]).includes(value);
}

export interface ToolRunResult {
  toolId: ToolId;
  /** One argv per step. */
  command: string[][];
  cwd: string;
  state: RunState;
  exitCode: number;
  durationMs: number;
  stdout: string;
  stderr: string;
  parsedJson: unknown;
  startedAt: string;
  finishedAt: string;
}

export interface ScanMetadata {
  scanId: ScanId;
  toolId: ToolId;
  kind: ToolKind;
  root: string;
  projectPath: string;
  scanTimestamp: string;
  command: string;
  exitCode: number;
  durationMs: number;
  state: RunState;
  stderr: string;
  failure: string | null;
  findingCount: number;
}

interface FindingBase {
  toolId: ToolId;
  root: string;
  filePath: string;
  line: number | null;
  endLine: number | null;
  column: number | null;
  endColumn: number | null;
  message: string | null;
  rule: string | null;
}

export interface SecurityFinding extends FindingBase {
  kind: "security";
  severity: string | null;
  confidence: string | null;
  code: string | null;
  cweId: number | null;
}

export interface TypeCheckFinding extends FindingBase {
  kind: "type-check";
  severity: string | null;
  hint: string | null;
}

export type ComplexityMetric = "cc" | "mi" | "raw" | "hal";

export interface ComplexityFinding extends FindingBase {
  kind: "complexity";
  metric: ComplexityMetric;
  score: number | null;
  rank: string | null;
  details: JsonObject;
}

export interface DeadCodeFinding extends FindingBase {
  kind: "dead-code";
  confidence: number | null;
  symbolKind: string | null;
}

export interface LintFinding extends FindingBase {
  kind: "lint";
  severity: "warning" | "error" | null;
  fatal: boolean;
  fixable: boolean;
}

export type FindingRow = SecurityFinding | TypeCheckFinding | ComplexityFinding | DeadCodeFinding | LintFinding;

export type FindingOfKind<K extends ToolKind> = Extract<FindingRow, { kind: K }>;

export interface StoredFinding {
  key: FindingKey;
  scanId: ScanId;
  row: FindingRow;
}
