import type { FindingOfKind, ToolId, ToolKind, ToolRunResult } from "../core/scan.js";

export type OutputFormat = "json" | "ndjson" | "text";

/** One child process of a tool run. */
export interface ToolCommand {
  /** Key of this step's payload when a tool runs several steps. */
  label: string;
  argv: string[];
  cwd: string;
  env?: Record<string, string>;
  /** JSON is read from this file instead of stdout. */
  outputFile?: string;
}

export interface PlanContext {
  /** Absolute target path (file or directory). */
  target: string;
  /** Directory the tool runs in; findings are reported relative to it. */
  cwd: string;
  /** Per-run temp directory, removed after the run. */
  scratchDir: string;
  minConfidence: number;
}

export interface ParseContext {
  root: string;
  cwd: string;
  /** Absolute target path; equals `cwd` unless a single file is scanned. */
  target: string;
  minConfidence: number;
}

export interface ParseOutput<K extends ToolKind> {
  rows: Array<FindingOfKind<K>>;
  skippedLines: number;
  /** Steps that ran but could not be read; the run's other rows are kept. */
  parseErrors?: string[];
}

export interface ToolDefinition<K extends ToolKind = ToolKind> {
  toolId: ToolId;
  kind: K;
  output: OutputFormat;
  successExitCodes: readonly number[];
  description: string;
  plan(ctx: PlanContext): ToolCommand[];
  /** Throws ParseError when the payload has the wrong shape. */
  parse(run: ToolRunResult, ctx: ParseContext): ParseOutput<K>;
}

export type AnyToolDefinition = { [K in ToolKind]: ToolDefinition<K> }[ToolKind];

export type ToolTable = Readonly<Record<ToolId, AnyToolDefinition>>;
