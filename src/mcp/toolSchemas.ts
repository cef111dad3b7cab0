import * as z from "zod/v4";
import { BUILTIN_TOOL_IDS, TOOL_KINDS } from "../core/scan.js";

const ulid26 = "[0-9A-HJKMNP-TV-Z]{26}";

export const zScanId = z.string().regex(new RegExp(`^scan_${ulid26}$`), "invalid scan_id");
export const zToolId = z.enum(BUILTIN_TOOL_IDS);
export const zToolKind = z.enum(TOOL_KINDS);
export const zRunState = z.enum(["completed", "timed_out", "launch_failed"]);
export const zInvocationState = z.enum(["pending", "running", "completed", "timed_out", "launch_failed", "skipped"]);

export const zToolListInput = z.object({});

export const zToolListOutput = z.object({
  tools: z.array(
    z.object({
      tool_id: zToolId,
      kind: zToolKind,
      output: z.enum(["json", "ndjson", "text"]),
      success_exit_codes: z.array(z.number().int()),
      description: z.string()
    })
  )
});

export const zAuditRunInput = z.object({
  path: z.string().min(1),
  tools: z.array(zToolId).optional(),
  jobs: z.number().int().min(1).max(64).optional(),
  multi: z.boolean().default(false),
  stop_on_error: z.boolean().default(false),
  timeout_seconds: z.number().positive().max(86400).optional()
});

export const zToolOutcome = z.object({
  tool_id: zToolId,
  kind: zToolKind,
  state: zInvocationState,
  exit_code: z.number().int().nullable(),
  failed: z.boolean(),
  failure: z.string().nullable(),
  scan_id: zScanId.nullable(),
  submitted: z.number().int(),
  newly_persisted: z.number().int(),
  skipped_lines: z.number().int(),
  duration_ms: z.number().int()
});

export const zAuditRunOutput = z.object({
  fatal: z.boolean(),
  projects: z.array(
    z.object({
      root: z.string(),
      project_path: z.string(),
      issue_count: z.number().int(),
      outcomes: z.array(zToolOutcome)
    })
  )
});

export const zScanListInput = z.object({
  root: z.string().min(1).optional(),
  tool: zToolId.optional(),
  limit: z.number().int().min(1).max(500).default(50)
});

export const zScanSummary = z.object({
  scan_id: zScanId,
  tool: zToolId,
  kind: zToolKind,
  root: z.string(),
  project_path: z.string(),
  scan_timestamp: z.string(),
  state: zRunState,
  exit_code: z.number().int(),
  duration_ms: z.number().int(),
  failure: z.string().nullable(),
  finding_count: z.number().int()
});

export const zScanListOutput = z.object({
  scans: z.array(zScanSummary)
});

export const zFindingsExportInput = z.object({
  include_metrics: z.boolean().optional()
});

export const zFindingsExportOutput = z.object({
  export_version: z.literal(1),
  generated_at: z.string(),
  roots: z.array(z.string()),
  totals: z.object({
    by_kind: z.record(z.string(), z.number().int()),
    issues: z.number().int()
  }),
  findings: z.array(z.record(z.string(), z.unknown()))
});
