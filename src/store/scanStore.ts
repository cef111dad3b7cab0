import type { Kysely, Selectable } from "kysely";
import type { FindingKey, ScanId } from "../core/ids.js";
import { isJsonObject } from "../core/json.js";
import {
  TOOL_KINDS,
  isToolId,
  type ComplexityMetric,
  type FindingRow,
  type RunState,
  type ScanMetadata,
  type StoredFinding,
  type ToolId,
  type ToolKind
} from "../core/scan.js";
import type {
  ComplexityFindingsTable,
  DB,
  DeadCodeFindingsTable,
  LintFindingsTable,
  ScanMetadataTable,
  SecurityFindingsTable,
  TypeCheckFindingsTable
} from "../db/types.js";

const RUN_STATES: readonly RunState[] = ["completed", "timed_out", "launch_failed"];
const METRICS: readonly ComplexityMetric[] = ["cc", "mi", "raw", "hal"];

function toolIdOf(value: string): ToolId {
  if (!isToolId(value)) throw new Error(`stored row has unknown tool: ${value}`);
  return value;
}

function oneOf<T extends string>(allowed: readonly T[], value: string, what: string): T {
  const found = allowed.find((a) => a === value);
  if (found === undefined) throw new Error(`stored row has unknown ${what}: ${value}`);
  return found;
}

function toIso(value: unknown): string {
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

type FindingColumnsRow = Selectable<SecurityFindingsTable> | Selectable<TypeCheckFindingsTable> | Selectable<ComplexityFindingsTable> | Selectable<DeadCodeFindingsTable> | Selectable<LintFindingsTable>;

function base(r: FindingColumnsRow) {
  return {
    toolId: toolIdOf(r.tool),
    root: r.root,
    filePath: r.file_path,
    line: r.line_number,
    endLine: r.end_line_number,
    column: r.col_offset,
    endColumn: r.end_col_offset,
    message: r.message,
    rule: r.rule
  };
}

function stored(r: FindingColumnsRow, row: FindingRow): StoredFinding {
  return { key: r.pk as FindingKey, scanId: r.scan_id as ScanId, row };
}

function scanFromRow(r: Selectable<ScanMetadataTable>): ScanMetadata {
  return {
    scanId: r.scan_id as ScanId,
    toolId: toolIdOf(r.tool),
    kind: oneOf(TOOL_KINDS, r.tool_kind, "tool kind"),
    root: r.root,
    projectPath: r.project_path,
    scanTimestamp: toIso(r.scan_timestamp),
    command: r.command,
    exitCode: r.exit_code,
    durationMs: r.duration_ms,
    state: oneOf(RUN_STATES, r.state, "state"),
    stderr: r.stderr,
    failure: r.failure,
    findingCount: r.finding_count
  };
}

export interface ScanQuery {
  root?: string;
  toolId?: ToolId;
  limit?: number;
}

/** Read side of the audit database. */
export class ScanStore {
  constructor(private readonly db: Kysely<DB>) {}

  async getScan(scanId: ScanId): Promise<ScanMetadata | null> {
    const row = await this.db.selectFrom("scan_metadata").selectAll().where("scan_id", "=", scanId).executeTakeFirst();
    return row ? scanFromRow(row) : null;
  }

  async listScans(query: ScanQuery = {}): Promise<ScanMetadata[]> {
    let q = this.db.selectFrom("scan_metadata").selectAll();
    if (query.root !== undefined) q = q.where("root", "=", query.root);
    if (query.toolId !== undefined) q = q.where("tool", "=", query.toolId);
    const rows = await q
      .orderBy("scan_timestamp", "desc")
      .orderBy("scan_id", "desc")
      .limit(query.limit ?? 100)
      .execute();
    return rows.map(scanFromRow);
  }

  async listFindings(kind: ToolKind): Promise<StoredFinding[]> {
    switch (kind) {
      case "security": {
        const rows = await this.db.selectFrom("security_findings").selectAll().execute();
        return rows.map((r) =>
          stored(r, { kind, ...base(r), severity: r.severity, confidence: r.confidence, code: r.code, cweId: r.cwe_id })
        );
      }
      case "type-check": {
        const rows = await this.db.selectFrom("type_check_findings").selectAll().execute();
        return rows.map((r) => stored(r, { kind, ...base(r), severity: r.severity, hint: r.hint }));
      }
      case "complexity": {
        const rows = await this.db.selectFrom("complexity_findings").selectAll().execute();
        return rows.map((r) =>
          stored(r, {
            kind,
            ...base(r),
            metric: oneOf(METRICS, r.metric, "metric"),
            score: r.score === null ? null : Number(r.score),
            rank: r.rank,
            details: isJsonObject(r.details) ? r.details : {}
          })
        );
      }
      case "dead-code": {
        const rows = await this.db.selectFrom("dead_code_findings").selectAll().execute();
        return rows.map((r) => stored(r, { kind, ...base(r), confidence: r.confidence, symbolKind: r.symbol_kind }));
      }
      case "lint": {
        const rows = await this.db.selectFrom("lint_findings").selectAll().execute();
        return rows.map((r) =>
          stored(r, {
            kind,
            ...base(r),
            severity: r.severity === "warning" || r.severity === "error" ? r.severity : null,
            fatal: r.fatal,
            fixable: r.fixable
          })
        );
      }
    }
  }
}
