import { promises as fs } from "fs";
import path from "path";
import type { JsonObject } from "../core/json.js";
import { TOOL_KINDS, type StoredFinding, type ToolKind } from "../core/scan.js";
import type { ScanStore } from "../store/scanStore.js";

export interface FindingsExport {
  export_version: 1;
  generated_at: string;
  roots: string[];
  totals: {
    by_kind: Partial<Record<ToolKind, number>>;
    issues: number;
  };
  findings: JsonObject[];
}

export interface ExportOptions {
  /** Include complexity rows (defaults to `countMetricsAsIssues`). */
  includeMetrics?: boolean;
  countMetricsAsIssues?: boolean;
  now?: () => Date;
}

function kindSpecific(f: StoredFinding): JsonObject {
  const row = f.row;
  switch (row.kind) {
    case "security":
      return { severity: row.severity, confidence: row.confidence, code: row.code, cwe_id: row.cweId };
    case "type-check":
      return { severity: row.severity, hint: row.hint };
    case "complexity":
      return { metric: row.metric, score: row.score, rank: row.rank, details: row.details };
    case "dead-code":
      return { confidence: row.confidence, symbol_kind: row.symbolKind };
    case "lint":
      return { severity: row.severity, fatal: row.fatal, fixable: row.fixable };
  }
}

function toRecord(f: StoredFinding): JsonObject {
  const r = f.row;
  return {
    key: f.key,
    scan_id: f.scanId,
    kind: r.kind,
    tool: r.toolId,
    root: r.root,
    file_path: r.filePath,
    line: r.line,
    end_line: r.endLine,
    column: r.column,
    end_column: r.endColumn,
    rule: r.rule,
    message: r.message,
    ...kindSpecific(f)
  };
}

function compareFindings(a: StoredFinding, b: StoredFinding): number {
  const kind = TOOL_KINDS.indexOf(a.row.kind) - TOOL_KINDS.indexOf(b.row.kind);
  if (kind) return kind;
  if (a.row.root !== b.row.root) return a.row.root < b.row.root ? -1 : 1;
  if (a.row.filePath !== b.row.filePath) return a.row.filePath < b.row.filePath ? -1 : 1;
  const la = a.row.line ?? -1;
  const lb = b.row.line ?? -1;
  if (la !== lb) return la - lb;
  return a.key < b.key ? -1 : a.key > b.key ? 1 : 0;
}

export async function exportFindings(store: ScanStore, opts: ExportOptions = {}): Promise<FindingsExport> {
  const countMetrics = opts.countMetricsAsIssues ?? false;
  const includeMetrics = opts.includeMetrics ?? countMetrics;
  const kinds = TOOL_KINDS.filter((k) => k !== "complexity" || includeMetrics);

  const all: StoredFinding[] = [];
  const byKind: Partial<Record<ToolKind, number>> = {};
  for (const kind of kinds) {
    const rows = await store.listFindings(kind);
    byKind[kind] = rows.length;
    all.push(...rows);
  }
  all.sort(compareFindings);

  const issues = all.filter((f) => f.row.kind !== "complexity" || countMetrics).length;
  const roots = [...new Set(all.map((f) => f.row.root))].sort();

  return {
    export_version: 1,
    generated_at: (opts.now ?? (() => new Date()))().toISOString(),
    roots,
    totals: { by_kind: byKind, issues },
    findings: all.map(toRecord)
  };
}

export async function writeExport(outputPath: string, bundle: FindingsExport): Promise<void> {
  await fs.mkdir(path.dirname(path.resolve(outputPath)), { recursive: true });
  await fs.writeFile(outputPath, JSON.stringify(bundle, null, 2) + "\n", "utf8");
}
