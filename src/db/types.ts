import type { ColumnType, JSONColumnType } from "kysely";

type OptionalNullable<T> = ColumnType<T | null, T | null | undefined, T | null>;
type JsonObject = Record<string, unknown>;
type Json = JSONColumnType<JsonObject, JsonObject, JsonObject>;

export interface ScanMetadataTable {
  scan_id: string;
  tool: string;
  tool_kind: string;
  root: string;
  project_path: string;
  scan_timestamp: string;
  command: string;
  exit_code: number;
  duration_ms: number;
  state: string;
  stderr: string;
  failure: OptionalNullable<string>;
  finding_count: number;
}

interface FindingColumns {
  pk: string;
  scan_id: string;
  tool: string;
  root: string;
  file_path: string;
  line_number: OptionalNullable<number>;
  end_line_number: OptionalNullable<number>;
  col_offset: OptionalNullable<number>;
  end_col_offset: OptionalNullable<number>;
  message: OptionalNullable<string>;
  rule: OptionalNullable<string>;
}

export interface SecurityFindingsTable extends FindingColumns {
  severity: OptionalNullable<string>;
  confidence: OptionalNullable<string>;
  code: OptionalNullable<string>;
  cwe_id: OptionalNullable<number>;
}

export interface TypeCheckFindingsTable extends FindingColumns {
  severity: OptionalNullable<string>;
  hint: OptionalNullable<string>;
}

export interface ComplexityFindingsTable extends FindingColumns {
  metric: string;
  score: OptionalNullable<number>;
  rank: OptionalNullable<string>;
  details: Json;
}

export interface DeadCodeFindingsTable extends FindingColumns {
  confidence: OptionalNullable<number>;
  symbol_kind: OptionalNullable<string>;
}

export interface LintFindingsTable extends FindingColumns {
  severity: OptionalNullable<string>;
  fatal: boolean;
  fixable: boolean;
}

export interface DB {
  scan_metadata: ScanMetadataTable;
  security_findings: SecurityFindingsTable;
  type_check_findings: TypeCheckFindingsTable;
  complexity_findings: ComplexityFindingsTable;
  dead_code_findings: DeadCodeFindingsTable;
  lint_findings: LintFindingsTable;
}

export type FindingTableName = Exclude<keyof DB, "scan_metadata">;
