import { deriveFindingKeyFromParts, type FindingKey } from "../core/ids.js";
import type { FindingRow, ToolKind } from "../core/scan.js";
import type { FindingTableName } from "../db/types.js";

export const FINDING_TABLES = {
  security: "security_findings",
  "type-check": "type_check_findings",
  complexity: "complexity_findings",
  "dead-code": "dead_code_findings",
  lint: "lint_findings"
} as const satisfies Record<ToolKind, FindingTableName>;

function part(name: string, value: string | number | null): string {
  return `${name}=${value ?? ""}`;
}

/**
 * Identity of a finding: same table, project, location, rule and message always give the same key.
 * A complexity row also keys on its score and rank, so a changed measurement is stored again.
 */
export function findingKey(row: FindingRow): FindingKey {
  const parts = [
    part("table", FINDING_TABLES[row.kind]),
    part("root", row.root),
    part("path", row.filePath),
    part("tool", row.toolId),
    part("rule", row.rule),
    part("metric", row.kind === "complexity" ? row.metric : null),
    part("message", row.message),
    part("line", row.line),
    part("end_line", row.endLine),
    part("col", row.column),
    part("end_col", row.endColumn)
  ];
  if (row.kind === "complexity") parts.push(part("score", row.score), part("rank", row.rank));
  return deriveFindingKeyFromParts(parts);
}
