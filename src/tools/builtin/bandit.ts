import * as z from "zod/v4";
import type { SecurityFinding } from "../../core/scan.js";
import { expectPayload, parseEach, relativePath, targetArg } from "../parsing.js";
import type { ToolDefinition } from "../types.js";

const zBanditResult = z.object({
  filename: z.string(),
  line_number: z.number().int(),
  line_range: z.array(z.number().int()).optional(),
  col_offset: z.number().int().nullable().optional(),
  end_col_offset: z.number().int().nullable().optional(),
  issue_text: z.string(),
  issue_severity: z.string().nullable().optional(),
  issue_confidence: z.string().nullable().optional(),
  issue_cwe: z.object({ id: z.number().int() }).nullable().optional(),
  test_id: z.string(),
  test_name: z.string(),
  code: z.string().nullable().optional()
});

const zBanditPayload = z.object({
  results: z.array(z.unknown())
});

export const banditTool: ToolDefinition<"security"> = {
  toolId: "bandit",
  kind: "security",
  output: "json",
  successExitCodes: [0, 1],
  description: "Bandit security linter for Python sources.",

  plan(ctx) {
    return [{ label: "bandit", argv: ["bandit", "-r", targetArg(ctx), "-f", "json", "-q"], cwd: ctx.cwd }];
  },

  parse(run, ctx) {
    const payload = expectPayload("bandit", zBanditPayload, run.parsedJson);
    const { items, skipped } = parseEach(zBanditResult, payload.results);

    const rows = items.map((r): SecurityFinding => {
      const range = r.line_range ?? [];
      return {
        kind: "security",
        toolId: "bandit",
        root: ctx.root,
        filePath: relativePath(r.filename, ctx),
        line: r.line_number,
        endLine: range.length ? Math.max(...range) : r.line_number,
        column: r.col_offset ?? null,
        endColumn: r.end_col_offset ?? null,
        message: r.issue_text,
        rule: `${r.test_id}:${r.test_name}`,
        severity: r.issue_severity ?? null,
        confidence: r.issue_confidence ?? null,
        code: r.code ?? null,
        cweId: r.issue_cwe?.id ?? null
      };
    });

    return { rows, skippedLines: skipped };
  }
};
