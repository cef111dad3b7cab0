import * as z from "zod/v4";
import type { SecurityFinding } from "../../core/scan.js";
import { safeJoin } from "../../execution/workspace.js";
import { expectPayload, parseEach, relativePath, targetArg } from "../parsing.js";
import type { ToolDefinition } from "../types.js";

const SEMGREP_CONFIG = "p/ci";
const OUTPUT_FILE = "semgrep.json";

const zPosition = z.object({
  line: z.number().int(),
  col: z.number().int().optional()
});

const zSemgrepResult = z.object({
  check_id: z.string(),
  path: z.string(),
  start: zPosition,
  end: zPosition.optional(),
  extra: z
    .object({
      message: z.string().optional(),
      severity: z.string().optional(),
      lines: z.string().optional(),
      metadata: z
        .object({
          confidence: z.string().optional(),
          cwe: z.union([z.string(), z.array(z.string())]).optional()
        })
        .optional()
    })
    .optional()
});

const zSemgrepPayload = z.object({
  results: z.array(z.unknown())
});

/** `"CWE-79: Improper Neutralization..."` → 79 */
export function parseCweId(cwe: string | string[] | undefined): number | null {
  const first = Array.isArray(cwe) ? cwe[0] : cwe;
  if (!first) return null;
  const m = /CWE-(\d+)/i.exec(first);
  return m?.[1] ? Number(m[1]) : null;
}

export const semgrepTool: ToolDefinition<"security"> = {
  toolId: "semgrep",
  kind: "security",
  output: "json",
  successExitCodes: [0, 1],
  description: "Semgrep OSS rule scan (p/ci ruleset).",

  plan(ctx) {
    const outputFile = safeJoin(ctx.scratchDir, OUTPUT_FILE);
    return [
      {
        label: "semgrep",
        argv: ["semgrep", "scan", "--config", SEMGREP_CONFIG, "--json", "--quiet", "--output", outputFile, targetArg(ctx)],
        cwd: ctx.cwd,
        env: { SEMGREP_SEND_METRICS: "off" },
        outputFile
      }
    ];
  },

  parse(run, ctx) {
    const payload = expectPayload("semgrep", zSemgrepPayload, run.parsedJson);
    const { items, skipped } = parseEach(zSemgrepResult, payload.results);

    const rows = items.map(
      (r): SecurityFinding => ({
        kind: "security",
        toolId: "semgrep",
        root: ctx.root,
        filePath: relativePath(r.path, ctx),
        line: r.start.line,
        endLine: r.end?.line ?? null,
        column: r.start.col ?? null,
        endColumn: r.end?.col ?? null,
        message: r.extra?.message ?? null,
        rule: r.check_id,
        severity: r.extra?.severity?.toLowerCase() ?? null,
        confidence: r.extra?.metadata?.confidence ?? null,
        code: r.extra?.lines ?? null,
        cweId: parseCweId(r.extra?.metadata?.cwe)
      })
    );

    return { rows, skippedLines: skipped };
  }
};
