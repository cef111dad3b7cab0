import * as z from "zod/v4";
import type { TypeCheckFinding } from "../../core/scan.js";
import { relativePath, targetArg } from "../parsing.js";
import type { ToolDefinition } from "../types.js";

const zMypyLine = z.object({
  file: z.string(),
  line: z.number().int(),
  column: z.number().int(),
  message: z.string(),
  hint: z.string().nullable().optional(),
  code: z.string().nullable().optional(),
  severity: z.string()
});

function parseJsonLine(line: string): unknown {
  try {
    return JSON.parse(line) as unknown;
  } catch {
    return undefined;
  }
}

export const mypyTool: ToolDefinition<"type-check"> = {
  toolId: "mypy",
  kind: "type-check",
  output: "ndjson",
  successExitCodes: [0, 1],
  description: "mypy static type checker (JSON lines output).",

  plan(ctx) {
    return [{ label: "mypy", argv: ["mypy", "--output", "json", targetArg(ctx)], cwd: ctx.cwd }];
  },

  parse(run, ctx) {
    const rows: TypeCheckFinding[] = [];
    let skippedLines = 0;

    for (const raw of run.stdout.split(/\r?\n/)) {
      const line = raw.trim();
      if (!line) continue;
      const parsed = zMypyLine.safeParse(parseJsonLine(line));
      if (!parsed.success) {
        skippedLines++;
        continue;
      }
      const m = parsed.data;
      rows.push({
        kind: "type-check",
        toolId: "mypy",
        root: ctx.root,
        filePath: relativePath(m.file, ctx),
        line: m.line,
        endLine: null,
        column: m.column,
        endColumn: null,
        message: m.message,
        rule: m.code ?? null,
        severity: m.severity,
        hint: m.hint ?? null
      });
    }

    return { rows, skippedLines };
  }
};
