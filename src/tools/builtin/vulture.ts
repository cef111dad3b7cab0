import type { DeadCodeFinding } from "../../core/scan.js";
import { relativePath, targetArg } from "../parsing.js";
import type { ToolDefinition } from "../types.js";

const LINE_RE = /^(?<file>.+?):(?<line>\d+):\s*(?<message>.*?)(?:\s*\((?<conf>\d+)%\s+confidence\))?\s*$/;

/** `unused function 'helper'` → `unused-function` */
export function symbolKindOf(message: string): string | null {
  const head = message.split("'")[0] ?? "";
  const words = head.trim().toLowerCase().split(/[\s/]+/).filter(Boolean);
  return words.length ? words.slice(0, 2).join("-") : null;
}

export const vultureTool: ToolDefinition<"dead-code"> = {
  toolId: "vulture",
  kind: "dead-code",
  output: "text",
  successExitCodes: [0, 3],
  description: "Vulture dead-code finder for Python sources.",

  plan(ctx) {
    return [
      {
        label: "vulture",
        argv: ["vulture", targetArg(ctx), "--min-confidence", String(ctx.minConfidence)],
        cwd: ctx.cwd
      }
    ];
  },

  parse(run, ctx) {
    const rows: DeadCodeFinding[] = [];
    let skippedLines = 0;

    for (const raw of run.stdout.split(/\r?\n/)) {
      const line = raw.trim();
      if (!line) continue;
      const groups = LINE_RE.exec(line)?.groups;
      const file = groups?.file;
      const lineNo = groups?.line;
      if (!groups || !file || !lineNo) {
        skippedLines++;
        continue;
      }

      const confidence = groups.conf !== undefined ? Number(groups.conf) : null;
      if (confidence !== null && confidence < ctx.minConfidence) continue;

      const message = (groups.message ?? "").trim();
      const symbolKind = symbolKindOf(message);
      rows.push({
        kind: "dead-code",
        toolId: "vulture",
        root: ctx.root,
        filePath: relativePath(file, ctx),
        line: Number(lineNo),
        endLine: Number(lineNo),
        column: null,
        endColumn: null,
        message,
        rule: symbolKind,
        confidence,
        symbolKind
      });
    }

    return { rows, skippedLines };
  }
};
