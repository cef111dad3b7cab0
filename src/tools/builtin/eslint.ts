import * as z from "zod/v4";
import type { LintFinding } from "../../core/scan.js";
import { expectPayload, parseEach, relativePath, targetArg } from "../parsing.js";
import type { ToolDefinition } from "../types.js";

const zEslintMessage = z.object({
  ruleId: z.string().nullable().optional(),
  severity: z.number().int(),
  message: z.string(),
  line: z.number().int().optional(),
  column: z.number().int().optional(),
  endLine: z.number().int().optional(),
  endColumn: z.number().int().optional(),
  fatal: z.boolean().optional(),
  fix: z.looseObject({}).optional()
});

const zEslintFile = z.object({
  filePath: z.string(),
  messages: z.array(z.unknown())
});

function severityName(severity: number): LintFinding["severity"] {
  if (severity === 2) return "error";
  if (severity === 1) return "warning";
  return null;
}

export const eslintTool: ToolDefinition<"lint"> = {
  toolId: "eslint",
  kind: "lint",
  output: "json",
  successExitCodes: [0, 1],
  description: "ESLint with the project's own configuration, JSON formatter.",

  plan(ctx) {
    return [{ label: "eslint", argv: ["eslint", "-f", "json", targetArg(ctx)], cwd: ctx.cwd }];
  },

  parse(run, ctx) {
    const files = expectPayload("eslint", z.array(z.unknown()), run.parsedJson);
    const rows: LintFinding[] = [];
    let skippedLines = 0;

    const parsedFiles = parseEach(zEslintFile, files);
    skippedLines += parsedFiles.skipped;

    for (const file of parsedFiles.items) {
      const filePath = relativePath(file.filePath, ctx);
      const { items: messages, skipped } = parseEach(zEslintMessage, file.messages);
      skippedLines += skipped;

      for (const msg of messages) {
        rows.push({
          kind: "lint",
          toolId: "eslint",
          root: ctx.root,
          filePath,
          line: msg.line ?? null,
          endLine: msg.endLine ?? null,
          column: msg.column ?? null,
          endColumn: msg.endColumn ?? null,
          message: msg.message,
          rule: msg.ruleId ?? null,
          severity: severityName(msg.severity),
          fatal: msg.fatal ?? false,
          fixable: msg.fix !== undefined
        });
      }
    }

    return { rows, skippedLines };
  }
};
