import * as z from "zod/v4";
import { ParseError } from "../../core/errors.js";
import { isJsonObject, type JsonObject } from "../../core/json.js";
import type { ComplexityFinding, ComplexityMetric } from "../../core/scan.js";
import { parseEach, relativePath, targetArg } from "../parsing.js";
import type { ParseContext, ToolDefinition } from "../types.js";

const METRICS: readonly ComplexityMetric[] = ["cc", "mi", "hal", "raw"];
const RANK_ORDER = ["A", "B", "C", "D", "E", "F"];

const zCcBlock = z.object({
  name: z.string(),
  type: z.string().optional(),
  lineno: z.number().int(),
  endline: z.number().int().optional(),
  complexity: z.number(),
  rank: z.string()
});

const zMi = z.object({ mi: z.number(), rank: z.string() });

const zRaw = z.object({
  loc: z.number(),
  sloc: z.number(),
  lloc: z.number(),
  comments: z.number(),
  multi: z.number(),
  blank: z.number(),
  single_comments: z.number().optional()
});

const zHal = z.object({
  total: z.object({
    volume: z.number(),
    difficulty: z.number(),
    effort: z.number(),
    time: z.number(),
    bugs: z.number()
  })
});

function worseRank(a: string, b: string): string {
  return RANK_ORDER.indexOf(b) > RANK_ORDER.indexOf(a) ? b : a;
}

export interface CcAggregate {
  blocks: number;
  total: number;
  max: number;
  avg: number;
  worstRank: string;
  rankCounts: Record<string, number>;
}

export function aggregateCc(blocks: ReadonlyArray<{ complexity: number; rank: string }>): CcAggregate {
  let total = 0;
  let max = 0;
  let worstRank = "A";
  const rankCounts: Record<string, number> = {};
  for (const b of blocks) {
    total += b.complexity;
    if (b.complexity > max) max = b.complexity;
    rankCounts[b.rank] = (rankCounts[b.rank] ?? 0) + 1;
    worstRank = worseRank(worstRank, b.rank);
  }
  return { blocks: blocks.length, total, max, avg: total / (blocks.length || 1), worstRank, rankCounts };
}

function metricRow(
  ctx: ParseContext,
  file: string,
  metric: ComplexityMetric,
  score: number,
  rank: string | null,
  details: JsonObject
): ComplexityFinding {
  return {
    kind: "complexity",
    toolId: "radon",
    root: ctx.root,
    filePath: relativePath(file, ctx),
    line: null,
    endLine: null,
    column: null,
    endColumn: null,
    message: null,
    rule: null,
    metric,
    score,
    rank,
    details
  };
}

/** `null` when the file has nothing to report, `undefined` when its entry is not understood. */
function convertEntry(ctx: ParseContext, metric: ComplexityMetric, file: string, entry: unknown): ComplexityFinding | null | undefined {
  switch (metric) {
    case "cc": {
      if (!Array.isArray(entry)) return undefined;
      const { items: blocks, skipped } = parseEach(zCcBlock, entry);
      if (skipped > 0) return undefined;
      if (!blocks.length) return null;
      const agg = aggregateCc(blocks);
      return metricRow(ctx, file, "cc", agg.max, agg.worstRank, {
        blocks: blocks.map((b) => ({ name: b.name, type: b.type ?? null, lineno: b.lineno, complexity: b.complexity, rank: b.rank })),
        total: agg.total,
        max: agg.max,
        avg: agg.avg,
        worst_rank: agg.worstRank,
        rank_counts: agg.rankCounts
      });
    }
    case "mi": {
      const r = zMi.safeParse(entry);
      return r.success ? metricRow(ctx, file, "mi", r.data.mi, r.data.rank, { mi: r.data.mi, rank: r.data.rank }) : undefined;
    }
    case "raw": {
      const r = zRaw.safeParse(entry);
      return r.success ? metricRow(ctx, file, "raw", r.data.sloc, null, { ...r.data }) : undefined;
    }
    case "hal": {
      const r = zHal.safeParse(entry);
      return r.success ? metricRow(ctx, file, "hal", r.data.total.volume, null, { ...r.data.total }) : undefined;
    }
  }
}

export const radonTool: ToolDefinition<"complexity"> = {
  toolId: "radon",
  kind: "complexity",
  output: "json",
  successExitCodes: [0],
  description: "Radon code metrics: cyclomatic complexity, maintainability index, Halstead and raw counts.",

  plan(ctx) {
    const arg = targetArg(ctx);
    return [
      { label: "cc", argv: ["radon", "cc", "-s", "-j", arg], cwd: ctx.cwd },
      { label: "mi", argv: ["radon", "mi", "-j", arg], cwd: ctx.cwd },
      { label: "hal", argv: ["radon", "hal", "-j", arg], cwd: ctx.cwd },
      { label: "raw", argv: ["radon", "raw", "-j", arg], cwd: ctx.cwd }
    ];
  },

  parse(run, ctx) {
    const payload = run.parsedJson;
    if (!isJsonObject(payload)) {
      throw new ParseError("radon: payload is not an object");
    }
    if (METRICS.every((m) => payload[m] === null || payload[m] === undefined)) {
      throw new ParseError("radon: no metric category produced JSON");
    }

    const rows: ComplexityFinding[] = [];
    const parseErrors: string[] = [];
    let skippedLines = 0;

    for (const metric of METRICS) {
      const byFile = payload[metric];
      // null: the step ran and printed no JSON; undefined: it never ran
      if (byFile === null) parseErrors.push(`radon ${metric}: no JSON`);
      if (byFile === null || byFile === undefined) continue;
      if (!isJsonObject(byFile)) {
        throw new ParseError(`radon: ${metric} output is not an object keyed by file`);
      }
      for (const [file, entry] of Object.entries(byFile)) {
        // radon reports unparsable files as {"error": "..."}
        const row = convertEntry(ctx, metric, file, entry);
        if (row === undefined) skippedLines++;
        else if (row) rows.push(row);
      }
    }

    return { rows, skippedLines, parseErrors };
  }
};
