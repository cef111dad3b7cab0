import path from "path";
import type * as z from "zod/v4";
import { ParseError } from "../core/errors.js";
import type { ToolId } from "../core/scan.js";
import type { ParseContext, PlanContext } from "./types.js";

/** Argument naming what to scan from inside `ctx.cwd`. */
export function targetArg(ctx: PlanContext): string {
  return ctx.target === ctx.cwd ? "." : path.basename(ctx.target);
}

/** Project-relative POSIX path for a path as printed by a tool. */
export function relativePath(raw: string, ctx: ParseContext): string {
  const abs = path.isAbsolute(raw) ? raw : path.resolve(ctx.cwd, raw);
  if (abs === ctx.target && ctx.target !== ctx.cwd) return path.basename(ctx.target);

  let rel = path.isAbsolute(raw) ? path.relative(ctx.cwd, raw) : raw;
  rel = path.posix.normalize(rel.split(path.sep).join("/").replace(/\\/g, "/"));
  while (rel.startsWith("./")) rel = rel.slice(2);
  return rel === "" ? "." : rel;
}

function describeIssues(error: z.ZodError): string {
  const first = error.issues[0];
  if (!first) return "invalid payload";
  const at = first.path.length ? first.path.join(".") : "<root>";
  const more = error.issues.length > 1 ? ` (+${error.issues.length - 1} more)` : "";
  return `${at}: ${first.message}${more}`;
}

/** Validates a tool's top-level payload; any mismatch is a ParseError. */
export function expectPayload<T>(toolId: ToolId, schema: z.ZodType<T>, value: unknown): T {
  if (value === null || value === undefined) {
    throw new ParseError(`${toolId}: no JSON payload`);
  }
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ParseError(`${toolId}: unexpected payload shape: ${describeIssues(result.error)}`);
  }
  return result.data;
}

/** Validates the elements of an array payload one by one, counting the ones that do not fit. */
export function parseEach<T>(schema: z.ZodType<T>, items: readonly unknown[]): { items: T[]; skipped: number } {
  const out: T[] = [];
  let skipped = 0;
  for (const item of items) {
    const result = schema.safeParse(item);
    if (result.success) out.push(result.data);
    else skipped++;
  }
  return { items: out, skipped };
}
