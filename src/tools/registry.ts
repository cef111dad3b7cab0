import { BUILTIN_TOOL_IDS, TOOL_KINDS, isToolId, type ToolId } from "../core/scan.js";
import { ConfigurationError } from "../core/errors.js";
import { builtinTools } from "./builtin/index.js";
import type { AnyToolDefinition, ToolTable } from "./types.js";

const OUTPUT_FORMATS = new Set(["json", "ndjson", "text"]);

/** Refuses to start unless every registered id maps to a complete definition. */
export function validateToolTable(table: ToolTable): void {
  for (const toolId of BUILTIN_TOOL_IDS) {
    const tool: AnyToolDefinition | undefined = table[toolId];
    if (!tool) throw new Error(`tool:${toolId}: missing from tool table`);
    if (tool.toolId !== toolId) {
      throw new Error(`tool:${toolId}: registered under the wrong id (${tool.toolId})`);
    }
    if (!(TOOL_KINDS as readonly string[]).includes(tool.kind)) {
      throw new Error(`tool:${toolId}: invalid kind: ${String(tool.kind)}`);
    }
    if (!OUTPUT_FORMATS.has(tool.output)) {
      throw new Error(`tool:${toolId}: invalid output format: ${String(tool.output)}`);
    }
    if (typeof tool.plan !== "function") throw new Error(`tool:${toolId}: missing plan()`);
    if (typeof tool.parse !== "function") throw new Error(`tool:${toolId}: missing parse()`);
    if (!tool.successExitCodes.length || !tool.successExitCodes.every((c) => Number.isInteger(c) && c >= 0)) {
      throw new Error(`tool:${toolId}: successExitCodes must be non-negative integers`);
    }
  }
  for (const key of Object.keys(table)) {
    if (!isToolId(key)) throw new Error(`tool:${key}: not a registered tool id`);
  }
}

export class ToolRegistry {
  constructor(private readonly table: ToolTable = builtinTools) {
    validateToolTable(table);
  }

  ids(): ToolId[] {
    return [...BUILTIN_TOOL_IDS];
  }

  get(toolId: string): AnyToolDefinition {
    if (!isToolId(toolId)) {
      throw new ConfigurationError(`unknown tool: ${toolId} (expected one of ${BUILTIN_TOOL_IDS.join(", ")})`);
    }
    return this.table[toolId];
  }

  resolve(toolIds: readonly string[] | undefined): ToolId[] {
    if (!toolIds || toolIds.length === 0) return this.ids();
    const out: ToolId[] = [];
    for (const id of toolIds) {
      const tool = this.get(id);
      if (!out.includes(tool.toolId)) out.push(tool.toolId);
    }
    return out;
  }

  isSuccessExit(toolId: ToolId, exitCode: number): boolean {
    return this.table[toolId].successExitCodes.includes(exitCode);
  }

  list(): Array<{ toolId: ToolId; kind: AnyToolDefinition["kind"]; output: string; successExitCodes: number[]; description: string }> {
    return this.ids().map((id) => {
      const t = this.table[id];
      return { toolId: t.toolId, kind: t.kind, output: t.output, successExitCodes: [...t.successExitCodes], description: t.description };
    });
  }
}
