import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { AuditSummary, Orchestrator } from "../audit/orchestrator.js";
import type { AuditConfig } from "../config/auditConfig.js";
import { ConfigurationError } from "../core/errors.js";
import type { JsonObject } from "../core/json.js";
import type { ScanMetadata } from "../core/scan.js";
import { exportFindings } from "../export/exportFindings.js";
import type { ScanStore } from "../store/scanStore.js";
import type { ToolRegistry } from "../tools/registry.js";
import {
  zAuditRunInput,
  zAuditRunOutput,
  zFindingsExportInput,
  zFindingsExportOutput,
  zScanListInput,
  zScanListOutput,
  zToolListInput,
  zToolListOutput
} from "./toolSchemas.js";

export interface GatewayDeps {
  registry: ToolRegistry;
  orchestrator: Orchestrator;
  store: ScanStore;
  config: AuditConfig;
}

function toScanSummary(s: ScanMetadata): JsonObject {
  return {
    scan_id: s.scanId,
    tool: s.toolId,
    kind: s.kind,
    root: s.root,
    project_path: s.projectPath,
    scan_timestamp: s.scanTimestamp,
    state: s.state,
    exit_code: s.exitCode,
    duration_ms: s.durationMs,
    failure: s.failure,
    finding_count: s.findingCount
  };
}

function toAuditOutput(summary: AuditSummary): JsonObject {
  return {
    fatal: summary.fatal,
    projects: summary.projects.map((p) => ({
      root: p.root,
      project_path: p.projectPath,
      issue_count: p.issueCount,
      outcomes: p.outcomes.map((o) => ({
        tool_id: o.toolId,
        kind: o.kind,
        state: o.state,
        exit_code: o.exitCode,
        failed: o.failed,
        failure: o.failure,
        scan_id: o.scanId,
        submitted: o.submitted,
        newly_persisted: o.newlyPersisted,
        skipped_lines: o.skippedLines,
        duration_ms: o.durationMs
      }))
    }))
  };
}

function asInvalidParams(err: unknown): never {
  if (err instanceof ConfigurationError) throw new McpError(ErrorCode.InvalidParams, err.message);
  throw err;
}

export function createGatewayServer(deps: GatewayDeps): McpServer {
  const mcp = new McpServer({
    name: "staticaudit-gateway",
    version: "0.1.0"
  });

  mcp.registerTool(
    "tool_list",
    {
      description: "List the registered static-analysis tools.",
      inputSchema: zToolListInput,
      outputSchema: zToolListOutput
    },
    async () => {
      const tools = deps.registry.list().map((t) => ({
        tool_id: t.toolId,
        kind: t.kind,
        output: t.output,
        success_exit_codes: t.successExitCodes,
        description: t.description
      }));
      return {
        content: [{ type: "text", text: tools.map((t) => `${t.tool_id} (${t.kind})`).join("\n") }],
        structuredContent: { tools }
      };
    }
  );

  mcp.registerTool(
    "audit_run",
    {
      description: "Run the analyzers against a project (or a directory of projects) and store their findings.",
      inputSchema: zAuditRunInput,
      outputSchema: zAuditRunOutput
    },
    async (args) => {
      const summary = await deps.orchestrator
        .audit({
          root: args.path,
          toolIds: args.tools,
          jobs: args.jobs,
          multi: args.multi,
          stopOnError: args.stop_on_error,
          timeoutMs: args.timeout_seconds === undefined ? undefined : Math.round(args.timeout_seconds * 1000)
        })
        .catch(asInvalidParams);

      const failed = summary.projects.flatMap((p) => p.outcomes.filter((o) => o.failed)).length;
      const issues = summary.projects.reduce((sum, p) => sum + p.issueCount, 0);
      return {
        content: [
          {
            type: "text",
            text: `audit ${summary.fatal ? "stopped" : "complete"}: ${summary.projects.length} project(s), ${issues} issue(s), ${failed} failed tool run(s)`
          }
        ],
        structuredContent: toAuditOutput(summary)
      };
    }
  );

  mcp.registerTool(
    "scan_list",
    {
      description: "List stored scans, newest first.",
      inputSchema: zScanListInput,
      outputSchema: zScanListOutput
    },
    async (args) => {
      const scans = await deps.store.listScans({ root: args.root, toolId: args.tool, limit: args.limit });
      return {
        content: [{ type: "text", text: `${scans.length} scan(s)` }],
        structuredContent: { scans: scans.map(toScanSummary) }
      };
    }
  );

  mcp.registerTool(
    "findings_export",
    {
      description: "Export every stored finding as one JSON document.",
      inputSchema: zFindingsExportInput,
      outputSchema: zFindingsExportOutput
    },
    async (args) => {
      const bundle = await exportFindings(deps.store, {
        includeMetrics: args.include_metrics,
        countMetricsAsIssues: deps.config.countMetricsAsIssues
      });
      return {
        content: [{ type: "text", text: `${bundle.findings.length} finding(s), ${bundle.totals.issues} issue(s)` }],
        structuredContent: { ...bundle }
      };
    }
  );

  return mcp;
}
