import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createAuditApp } from "./app.js";
import { createGatewayServer } from "./mcp/gatewayServer.js";

async function main(): Promise<void> {
  const app = await createAuditApp();
  const server = createGatewayServer({
    registry: app.registry,
    orchestrator: app.orchestrator,
    store: app.store,
    config: app.config
  });
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`staticaudit gateway ready (${app.env.databaseUrl ? "postgres" : "pg-mem"})`);
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
