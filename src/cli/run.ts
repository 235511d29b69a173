import { startMcpServer } from "../interface/mcp/start-server";

export async function runCli(): Promise<void> {
  try {
    await startMcpServer();
  } catch (error) {
    console.error("Failed to start MCP server", error);
    process.exit(1);
  }
}
