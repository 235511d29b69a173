import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import express, { type Express, type Request, type Response } from "express";
import type { ILogger } from "../../infrastructure/logging/logger";
import type { HealthReport } from "../mcp/lyric-tools-server";

export interface StreamableHttpAppOptions {
  /** Mount point of the MCP endpoint, e.g. `/mcp`. */
  readonly path: string;
  readonly createServer: () => McpServer;
  readonly healthReport: () => HealthReport;
  readonly logger: ILogger;
}

const JSONRPC_VERSION = "2.0";

/**
 * Stateless Streamable HTTP: every POST gets a fresh server and transport,
 * so no session state lives between requests.
 */
export function createStreamableHttpApp({
  path,
  createServer,
  healthReport,
  logger,
}: StreamableHttpAppOptions): Express {
  const app = express();
  app.use(express.json({ limit: "1mb" }));

  app.get("/healthz", (_req: Request, res: Response) => {
    res.json(healthReport());
  });

  app.post(path, async (req: Request, res: Response) => {
    const server = createServer();
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
      enableJsonResponse: true,
    });

    res.on("close", () => {
      Promise.all([transport.close(), server.close()]).catch((error: unknown) => {
        logger.warn("Failed to release MCP request resources", {
          error: error instanceof Error ? error.message : String(error),
        });
      });
    });

    try {
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      logger.error("Failed to handle MCP request", {
        error: error instanceof Error ? error.message : String(error),
      });
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: JSONRPC_VERSION,
          error: { code: -32603, message: "Internal server error" },
          id: null,
        });
      }
    }
  });

  const methodNotAllowed = (_req: Request, res: Response) => {
    res.status(405).json({
      jsonrpc: JSONRPC_VERSION,
      error: { code: -32000, message: "Method not allowed." },
      id: null,
    });
  };
  app.get(path, methodNotAllowed);
  app.delete(path, methodNotAllowed);

  return app;
}
