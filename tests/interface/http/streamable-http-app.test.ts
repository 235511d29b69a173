import type { Server } from "node:http";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { createLyricUseCases } from "../../../src/bootstrap/lyric-use-cases";
import { silentLogger } from "../../../src/infrastructure/logging/logger";
import { createStreamableHttpApp } from "../../../src/interface/http/streamable-http-app";
import {
  buildHealthReport,
  createLyricToolsServer,
} from "../../../src/interface/mcp/lyric-tools-server";
import { createSampleDictionary } from "../../fixtures/sample-dictionary";

const SERVER = { name: "lyrical-mcp-test", version: "9.9.9" };
const NOW = new Date("2026-01-02T03:04:05.000Z");

describe("Streamable HTTP app", () => {
  let httpServer: Server;
  let baseUrl: string;

  beforeAll(async () => {
    const dependencies = {
      server: SERVER,
      logger: silentLogger,
      getUseCases: async () => createLyricUseCases(createSampleDictionary()),
    };
    const app = createStreamableHttpApp({
      path: "/mcp",
      createServer: () => createLyricToolsServer(dependencies),
      healthReport: () => buildHealthReport(SERVER, NOW),
      logger: silentLogger,
    });

    httpServer = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, "127.0.0.1", () => resolve(listening));
    });
    const address = httpServer.address();
    if (!address || typeof address === "string") {
      throw new Error("Expected the test server to listen on a TCP port");
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => {
      httpServer.close((error) => (error ? reject(error) : resolve()));
    });
  });

  it("serves the health report", async () => {
    const response = await fetch(`${baseUrl}/healthz`);
    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      status: "healthy",
      timestamp: "2026-01-02T03:04:05.000Z",
      server: "lyrical-mcp-test",
      version: "9.9.9",
      tools_available: ["ping", "health_check", "count_syllables", "find_rhymes"],
    });
  });

  it("rejects GET on the MCP endpoint", async () => {
    const response = await fetch(`${baseUrl}/mcp`);
    expect(response.status).toBe(405);
    expect(await response.json()).toEqual({
      jsonrpc: "2.0",
      error: { code: -32000, message: "Method not allowed." },
      id: null,
    });
  });

  it("rejects DELETE on the MCP endpoint since there are no sessions", async () => {
    const response = await fetch(`${baseUrl}/mcp`, { method: "DELETE" });
    expect(response.status).toBe(405);
    expect(await response.json()).toEqual({
      jsonrpc: "2.0",
      error: { code: -32000, message: "Method not allowed." },
      id: null,
    });
  });

  it("answers a stateless tool call with JSON", async () => {
    const response = await fetch(`${baseUrl}/mcp`, {
      method: "POST",
      headers: {
        "content-type": "application/json",
        accept: "application/json, text/event-stream",
      },
      body: JSON.stringify({
        jsonrpc: "2.0",
        id: 1,
        method: "tools/call",
        params: {
          name: "count_syllables",
          arguments: { input_string: "cat\nhello" },
        },
      }),
    });

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({
      jsonrpc: "2.0",
      id: 1,
      result: {
        content: [{ type: "text", text: "[1,2]" }],
        structuredContent: { result: [1, 2] },
      },
    });
  });
});
