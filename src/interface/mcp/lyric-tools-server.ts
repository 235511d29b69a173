import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import type { RhymeGroups } from "../../domain/entities/pronunciation";
import type { LyricUseCasesProvider } from "../../bootstrap/lyric-use-cases";
import type { ServerConfig } from "../../infrastructure/config/config-manager";
import { ErrorHandler, ErrorType } from "../../infrastructure/error/error-handler";
import type { ILogger } from "../../infrastructure/logging/logger";
import type { Result } from "../../infrastructure/result/result";

export const TOOL_NAMES = [
  "ping",
  "health_check",
  "count_syllables",
  "find_rhymes",
] as const;

export interface HealthReport {
  readonly status: "healthy";
  readonly timestamp: string;
  readonly server: string;
  readonly version: string;
  readonly tools_available: readonly string[];
}

export interface LyricToolsServerDependencies {
  readonly server: ServerConfig;
  readonly logger: ILogger;
  readonly getUseCases: LyricUseCasesProvider;
  readonly now?: () => Date;
}

const inputStringSchema = z
  .string()
  .describe("Text to analyse. Each line is counted separately.");

const inputWordSchema = z
  .string()
  .describe(
    "A word or phrase. Only the last word of a phrase is used (e.g. 'the cat' rhymes on 'cat').",
  );

export function buildHealthReport(
  server: ServerConfig,
  now: Date = new Date(),
): HealthReport {
  return {
    status: "healthy",
    timestamp: now.toISOString(),
    server: server.name,
    version: server.version,
    tools_available: [...TOOL_NAMES],
  };
}

export function createLyricToolsServer({
  server: serverConfig,
  logger,
  getUseCases,
  now = () => new Date(),
}: LyricToolsServerDependencies): McpServer {
  const server = new McpServer({
    name: serverConfig.name,
    version: serverConfig.version,
  });
  const errorHandler = new ErrorHandler(logger);

  server.registerTool(
    "ping",
    {
      title: "Ping",
      description:
        "Simple ping tool to test server responsiveness. Returns 'pong'.",
    },
    async () => ({
      content: [{ type: "text" as const, text: "pong" }],
    }),
  );

  server.registerTool(
    "health_check",
    {
      title: "Health check",
      description:
        "Reports server status, name, version and the tools it exposes.",
    },
    async () => {
      const report = buildHealthReport(serverConfig, now());
      return jsonResult(report, { ...report });
    },
  );

  server.registerTool(
    "count_syllables",
    {
      title: "Count syllables per line",
      description:
        "Counts the syllables in each line of the input using the CMU Pronouncing Dictionary. Words missing from the dictionary are estimated by their vowel letters.",
      inputSchema: { input_string: inputStringSchema },
    },
    async ({ input_string }) => {
      const outcome = await errorHandler.safeExecute(
        async () => {
          const { countSyllables } = await getUseCases();
          return countSyllables.execute({ input: input_string });
        },
        ErrorType.DICTIONARY,
        "count_syllables",
        { length: input_string.length },
      );

      return outcome.fold(
        (counts) => jsonResult(counts, { result: counts }),
        failureResult,
      );
    },
  );

  server.registerTool(
    "find_rhymes",
    {
      title: "Find rhymes",
      description:
        "Finds perfect rhymes for a word (or the last word of a phrase), grouped into 1, 2 and 3 syllable words, at most 20 each. Uses the CMU Pronouncing Dictionary.",
      inputSchema: { input_word: inputWordSchema },
    },
    async ({ input_word }) => {
      const outcome = await errorHandler.safeExecute(
        async () => {
          const { findRhymes } = await getUseCases();
          return findRhymes.execute({ input: input_word });
        },
        ErrorType.DICTIONARY,
        "find_rhymes",
        { input: input_word },
      );

      return outcome.fold(
        (lookup) => rhymeResult(lookup, logger),
        failureResult,
      );
    },
  );

  return server;
}

export async function startStdioServer(
  dependencies: LyricToolsServerDependencies,
): Promise<McpServer> {
  const server = createLyricToolsServer(dependencies);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  return server;
}

function rhymeResult(
  lookup: Result<RhymeGroups>,
  logger: ILogger,
): CallToolResult {
  return lookup.fold(
    (groups) => jsonResult(groups, groups),
    (error) => {
      // A missing word is an ordinary answer, not a tool failure.
      logger.debug("Rhyme lookup returned no word", { reason: error.message });
      const body = { error: error.message };
      return jsonResult(body, body);
    },
  );
}

function jsonResult(
  value: unknown,
  structuredContent: Record<string, unknown>,
): CallToolResult {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(value) }],
    structuredContent,
  };
}

function failureResult(error: Error): CallToolResult {
  return {
    isError: true,
    content: [{ type: "text" as const, text: error.message }],
  };
}
