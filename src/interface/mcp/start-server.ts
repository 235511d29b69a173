import type { Server } from "node:http";
import {
  getLyricUseCases,
  type LyricUseCasesProvider,
} from "../../bootstrap/lyric-use-cases";
import {
  ConfigManager,
  type ServerConfig,
  type TransportConfig,
  type TransportMode,
} from "../../infrastructure/config/config-manager";
import { ConsoleLogger, type ILogger } from "../../infrastructure/logging/logger";
import { createStreamableHttpApp } from "../http/streamable-http-app";
import {
  buildHealthReport,
  createLyricToolsServer,
  startStdioServer,
  type LyricToolsServerDependencies,
} from "./lyric-tools-server";

export interface StartMcpServerOptions {
  readonly config?: ConfigManager;
  readonly logger?: ILogger;
  readonly getUseCases?: LyricUseCasesProvider;
}

export interface RunningMcpServer {
  readonly transport: TransportMode;
  /** Endpoint URL in HTTP mode, with the port actually bound. */
  readonly url?: string;
  close(): Promise<void>;
}

export async function startMcpServer({
  config = ConfigManager.fromEnvironment(process.env),
  logger,
  getUseCases = getLyricUseCases,
}: StartMcpServerOptions = {}): Promise<RunningMcpServer> {
  const logging = config.getLoggingConfig();
  const rootLogger =
    logger ??
    new ConsoleLogger({
      level: config.getLogLevel(),
      structured: logging.enableStructuredLogging,
      scope: "lyrical-mcp",
    });
  const serverConfig = config.getServerConfig();
  const transport = config.getTransportConfig();
  const dependencies: LyricToolsServerDependencies = {
    server: serverConfig,
    logger: rootLogger.child("tools"),
    getUseCases,
  };

  rootLogger.info("Starting lyrical MCP server", {
    name: serverConfig.name,
    version: serverConfig.version,
    transport: transport.mode,
  });

  const running =
    transport.mode === "http"
      ? await startHttp(transport, serverConfig, dependencies, rootLogger)
      : await startStdio(dependencies);

  void warmUp(getUseCases, rootLogger);
  return running;
}

async function startHttp(
  transport: TransportConfig,
  serverConfig: ServerConfig,
  dependencies: LyricToolsServerDependencies,
  logger: ILogger,
): Promise<RunningMcpServer> {
  const app = createStreamableHttpApp({
    path: transport.path,
    createServer: () => createLyricToolsServer(dependencies),
    healthReport: () => buildHealthReport(serverConfig),
    logger: logger.child("http"),
  });
  const server = app.listen(transport.port, transport.host);
  await listen(server);

  const address = server.address();
  const port =
    address && typeof address !== "string" ? address.port : transport.port;
  const url = `http://${transport.host}:${port}${transport.path}`;
  logger.info("Listening for Streamable HTTP requests", { url });

  return {
    transport: "http",
    url,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      }),
  };
}

async function startStdio(
  dependencies: LyricToolsServerDependencies,
): Promise<RunningMcpServer> {
  const server = await startStdioServer(dependencies);
  return {
    transport: "stdio",
    close: () => server.close(),
  };
}

function listen(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.once("listening", () => resolve());
    server.once("error", reject);
  });
}

/** Loads the dictionary ahead of the first tool call. */
async function warmUp(
  getUseCases: LyricUseCasesProvider,
  logger: ILogger,
): Promise<void> {
  const startedAt = Date.now();
  try {
    await getUseCases();
    logger.info("Pronunciation dictionary loaded", {
      durationMs: Date.now() - startedAt,
    });
  } catch (error) {
    logger.error("Failed to load pronunciation dictionary", {
      error: error instanceof Error ? error.message : String(error),
    });
  }
}
