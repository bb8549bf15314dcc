/**
 * MCP server bootstrap shared by the packages that expose tools.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createLogger, type Logger } from "./logger.js";

export interface ServerConfig {
  name: string;
  version: string;
}

export interface ServerBootstrapOptions<S> {
  config: ServerConfig;

  /** Build the services the tools operate on. */
  createServices: (logger: Logger) => S | Promise<S>;

  /** Register every tool against the server. */
  registerTools: (server: McpServer, services: S) => void;

  /** Runs before the transport connects. */
  onStartup?: (services: S, logger: Logger) => Promise<void> | void;

  /** Runs once on SIGTERM/SIGINT, before the server closes. */
  onShutdown?: (services: S, logger: Logger) => Promise<void> | void;
}

/**
 * Create services, register tools, install signal handlers and connect stdio.
 *
 * @example
 * ```typescript
 * bootstrapServer({
 *   config: { name: "scanwarden:scan-runner", version: "0.1.0" },
 *   createServices: () => ({ scheduler }),
 *   registerTools: registerAllTools,
 *   onShutdown: async ({ scheduler }) => { await scheduler.stopAll(); },
 * });
 * ```
 */
export async function bootstrapServer<S>(options: ServerBootstrapOptions<S>): Promise<void> {
  const { config, createServices, registerTools, onStartup, onShutdown } = options;
  const logger = createLogger(config.name);

  const services = await createServices(logger);

  const server = new McpServer({
    name: config.name,
    version: config.version,
  });

  registerTools(server, services);

  const transport = new StdioServerTransport();

  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info("Shutting down", { signal });
    try {
      await onShutdown?.(services, logger);
      await server.close();
    } catch (error: unknown) {
      logger.error("Shutdown failed", { error: error instanceof Error ? error.message : String(error) });
      process.exit(1);
    }
    process.exit(0);
  };

  process.on("SIGTERM", (signal) => void shutdown(signal));
  process.on("SIGINT", (signal) => void shutdown(signal));

  await onStartup?.(services, logger);

  await server.connect(transport);
  logger.info("Ready", { version: config.version });
}

/**
 * bootstrapServer with fatal-error handling. Preferred entry point.
 */
export function runServer<S>(options: ServerBootstrapOptions<S>): void {
  bootstrapServer(options).catch((error: unknown) => {
    console.error(`[${options.config.name}] Fatal error:`, error);
    process.exit(1);
  });
}

export { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
