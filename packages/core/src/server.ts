import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createLogger } from "./logger.js";

const log = createLogger("server");

export interface ServerIdentity {
  name: string;
  version: string;
}

export interface ServerBootstrapOptions<S> {
  identity: ServerIdentity;
  /** Builds the services the tools close over. A throw aborts startup. */
  createServices: () => S | Promise<S>;
  registerTools: (server: McpServer, services: S) => void;
  /** Called once the stdio transport is connected. */
  onReady?: (services: S) => void;
}

/**
 * Build the services, register every tool and serve them over stdio until
 * SIGTERM or SIGINT.
 *
 * @example
 * await bootstrapServer({
 *   identity: { name: "archlens", version: "0.1.0" },
 *   createServices: () => ({ orchestrator }),
 *   registerTools: registerAllTools,
 * });
 */
export async function bootstrapServer<S>(options: ServerBootstrapOptions<S>): Promise<McpServer> {
  const { identity } = options;
  const services = await options.createServices();

  const server = new McpServer({ name: identity.name, version: identity.version });
  options.registerTools(server, services);

  let closing = false;
  const stop = (signal: NodeJS.Signals): void => {
    if (closing) return;
    closing = true;
    log.info(`${signal} received, closing`);
    server.close().then(
      () => process.exit(0),
      (error: unknown) => {
        log.error("Close failed", error);
        process.exit(1);
      }
    );
  };
  process.once("SIGTERM", stop);
  process.once("SIGINT", stop);

  await server.connect(new StdioServerTransport());
  log.info(`${identity.name} ${identity.version} on stdio`);
  options.onReady?.(services);
  return server;
}

/** Entry point for server scripts: any startup failure exits with status 1. */
export function runServer<S>(options: ServerBootstrapOptions<S>): void {
  bootstrapServer(options).catch((error: unknown) => {
    log.error("Fatal error", error);
    process.exit(1);
  });
}

export { McpServer };
