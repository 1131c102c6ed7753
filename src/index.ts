#!/usr/bin/env node
/**
 * MCP server entry point: server lifecycle, transport setup, and shutdown.
 *
 * This file is the only place with side effects (signal handlers, I/O).
 * All business logic lives in the other modules.
 *
 * Transports:
 *   - stdio: for IDE / CLI integrations (via MCP SDK StdioServerTransport)
 *   - http: Streamable HTTP via @hono/node-server + Hono router
 */

import { serve, type ServerType } from "@hono/node-server";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { WebStandardStreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/webStandardStreamableHttp.js";
import { Hono } from "hono";
import { cors } from "hono/cors";

import { buildConfig, type ServerConfig, shouldShowHelp, VERSION } from "./config.js";
import { create_logger } from "./loggers/console_logger.js";
import { loadDefaultStyleConfig, loadStyleConfig, type StyleConfig } from "./styles/style_config.js";
import { createToolHandlerFactory } from "./tool_handler.js";
import { registerTools, TOOL_DEFINITIONS } from "./tool_registrations.js";
import { createHandlers } from "./tools.js";
import { errorMessage, readRelativeFile } from "./utils.js";

const SERVER_NAME = "drawio-layout-generator";

/** Request body size limit for the HTTP transport (10 MB). */
const MAX_BODY_SIZE = 10 * 1024 * 1024;

function showHelp(): never {
  console.log(`
${SERVER_NAME} MCP server (${VERSION})

Usage: drawio-layout-mcp [options]

Options:
  --http-port <number>     HTTP server port for MCP clients (default: 8080)
  --transport <type>       Transport type: stdio, http, or stdio,http (default: stdio)
  --style-config <path>    Style configuration JSON (default: the shipped config/styles.json)
  --help, -h               Show this help message

Environment variables:
  HTTP_PORT                Same as --http-port (CLI takes precedence)
  TRANSPORT                Same as --transport (CLI takes precedence)
  STYLE_CONFIG_PATH        Same as --style-config (CLI takes precedence)

Examples:
  drawio-layout-mcp                           # Use stdio transport
  drawio-layout-mcp --transport http          # Use HTTP transport on port 8080
  drawio-layout-mcp --http-port 4000          # Use HTTP on port 4000
  drawio-layout-mcp --transport stdio,http    # Use both transports
  `);
  process.exit(0);
}

const log = create_logger();
// Sent to MCP clients during initialization so the calling model describes
// diagrams the way the generator expects without extra round trips.
const SERVER_INSTRUCTIONS = readRelativeFile(import.meta.url, "..", "config", "instructions.md");

/**
 * Create a fully configured McpServer instance.
 * Each transport needs its own instance because the MCP SDK
 * only allows one transport per server.
 */
function createMcpServer(styleConfig: StyleConfig): McpServer {
  const srv = new McpServer(
    {
      name: SERVER_NAME,
      version: VERSION,
    },
    {
      capabilities: { tools: {} },
      instructions: SERVER_INSTRUCTIONS,
    },
  );

  const handlers = createHandlers({ logger: log, styleConfig: () => styleConfig });
  const createToolHandler = createToolHandlerFactory(handlers, log);
  registerTools(srv, createToolHandler);

  return srv;
}

/** Track all server instances for shutdown */
const servers: McpServer[] = [];

// ─── Shutdown Infrastructure ───────────────────────────────────

let httpServer: ServerType | undefined;

/** Guard against double-shutdown (signal re-delivery, etc.) */
let isShuttingDown = false;

function closeHttpServer(server: ServerType): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

/**
 * Gracefully shut down all resources. Idempotent.
 */
async function shutdown(reason: string): Promise<void> {
  if (isShuttingDown) return;
  isShuttingDown = true;

  log.debug(`Shutting down (reason: ${reason})`);

  // 1. Stop accepting new HTTP connections
  if (httpServer) {
    try {
      await closeHttpServer(httpServer);
    } catch (error) {
      log.debug(`HTTP server already closed: ${errorMessage(error)}`);
    }
    httpServer = undefined;
    log.debug("HTTP server closed");
  }

  // 2. Close all MCP server instances (flushes pending messages, disconnects transports)
  for (const srv of servers) {
    try {
      await srv.close();
    } catch (error) {
      log.debug(`MCP server close failed: ${errorMessage(error)}`);
    }
  }
  log.debug("Shutdown complete");
}

// ─── Signal & Error Handlers ──────────────────────────────────
// Windows only delivers SIGINT; SIGTERM and SIGHUP are Unix-only.
const signals: NodeJS.Signals[] = process.platform === "win32" ? ["SIGINT"] : ["SIGINT", "SIGTERM", "SIGHUP"];
for (const signal of signals) {
  process.on(signal, () => {
    void shutdown(signal).finally(() => process.exit(0));
  });
}

process.on("uncaughtException", (error) => {
  log.error("Uncaught exception:", error);
  void shutdown("uncaughtException").finally(() => process.exit(1));
});

process.on("unhandledRejection", (reason) => {
  log.error("Unhandled rejection:", reason);
  void shutdown("unhandledRejection").finally(() => process.exit(1));
});

// ─── Transport Startup ────────────────────────────────────────

async function start_stdio_transport(styleConfig: StyleConfig) {
  const srv = createMcpServer(styleConfig);
  servers.push(srv);
  const transport = new StdioServerTransport();
  await srv.connect(transport);
  log.debug("STDIO transport active");
}

function start_streamable_http_transport(http_port: number, styleConfig: StyleConfig) {
  const app = new Hono();

  // Enable CORS for all origins
  app.use(
    "*",
    cors({
      origin: "*",
      allowMethods: ["GET", "POST", "DELETE", "OPTIONS"],
      allowHeaders: [
        "Content-Type",
        "mcp-session-id",
        "Last-Event-ID",
        "mcp-protocol-version",
      ],
      exposeHeaders: ["mcp-session-id", "mcp-protocol-version"],
    }),
  );

  app.use("*", async (c, next) => {
    const contentLength = c.req.header("content-length");
    if (contentLength && parseInt(contentLength, 10) > MAX_BODY_SIZE) {
      return c.json({ error: "Request body too large" }, 413);
    }
    await next();
    return;
  });

  app.get("/health", (c) => c.json({ status: "ok" }));

  // Stateless transports are single-use: create a fresh transport
  // and server per request so the SDK doesn't reject reuse.
  app.all("/mcp", async (c) => {
    const transport = new WebStandardStreamableHTTPServerTransport();
    const srv = createMcpServer(styleConfig);
    await srv.connect(transport);
    return transport.handleRequest(c.req.raw);
  });

  httpServer = serve({ fetch: app.fetch, port: http_port });
  log.debug("Streamable HTTP transport active");
  log.debug(`Health check: http://localhost:${http_port}/health`);
  log.debug(`MCP endpoint: http://localhost:${http_port}/mcp`);
}

async function main() {
  const args = process.argv.slice(2);
  if (shouldShowHelp(args)) {
    showHelp();
  }

  const configResult = buildConfig(args);
  if (configResult instanceof Error) {
    console.error(`Error: ${configResult.message}`);
    process.exit(1);
  }
  const config: ServerConfig = configResult;

  // Load the style configuration up front so a broken file fails at startup
  // rather than on the first tool call.
  let styleConfig: StyleConfig;
  try {
    styleConfig = config.styleConfigPath ? loadStyleConfig(config.styleConfigPath) : loadDefaultStyleConfig();
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}`);
    process.exit(1);
  }

  log.debug(`${SERVER_NAME} v${VERSION} starting`);
  log.debug(`Transports: ${config.transports.join(", ")}`);
  log.debug(`Tools: ${TOOL_DEFINITIONS.length}`);
  if (config.styleConfigPath) {
    log.debug(`Style configuration: ${config.styleConfigPath}`);
  }

  if (config.transports.includes("stdio")) {
    await start_stdio_transport(styleConfig);
  }
  if (config.transports.includes("http")) {
    start_streamable_http_transport(config.httpPort, styleConfig);
  }

  log.debug(`${SERVER_NAME} v${VERSION} is ready`);
}

main().catch((error: unknown) => {
  log.error("Fatal error in main():", error);
  process.exit(1);
});
