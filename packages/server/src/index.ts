import { serve } from "@hono/node-server";
import { createRequire } from "node:module";
import { loadConfig } from "@filedock/core/config";
import { createServer } from "./bootstrap.js";

const require = createRequire(import.meta.url);
const pkg = require("../package.json") as { version: string };

const DRAIN_TIMEOUT_MS = 5_000;

async function main(): Promise<void> {
  const config = await loadConfig({ homePath: process.env.FILEDOCK_HOME });
  const context = await createServer(config);
  const { app, logger, root } = context;

  const server = serve(
    { fetch: app.fetch, port: config.server.port, hostname: config.server.host },
    (info) => {
      logger.info(
        { port: info.port, host: config.server.host, root, version: pkg.version },
        "HTTP server started",
      );
    },
  );

  let shuttingDown = false;

  async function shutdown(signal: string): Promise<void> {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info({ signal }, "Shutdown signal received, draining connections");

    await context.cleanup();

    server.close(() => {
      logger.info("Server stopped");
      process.exit(0);
    });

    // Force exit after drain timeout
    setTimeout(() => {
      logger.warn("Drain timeout exceeded, forcing exit");
      process.exit(1);
    }, DRAIN_TIMEOUT_MS).unref();
  }

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

main().catch((err) => {
  console.error("Failed to start server:", err);
  process.exit(1);
});
