import { createRequire } from "node:module";
import {
  createFileConfigSource,
  loadConfig,
} from "@portico/core/config";
import { createLogger } from "@portico/core/logger";
import { NodeServerAdapter } from "./adapter/node.js";
import { createEndpointApp } from "./app.js";
import { EndpointManager } from "./endpoint/manager.js";

const require = createRequire(import.meta.url);
const pkg = require("../package.json") as { version: string };

const DRAIN_TIMEOUT_MS = 5_000;

async function main(): Promise<void> {
  const config = await loadConfig();
  const logger = createLogger(config.logging, "portico");
  const source = createFileConfigSource(config);
  const manager = new EndpointManager({
    adapter: new NodeServerAdapter({ logger }),
    source,
    logger,
  });
  const startedAt = new Date();

  for (const [appId, endpointId] of source.entries()) {
    const app = createEndpointApp({
      endpointId,
      logger: logger.child({ endpoint: endpointId }),
      version: pkg.version,
      startedAt,
      getConfig: () => manager.config(endpointId),
    });

    try {
      await manager.start(appId, endpointId, app.fetch);
    } catch (err) {
      // Don't leave earlier endpoints running half-started
      await manager.stopAll();
      throw err;
    }
    logger.info(
      { endpoint: endpointId, url: manager.url(endpointId) },
      "Endpoint started",
    );
  }

  let draining: Promise<void> | undefined;

  async function drain(signal: string): Promise<void> {
    logger.info({ signal }, "Shutdown signal received, stopping endpoints");

    // Force exit after drain timeout
    setTimeout(() => {
      logger.warn("Drain timeout exceeded, forcing exit");
      process.exit(1);
    }, DRAIN_TIMEOUT_MS).unref();

    await manager.stopAll();
    logger.info("Endpoints stopped");
    process.exit(0);
  }

  // Only the first signal starts a drain
  function shutdown(signal: string): void {
    if (draining) {
      logger.info({ signal }, "Shutdown already in progress");
      return;
    }
    draining = drain(signal).catch((err: unknown) => {
      logger.error({ err }, "Shutdown failed");
      process.exit(1);
    });
  }

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err) => {
  console.error("Failed to start endpoints:", err);
  process.exit(1);
});
