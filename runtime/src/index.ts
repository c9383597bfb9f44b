/**
 * Pocketmind Runtime
 *
 * Entry point: loads configuration, starts the host bridge and the
 * WebSocket host link, and shuts both down on SIGINT/SIGTERM.
 */

import { loadConfig, loadEnvFile } from "./config.js";
import { initRuntimeLogging, createComponentLogger } from "./logging.js";
import { createRuntimeContext } from "./context.js";

loadEnvFile();
const config = loadConfig();
initRuntimeLogging({ minLevel: config.logLevel, logDir: config.logDir });

const log = createComponentLogger("main");
const context = createRuntimeContext(config);

context.bridge.start();
const port = await context.server.start();
log.info("Runtime ready", { port, models: config.models, hasApiKey: Boolean(config.apiKey) });

let stopping = false;

async function shutdown(signal: string): Promise<void> {
  if (stopping) return;
  stopping = true;
  log.info(`Received ${signal}, shutting down`);
  try {
    await context.server.stop();
    await context.bridge.stop();
    process.exit(0);
  } catch (err) {
    log.error("Shutdown failed", err);
    process.exit(1);
  }
}

process.on("SIGINT", () => {
  void shutdown("SIGINT");
});
process.on("SIGTERM", () => {
  void shutdown("SIGTERM");
});
