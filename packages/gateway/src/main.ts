/**
 * Gateway entry point: loads configuration from the environment, serves the
 * demo tools, and shuts down on SIGINT/SIGTERM.
 */

import { createLogger } from "@toolchat/toolbox";
import { loadConfig } from "./config.js";
import { demoTools } from "./demo-tools.js";
import { startServer } from "./server.js";

const log = createLogger("gateway");

async function main(): Promise<void> {
  const config = loadConfig();
  log.level = config.logLevel;

  const gateway = await startServer(config, { tools: demoTools, logger: log });

  let stopping = false;
  const shutdown = (signal: NodeJS.Signals): void => {
    if (stopping) return;
    stopping = true;
    log.info({ signal }, "Shutting down");
    gateway.close().then(
      () => process.exit(0),
      (error: unknown) => {
        log.error({ err: error }, "Error while closing server");
        process.exit(1);
      },
    );
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((error: unknown) => {
  log.fatal({ err: error }, "Gateway failed to start");
  process.exit(1);
});
