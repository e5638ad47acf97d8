#!/usr/bin/env node
import { loadConfig } from "./config.js";
import { DeadlineServer } from "./deadlineServer.js";
import { logger } from "./logger.js";

async function main() {
  const config = loadConfig();
  const server = new DeadlineServer(config);
  await server.start();
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, error instanceof Error ? error.message : "Failed to start server");
  process.exit(1);
});
