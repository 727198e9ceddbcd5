#!/usr/bin/env node
import { createChainConnector } from "./chain";
import { loadConfig, loadEnvFile } from "./config";
import { createLogger } from "./logger";
import { createServer } from "./server";

async function main(): Promise<void> {
  loadEnvFile();
  const config = loadConfig();
  const logger = createLogger(config.logLevel);

  if (config.upstream) {
    logger.info(`Chaining through socks5://${config.upstream.host}:${config.upstream.port}`);
  }

  const server = createServer({
    logger,
    connector: config.upstream ? createChainConnector(config.upstream) : undefined,
  });

  try {
    await server.listen(config.port, config.host);
  } catch (err) {
    logger.error(`Unable to bind ${config.host}:${config.port}: ${String(err)}`);
    process.exitCode = 1;
    return;
  }

  await new Promise<void>((resolve) => {
    process.once("SIGINT", () => resolve());
    process.once("SIGTERM", () => resolve());
  });

  logger.info("Shutting down...");
  await server.close();
  logger.info("Shutdown complete");
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
