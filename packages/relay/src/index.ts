// Relay Service - Entry point

import { loadConfig } from './config.js';
import { createConsoleLogger } from './logger.js';
import { Relay } from './relay.js';

const logger = createConsoleLogger();

async function main() {
  logger.info('[relay] Loading config...');
  const config = loadConfig();

  const relay = new Relay(config, logger);

  // Graceful shutdown
  let stopping = false;
  const shutdown = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    logger.info(`[relay] Received ${signal}, shutting down...`);
    await relay.stop();
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  await relay.start();
  logger.info(
    `[relay] Serving /poll and /stream on port ${relay.server.port}` +
      ` (long-poll ${config.transport.longPollTimeoutMs}ms, auth ${config.server.authToken ? 'on' : 'off'})`,
  );
}

main().catch((err) => {
  logger.error(`[relay] Fatal error: ${err}`);
  process.exit(1);
});
