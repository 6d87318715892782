/**
 * Extraction API
 *
 * HTTP front door for the extraction pipeline. Routes live in lib/app.ts.
 */

import { logger, config, createQueue } from '@noi-extract/shared';
import { createApp } from './lib/app';

const extractQueue = createQueue();

const app = createApp({ queue: extractQueue });

// Start server
const server = app.listen(config.apiPort, () => {
  logger.info('Extraction API started', { port: config.apiPort });
});

// Graceful shutdown
async function shutdown(signal: string) {
  logger.info(`${signal} received, shutting down`);
  server.close();
  await extractQueue.close();
  process.exit(0);
}

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));
