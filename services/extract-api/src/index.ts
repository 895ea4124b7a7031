/**
 * Extract API entry point
 */

import { enableDefaultMetrics, loadConfig, logger } from '@finsheet/shared';
import { createApp } from './app';

const config = loadConfig();
enableDefaultMetrics();

const app = createApp(config);

const server = app.listen(config.port, () => {
  logger.info('Extract API started', {
    port: config.port,
    extraction_strategy: config.extractionStrategy,
    upload_dir: config.uploadDir,
  });
});

// Graceful shutdown
function shutdown(signal: string) {
  logger.info(`${signal} received, shutting down`);
  server.close(() => {
    process.exit(0);
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
