#!/usr/bin/env node
// src/index.ts

import { QueryFirewallServer } from './server.js';
import { loadConfig } from './config/index.js';
import { logger } from './config/logger.js';

async function main() {
  try {
    // Validate configuration before starting server
    const config = loadConfig();

    const server = new QueryFirewallServer(config);

    const shutdown = (signal: string) => {
      logger.info(`Received ${signal}, shutting down gracefully...`);
      server.stop()
        .then(() => process.exit(0))
        .catch(error => {
          logger.error('Shutdown failed', error);
          process.exit(1);
        });
    };

    // Graceful shutdown
    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));

    await server.start();
  } catch (error) {
    logger.error('Failed to start server', error);
    process.exit(1);
  }
}

// Catch unhandled rejections
process.on('unhandledRejection', (reason, promise) => {
  logger.error('Unhandled Rejection', { reason, promise });
  process.exit(1);
});

void main();
