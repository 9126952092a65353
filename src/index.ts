#!/usr/bin/env node
/**
 * Container DNS - Entry Point
 *
 * Resolves <container>.<domain> for the containers running on this Docker host
 */
import { createApplication, logger, ConfigError } from './core/index.js';

async function main(): Promise<void> {
  logger.info('Container DNS starting...');

  try {
    const app = createApplication();
    await app.start();
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.fatal({ details: error.details }, error.message);
    } else {
      logger.fatal({ error }, 'Failed to start container DNS');
    }
    process.exit(1);
  }
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
