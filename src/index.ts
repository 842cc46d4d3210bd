import { bootstrapApp } from './app/bootstrap';
import { logger } from './shared/logging/logger';

/**
 * Start the sidekick MCP server on stdio.
 */
bootstrapApp().catch((error) => {
  logger.fatal({ error }, 'Sidekick failed to start');
  process.exit(1);
});
