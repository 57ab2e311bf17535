/**
 * Shared setup for commands: config, logger, resolvers.
 */
import { loadConfig } from '../../config/schema.js';
import { createLogger } from '../../config/logger.js';
import { createResolvers, type Resolvers } from '../../discovery/orchestrator.js';
import { formatCliError } from '../../errors.js';

export function createCommandResolvers(): Resolvers {
  const config = loadConfig();
  const logger = createLogger(config.LOG_LEVEL);
  return createResolvers(config, logger);
}

/**
 * Print a formatted error to stderr and mark the process as failed.
 */
export function reportFailure(error: unknown, subject: string): void {
  const message = formatCliError(error instanceof Error ? error : new Error(String(error)), subject);
  console.error(`\n${message}\n`);
  process.exitCode = 1;
}
