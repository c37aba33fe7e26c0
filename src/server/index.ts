/**
 * ticketlink Server Module
 *
 * Provides the REST API and scheduled maintenance.
 *
 * Usage:
 *   import { startServer } from './server';
 *   await startServer({ port: 8080, host: '127.0.0.1', registry });
 */

export { createServer, type ServerConfig } from './app';
export { startScheduler, runMaintenance, type SchedulerConfig, type SchedulerHandle } from './scheduler';

import type { ServerConfig } from './app';
import type { SchedulerHandle } from './scheduler';
import { createServer } from './app';
import { startScheduler } from './scheduler';
import { errorMessage } from '../core/errors';
import { createLogger } from '../core/logger';

const log = createLogger('server');

export interface StartServerConfig extends ServerConfig {
  cronExpression?: string;
}

/**
 * Start the REST API and, when a cron expression is given, the maintenance scheduler
 */
export async function startServer(config: StartServerConfig): Promise<void> {
  log.info('Starting ticketlink server');

  const fastify = await createServer(config);

  try {
    await fastify.listen({ port: config.port, host: config.host });
    log.info({ host: config.host, port: config.port }, 'Server listening');
  } catch (error) {
    log.error({ err: error }, 'Failed to start server');
    throw error;
  }

  let schedulerHandle: SchedulerHandle | undefined;
  if (config.cronExpression) {
    try {
      schedulerHandle = startScheduler({ cronExpression: config.cronExpression, registry: config.registry });
    } catch (error) {
      log.error({ err: errorMessage(error) }, 'Failed to start scheduler');
      // Continue without scheduler
    }
  }

  log.info({
    providers: config.registry.list().length,
    scheduler: !!schedulerHandle,
  }, 'Server ready to accept requests');

  const shutdown = async (signal: string) => {
    log.info({ signal }, 'Shutting down');
    schedulerHandle?.stop();

    try {
      await fastify.close();
      config.sentLog?.close();
      log.info('Server shutdown complete');
      process.exit(0);
    } catch (error) {
      log.error({ err: error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}
