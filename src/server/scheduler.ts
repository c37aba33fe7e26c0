/**
 * Scheduled maintenance for ticketlink
 *
 * Uses node-cron to refresh downloaded indexes ahead of lookups and to prune
 * replies older than the repeat window from the sent log.
 */

import cron from 'node-cron';
import type { TicketRegistry } from '../core/registry';
import { ConfigError } from '../core/errors';
import { createLogger } from '../core/logger';

const log = createLogger('scheduler');

export interface SchedulerConfig {
  cronExpression: string;
  registry: TicketRegistry;
}

export interface SchedulerHandle {
  stop: () => void;
  isRunning: () => boolean;
}

export interface MaintenanceResult {
  refreshed: number;
  pruned: number;
}

/**
 * One maintenance cycle: refresh index providers, then prune the sent log
 */
export async function runMaintenance(registry: TicketRegistry): Promise<MaintenanceResult> {
  const refreshed = await registry.refreshIndexes();
  const pruned = registry.pruneSent();
  return { refreshed, pruned };
}

/**
 * Start a cron scheduler that runs maintenance on schedule
 * Returns a handle to stop the scheduler
 */
export function startScheduler(config: SchedulerConfig): SchedulerHandle {
  if (!cron.validate(config.cronExpression)) {
    throw new ConfigError(`Invalid cron expression: ${config.cronExpression}`);
  }

  log.info({ cron: config.cronExpression }, 'Scheduler configured');

  let isRunning = false;

  const task = cron.schedule(
    config.cronExpression,
    async () => {
      if (isRunning) {
        log.warn('Previous maintenance still running, skipping this cycle');
        return;
      }

      isRunning = true;
      const startTime = Date.now();

      try {
        const result = await runMaintenance(config.registry);
        log.info({ ...result, durationMs: Date.now() - startTime }, 'Maintenance complete');
      } catch (error) {
        log.error({ err: error }, 'Maintenance failed');
      } finally {
        isRunning = false;
      }
    },
    {
      timezone: 'UTC',
    }
  );

  task.start();
  log.info('Scheduler started');

  return {
    stop: () => {
      task.stop();
      log.info('Scheduler stopped');
    },
    isRunning: () => isRunning,
  };
}
