/**
 * Scheduler
 *
 * Triggers a scrape job every N hours on a cron schedule
 */

import cron from 'node-cron';
import type { ScheduledTask } from 'node-cron';
import { config } from './config/index.js';
import type { ScrapeOrchestrator } from './pipeline.js';
import { logger } from './utils/logger.js';
import type { JobStats } from './types/index.js';

export interface SchedulerOptions {
  intervalHours: number;
  timezone: string;
}

export interface SchedulerStatus {
  schedulerRunning: boolean;
  jobInProgress: boolean;
  lastRun: JobStats | null;
}

/**
 * Cron expression firing at minute 0 every `intervalHours` hours.
 *
 * The hour step restarts at midnight, so only divisors of 24 give a fixed
 * interval.
 */
export function cronExpressionFor(intervalHours: number): string {
  if (!Number.isInteger(intervalHours) || intervalHours < 1 || 24 % intervalHours !== 0) {
    throw new Error(`Interval of ${intervalHours} hours does not divide a day evenly`);
  }
  return `0 */${intervalHours} * * *`;
}

export class Scheduler {
  private task: ScheduledTask | null = null;
  private readonly options: SchedulerOptions;

  constructor(
    private readonly orchestrator: ScrapeOrchestrator,
    options: Partial<SchedulerOptions> = {}
  ) {
    this.options = {
      intervalHours: options.intervalHours ?? config.scheduler.intervalHours,
      timezone: options.timezone ?? config.scheduler.timezone,
    };
  }

  /**
   * Register the cron task. With `runImmediately`, one job is started right
   * away without waiting for the first tick.
   */
  async start(options: { runImmediately?: boolean } = {}): Promise<void> {
    if (this.task) {
      logger.warn('Scheduler already started');
      return;
    }

    const cronExpression = cronExpressionFor(this.options.intervalHours);

    if (!cron.validate(cronExpression)) {
      throw new Error(`Invalid cron expression: ${cronExpression}`);
    }

    logger.info(
      { cronExpression, timezone: this.options.timezone, intervalHours: this.options.intervalHours },
      'Starting scheduler'
    );

    this.task = cron.schedule(
      cronExpression,
      () => {
        this.trigger().catch((error: unknown) => {
          logger.error({ error }, 'Scheduled job failed');
        });
      },
      { timezone: this.options.timezone }
    );

    logger.info('Scheduler started');

    if (options.runImmediately) {
      logger.info('Running initial job');
      await this.trigger();
    }
  }

  stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
      logger.info('Scheduler stopped');
    }
  }

  getStatus(): SchedulerStatus {
    return {
      schedulerRunning: this.task !== null,
      jobInProgress: this.orchestrator.isJobRunning(),
      lastRun: this.orchestrator.getLastStats(),
    };
  }

  private async trigger(): Promise<void> {
    const stats = await this.orchestrator.runJob();
    if (!stats) {
      logger.info('Previous job still running, tick coalesced');
    }
  }
}
