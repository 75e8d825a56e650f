import cron from 'node-cron';
import type { ScheduledTask } from 'node-cron';
import logger from '../config/logger';
import type { CleanupService } from './cleanup.service';
import type { LifecycleOrchestrator } from './lifecycle.service';
import type { TrialService } from './trial.service';

export const CRON_SCHEDULES = {
  RETENTION_SWEEP: '0 3 * * *',
  TRIAL_SWEEP: '0 * * * *',
  TRIAL_WARNINGS: '0 10 * * *',
} as const;

export interface SchedulerJobs {
  cleanup: CleanupService;
  lifecycle: LifecycleOrchestrator;
  trials: TrialService;
}

export class RelayScheduler {
  private tasks: ScheduledTask[] = [];

  constructor(private readonly jobs: SchedulerJobs, private readonly timeZone: string) {}

  start(): void {
    if (this.tasks.length > 0) {
      return;
    }
    const options = { timezone: this.timeZone };

    this.tasks = [
      cron.schedule(CRON_SCHEDULES.RETENTION_SWEEP, () => void this.runRetentionSweep(), options),
      cron.schedule(CRON_SCHEDULES.TRIAL_SWEEP, () => void this.runTrialSweep(), options),
      cron.schedule(CRON_SCHEDULES.TRIAL_WARNINGS, () => void this.runTrialWarnings(), options),
    ];

    logger.info(
      { jobs: ['Retention sweep (daily at 03:00)', 'Trial sweep (hourly)', 'Trial warnings (daily at 10:00)'], timeZone: this.timeZone },
      '[Cron] Jobs scheduled'
    );
  }

  stop(): void {
    for (const task of this.tasks) {
      task.stop();
    }
    this.tasks = [];
    logger.info('[Cron] Jobs stopped');
  }

  async runRetentionSweep(): Promise<void> {
    try {
      logger.info('[Cron] Starting retention sweep...');
      const result = await this.jobs.cleanup.runDailyCleanup();
      logger.info(result, '[Cron] Retention sweep complete');
    } catch (error) {
      logger.error({ err: error }, '[Cron] Retention sweep failed');
    }
  }

  async runTrialSweep(): Promise<void> {
    try {
      logger.info('[Cron] Starting trial sweep...');
      await this.jobs.lifecycle.checkTrials();
    } catch (error) {
      logger.error({ err: error }, '[Cron] Trial sweep failed');
    }
  }

  async runTrialWarnings(): Promise<void> {
    try {
      logger.info('[Cron] Sending trial warnings...');
      await this.jobs.trials.notifyExpiringTrials();
    } catch (error) {
      logger.error({ err: error }, '[Cron] Trial warnings failed');
    }
  }
}
