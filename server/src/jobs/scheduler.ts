import cron, { type ScheduledTask } from 'node-cron';
import { ConfigError, errorMessage, RunInProgressError } from '../shared/errors.js';
import type { Logger } from '../utils/logger.js';
import type { PredictionRunner } from '../services/predictionRunner.js';

export interface ScheduleOptions {
  schedule: string;
  timeZone: string;
}

export interface SchedulerStatus {
  scheduled: boolean;
  schedule: string;
  timeZone: string;
  ticks: number;
  skipped: number;
  lastTickAt?: string;
  lastStatus?: 'success' | 'failed' | 'skipped';
  lastError?: string;
}

/** Cron-driven dashboard refresh sharing the runner's overlap guard. */
export class DashboardScheduler {
  private task: ScheduledTask | null = null;
  private ticks = 0;
  private skipped = 0;
  private lastTickAt?: string;
  private lastStatus?: SchedulerStatus['lastStatus'];
  private lastError?: string;

  constructor(
    private readonly runner: PredictionRunner,
    private readonly opts: ScheduleOptions,
    private readonly logger: Logger,
  ) {}

  start() {
    if (this.task) return;
    if (!cron.validate(this.opts.schedule)) {
      throw new ConfigError(`invalid cron expression: ${this.opts.schedule}`);
    }
    this.task = cron.schedule(this.opts.schedule, () => this.tick(), { scheduled: true, timezone: this.opts.timeZone });
    this.logger.info({ cron: this.opts.schedule, tz: this.opts.timeZone }, 'dashboard_job_scheduled');
  }

  /** Never rejects: failures land in status() and the log. */
  async tick(): Promise<void> {
    this.ticks++;
    this.lastTickAt = new Date().toISOString();
    try {
      await this.runner.run('cron');
      this.lastStatus = 'success';
      this.lastError = undefined;
    } catch (err) {
      if (err instanceof RunInProgressError) {
        this.skipped++;
        this.lastStatus = 'skipped';
        this.logger.warn({ cron: this.opts.schedule }, 'dashboard_job_overlap_skipped');
        return;
      }
      this.lastStatus = 'failed';
      this.lastError = errorMessage(err);
      this.logger.error({ err }, 'scheduled_run_failed');
    }
  }

  /** Runs immediately, outside the cron cadence. */
  runNow() {
    return this.runner.run('manual');
  }

  stop() {
    if (!this.task) return;
    this.task.stop();
    this.task = null;
    this.logger.info('dashboard_job_stopped');
  }

  status(): SchedulerStatus {
    return {
      scheduled: this.task !== null,
      schedule: this.opts.schedule,
      timeZone: this.opts.timeZone,
      ticks: this.ticks,
      skipped: this.skipped,
      lastTickAt: this.lastTickAt,
      lastStatus: this.lastStatus,
      lastError: this.lastError,
    };
  }
}
