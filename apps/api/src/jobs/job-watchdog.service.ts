import {
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as cron from 'node-cron';
import { JobsRepository } from './repositories/jobs.repository';
import { readPositiveNumber } from '../common/config/positive-number';

const DEFAULT_CRON = '* * * * *'; // every minute
const DEFAULT_STALE_AFTER_MS = 5 * 60 * 1000;
const BATCH_SIZE = 100;

export const ABANDONED_ERROR_CODE = 'JOB_ABANDONED';

/**
 * JobWatchdog - fails jobs nobody is working on any more.
 *
 * A job can be left PENDING or RUNNING forever when the process dies
 * mid-run. Every JOB_WATCHDOG_CRON tick, jobs older than JOB_STALE_AFTER_MS
 * in either state are moved to FAILED with code JOB_ABANDONED.
 *
 * Config:
 *   JOB_WATCHDOG_ENABLED - "false" disables the schedule (default: enabled)
 *   JOB_WATCHDOG_CRON    - cron expression (default: every minute)
 *   JOB_STALE_AFTER_MS   - age threshold (default: 5 minutes)
 */
@Injectable()
export class JobWatchdog implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(JobWatchdog.name);
  private readonly enabled: boolean;
  private readonly schedule: string;
  private readonly staleAfterMs: number;
  private task: cron.ScheduledTask | null = null;

  constructor(
    private readonly jobs: JobsRepository,
    configService: ConfigService,
  ) {
    this.enabled =
      configService.get<string>('JOB_WATCHDOG_ENABLED', 'true') !== 'false';
    this.schedule = configService.get<string>('JOB_WATCHDOG_CRON', DEFAULT_CRON);
    this.staleAfterMs = readPositiveNumber(
      configService,
      'JOB_STALE_AFTER_MS',
      DEFAULT_STALE_AFTER_MS,
    );
  }

  onModuleInit(): void {
    if (!this.enabled) {
      this.logger.log('Job watchdog disabled (JOB_WATCHDOG_ENABLED=false)');
      return;
    }

    let expression = this.schedule;
    if (!cron.validate(expression)) {
      this.logger.error(
        `Invalid cron schedule "${expression}", using default "${DEFAULT_CRON}"`,
      );
      expression = DEFAULT_CRON;
    }

    this.task = cron.schedule(expression, () => {
      this.sweep().catch((error: unknown) => {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.error(`Watchdog sweep failed: ${message}`);
      });
    });
    this.logger.log(`Job watchdog started with schedule "${expression}"`);
  }

  onModuleDestroy(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
      this.logger.log('Job watchdog stopped');
    }
  }

  /**
   * Fails every stale job once. Returns how many were failed; jobs that
   * finished between the read and the write are left alone.
   */
  async sweep(now: Date = new Date()): Promise<number> {
    const cutoff = new Date(now.getTime() - this.staleAfterMs);
    const stale = await this.jobs.findStale(cutoff, BATCH_SIZE);

    let failed = 0;
    for (const job of stale) {
      const updated = await this.jobs.markFailed(
        job.id,
        {
          code: ABANDONED_ERROR_CODE,
          message: `Job was ${job.status} for longer than ${this.staleAfterMs} ms`,
        },
        now,
      );
      if (updated) {
        failed++;
        this.logger.warn(`Job ${job.id} (${job.kind}) abandoned while ${job.status}`);
      }
    }

    if (failed > 0) {
      this.logger.log(`Watchdog failed ${failed} stale job(s)`);
    }
    return failed;
  }
}
