import { Injectable, Logger, OnApplicationShutdown } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { plainToInstance } from 'class-transformer';
import { JobsRepository } from './repositories/jobs.repository';
import { JobHandlerRegistry } from './job-handler.registry';
import { JobTimeoutError } from './exceptions/job.exceptions';
import { toJobError } from './utils/to-job-error';
import { readPositiveNumber } from '../common/config/positive-number';
import type { JobResult } from './interfaces/job-handler.interface';

const DEFAULT_TIMEOUT_MS = 60_000;

/**
 * JobRunner - executes submitted jobs off the request path.
 *
 * Lifecycle of one job:
 *   1. Claim PENDING → RUNNING (conditional; a lost claim ends the run)
 *   2. Run the kind's handler, racing it against JOB_TIMEOUT_MS
 *   3. RUNNING → SUCCEEDED with the result, or → FAILED with { code, message }
 *
 * Errors are logged and recorded on the job; nothing propagates to callers.
 * In-flight runs are tracked so shutdown (and tests) can wait for them.
 * A handler that misses its deadline stays tracked until it settles; its
 * signal is aborted, so it must not write anything after that point.
 */
@Injectable()
export class JobRunner implements OnApplicationShutdown {
  private readonly logger = new Logger(JobRunner.name);
  private readonly inFlight = new Set<Promise<void>>();
  private readonly timeoutMs: number;

  constructor(
    private readonly jobs: JobsRepository,
    private readonly registry: JobHandlerRegistry,
    configService: ConfigService,
  ) {
    this.timeoutMs = readPositiveNumber(configService, 'JOB_TIMEOUT_MS', DEFAULT_TIMEOUT_MS);
  }

  /** Effective per-run deadline in milliseconds. */
  get deadlineMs(): number {
    return this.timeoutMs;
  }

  /**
   * Queues a job for execution on a later tick and returns immediately.
   */
  schedule(jobId: string): void {
    const run: Promise<void> = new Promise<void>((resolve) => setImmediate(resolve))
      .then(() => this.execute(jobId))
      .catch((error: unknown) => {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.error(`Job ${jobId} could not be executed: ${message}`);
      })
      .finally(() => {
        this.inFlight.delete(run);
      });
    this.inFlight.add(run);
  }

  /** Resolves once every scheduled run has settled. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }

  async onApplicationShutdown(): Promise<void> {
    if (this.inFlight.size > 0) {
      this.logger.log(`Waiting for ${this.inFlight.size} in-flight job(s)`);
    }
    await this.drain();
  }

  /**
   * Runs one job to completion. Exposed for tests; production code goes
   * through `schedule`.
   */
  async execute(jobId: string): Promise<void> {
    const job = await this.jobs.markRunning(jobId, new Date());
    if (!job) {
      this.logger.warn(`Job ${jobId} is no longer PENDING, skipping`);
      return;
    }

    this.logger.log(`Job ${jobId} (${job.kind}) started`);

    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        const timeout = new JobTimeoutError(this.timeoutMs);
        controller.abort(timeout);
        reject(timeout);
      }, this.timeoutMs);
    });

    let running: Promise<JobResult> | undefined;
    try {
      const handler = this.registry.get(job.kind);
      const parameters = plainToInstance(handler.parametersType, job.parameters);
      running = handler.run(parameters, {
        jobId,
        requestedBy: job.requestedBy,
        signal: controller.signal,
      });
      const result: JobResult = await Promise.race([running, deadline]);

      const stored = await this.jobs.markSucceeded(jobId, result, new Date());
      if (stored) {
        this.logger.log(`Job ${jobId} succeeded`);
      } else {
        this.logger.warn(`Job ${jobId} finished after it was already failed; result discarded`);
      }
    } catch (error) {
      const jobError = toJobError(error);
      if (error instanceof JobTimeoutError) {
        this.logger.warn(`Job ${jobId} timed out after ${this.timeoutMs} ms`);
        if (running) {
          this.trackAbandoned(jobId, running);
        }
      } else {
        this.logger.error(`Job ${jobId} failed: [${jobError.code}] ${jobError.message}`);
      }
      await this.jobs.markFailed(jobId, jobError, new Date());
    } finally {
      clearTimeout(timer);
    }
  }

  /** Keeps a timed-out handler in `inFlight` until it settles. */
  private trackAbandoned(jobId: string, running: Promise<JobResult>): void {
    const settled: Promise<void> = running
      .then(
        () => {
          this.logger.warn(`Job ${jobId} handler returned after its deadline; result discarded`);
        },
        (error: unknown) => {
          const message = error instanceof Error ? error.message : String(error);
          this.logger.debug(`Job ${jobId} handler stopped after its deadline: ${message}`);
        },
      )
      .finally(() => {
        this.inFlight.delete(settled);
      });
    this.inFlight.add(settled);
  }
}
