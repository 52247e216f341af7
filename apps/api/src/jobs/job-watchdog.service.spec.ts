import { ConfigService } from '@nestjs/config';
import * as cron from 'node-cron';
import { JobKind, JobStatus } from '@clm/database';
import { ABANDONED_ERROR_CODE, JobWatchdog } from './job-watchdog.service';
import { InMemoryJobsRepository } from '../../test/support/in-memory-jobs.repository';

jest.mock('node-cron', () => ({
  validate: jest.fn((expression: string) => expression !== 'not a cron'),
  schedule: jest.fn(() => ({ stop: jest.fn() })),
}));

const STALE_AFTER_MS = 60_000;

describe('JobWatchdog', () => {
  let repository: InMemoryJobsRepository;

  const createWatchdog = (env: Record<string, string | number> = {}): JobWatchdog =>
    new JobWatchdog(
      repository,
      new ConfigService({ JOB_STALE_AFTER_MS: STALE_AFTER_MS, ...env }),
    );

  const createJob = () =>
    repository.create({
      kind: JobKind.PDF_GENERATION,
      parameters: {},
      requestedBy: 'alice-uid',
    });

  beforeEach(() => {
    repository = new InMemoryJobsRepository();
    jest.mocked(cron.schedule).mockClear();
  });

  describe('sweep', () => {
    it('fails PENDING and RUNNING jobs older than the threshold', async () => {
      const pending = await createJob();
      const running = await createJob();
      await repository.markRunning(running.id, new Date());
      const done = await createJob();
      await repository.markRunning(done.id, new Date());
      await repository.markSucceeded(done.id, { ok: true }, new Date());

      const failed = await createWatchdog().sweep(new Date(Date.now() + STALE_AFTER_MS + 1000));

      expect(failed).toBe(2);
      expect((await repository.findById(pending.id))?.error).toEqual({
        code: ABANDONED_ERROR_CODE,
        message: `Job was PENDING for longer than ${STALE_AFTER_MS} ms`,
      });
      expect((await repository.findById(running.id))?.error).toEqual({
        code: ABANDONED_ERROR_CODE,
        message: `Job was RUNNING for longer than ${STALE_AFTER_MS} ms`,
      });
      expect((await repository.findById(done.id))?.status).toBe(JobStatus.SUCCEEDED);
    });

    it('leaves recent jobs alone', async () => {
      const job = await createJob();

      await expect(createWatchdog().sweep(new Date())).resolves.toBe(0);
      expect((await repository.findById(job.id))?.status).toBe(JobStatus.PENDING);
    });

    it('uses the five minute default when JOB_STALE_AFTER_MS is not a number', async () => {
      const job = await createJob();
      const watchdog = createWatchdog({ JOB_STALE_AFTER_MS: 'soon' });

      await expect(watchdog.sweep(new Date(Date.now() + 4 * 60_000))).resolves.toBe(0);
      await expect(watchdog.sweep(new Date(Date.now() + 6 * 60_000))).resolves.toBe(1);
      expect((await repository.findById(job.id))?.error?.message).toBe(
        'Job was PENDING for longer than 300000 ms',
      );
    });

    it('does not count jobs that finished between the read and the write', async () => {
      const job = await createJob();
      jest.spyOn(repository, 'markFailed').mockResolvedValueOnce(false);

      const failed = await createWatchdog().sweep(new Date(Date.now() + STALE_AFTER_MS + 1000));

      expect(failed).toBe(0);
      expect((await repository.findById(job.id))?.status).toBe(JobStatus.PENDING);
    });
  });

  describe('schedule', () => {
    it('schedules the configured expression', () => {
      const watchdog = createWatchdog({ JOB_WATCHDOG_CRON: '*/5 * * * *' });

      watchdog.onModuleInit();

      expect(cron.schedule).toHaveBeenCalledWith('*/5 * * * *', expect.any(Function));
      watchdog.onModuleDestroy();
    });

    it('falls back to every minute for an invalid expression', () => {
      const watchdog = createWatchdog({ JOB_WATCHDOG_CRON: 'not a cron' });

      watchdog.onModuleInit();

      expect(cron.schedule).toHaveBeenCalledWith('* * * * *', expect.any(Function));
      watchdog.onModuleDestroy();
    });

    it('does nothing when disabled', () => {
      createWatchdog({ JOB_WATCHDOG_ENABLED: 'false' }).onModuleInit();

      expect(cron.schedule).not.toHaveBeenCalled();
    });
  });
});
