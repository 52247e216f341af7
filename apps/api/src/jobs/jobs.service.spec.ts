import { Test } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { JobKind, JobStatus } from '@clm/database';
import { JobsService } from './jobs.service';
import { JobRunner } from './job-runner.service';
import { JobHandlerRegistry } from './job-handler.registry';
import { JobsRepository } from './repositories/jobs.repository';
import {
  JobNotFoundException,
  JobParametersInvalidException,
  UnsupportedJobKindException,
} from './exceptions/job.exceptions';
import { InMemoryJobsRepository } from '../../test/support/in-memory-jobs.repository';
import { EchoJobHandler } from '../../test/support/echo-job.handler';

const ALICE = 'alice-uid';
const BOB = 'bob-uid';

describe('JobsService', () => {
  let service: JobsService;
  let runner: JobRunner;
  let repository: InMemoryJobsRepository;
  let handler: EchoJobHandler;

  beforeEach(async () => {
    repository = new InMemoryJobsRepository();
    handler = new EchoJobHandler(JobKind.AI_GENERATION);

    const moduleRef = await Test.createTestingModule({
      providers: [
        JobsService,
        JobRunner,
        JobHandlerRegistry,
        { provide: JobsRepository, useValue: repository },
        { provide: ConfigService, useValue: new ConfigService({ JOB_TIMEOUT_MS: 1000 }) },
      ],
    }).compile();

    service = moduleRef.get(JobsService);
    runner = moduleRef.get(JobRunner);
    moduleRef.get(JobHandlerRegistry).register(handler);
  });

  afterEach(async () => {
    await runner.drain();
  });

  describe('submit', () => {
    it('returns a PENDING job before the handler runs', async () => {
      const job = await service.submit(JobKind.AI_GENERATION, { message: 'hi' }, ALICE);

      expect(job.status).toBe(JobStatus.PENDING);
      expect(handler.calls).toHaveLength(0);

      const snapshot = await service.getStatus(job.id, ALICE);
      expect(snapshot.status).toBe(JobStatus.PENDING);
      expect(snapshot.result).toBeUndefined();
      expect(snapshot.error).toBeUndefined();
    });

    it('runs the job in the background to SUCCEEDED', async () => {
      const job = await service.submit(JobKind.AI_GENERATION, { message: 'hi' }, ALICE);

      await runner.drain();

      const view = await service.getStatus(job.id, ALICE);
      expect(view).toMatchObject({
        jobId: job.id,
        kind: JobKind.AI_GENERATION,
        status: JobStatus.SUCCEEDED,
        result: { echoed: 'hi' },
      });
      expect(view.error).toBeUndefined();
      expect(view.completedAt).toEqual(expect.any(String));
      expect(repository.statusLog.get(job.id)).toEqual([
        JobStatus.PENDING,
        JobStatus.RUNNING,
        JobStatus.SUCCEEDED,
      ]);
      expect(handler.calls[0].context.requestedBy).toBe(ALICE);
    });

    it('rejects invalid parameters without creating a job', async () => {
      const create = jest.spyOn(repository, 'create');

      const submission = service.submit(JobKind.AI_GENERATION, { message: '' }, ALICE);

      await expect(submission).rejects.toBeInstanceOf(JobParametersInvalidException);
      await expect(submission).rejects.toMatchObject({
        details: ['message: message should not be empty'],
      });
      expect(create).not.toHaveBeenCalled();
    });

    it('rejects parameters the kind does not declare', async () => {
      await expect(
        service.submit(JobKind.AI_GENERATION, { message: 'hi', extra: true }, ALICE),
      ).rejects.toMatchObject({
        code: 'VALIDATION_ERROR',
        details: ['extra: property extra should not exist'],
      });
    });

    it('rejects kinds without a handler', async () => {
      await expect(
        service.submit(JobKind.PDF_GENERATION, { contractId: 'x' }, ALICE),
      ).rejects.toBeInstanceOf(UnsupportedJobKindException);
    });
  });

  describe('getStatus', () => {
    it('fails for an unknown id', async () => {
      await expect(
        service.getStatus('8f14e45f-ceea-4e7a-9f1d-3a2b6c7d8e9f', ALICE),
      ).rejects.toBeInstanceOf(JobNotFoundException);
    });

    it('fails for ids that are not UUIDs', async () => {
      await expect(service.getStatus('not-a-uuid', ALICE)).rejects.toThrow(
        'Job "not-a-uuid" not found',
      );
    });

    it("hides other users' jobs", async () => {
      const job = await service.submit(JobKind.AI_GENERATION, { message: 'hi' }, ALICE);

      await expect(service.getStatus(job.id, BOB)).rejects.toBeInstanceOf(
        JobNotFoundException,
      );
    });

    it('hides jobs of another kind when a kind is given', async () => {
      const job = await service.submit(JobKind.AI_GENERATION, { message: 'hi' }, ALICE);

      await expect(
        service.getStatus(job.id, ALICE, [JobKind.PDF_GENERATION]),
      ).rejects.toBeInstanceOf(JobNotFoundException);
      await expect(
        service.getStatus(job.id, ALICE, [JobKind.AI_GENERATION]),
      ).resolves.toMatchObject({ jobId: job.id });
    });
  });
});
