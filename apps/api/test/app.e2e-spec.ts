import { INestApplication } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { randomUUID } from 'crypto';
import request from 'supertest';
import { configureApp } from '../src/configure-app';
import { AuthModule } from '../src/auth/auth.module';
import { TokenVerifier } from '../src/auth/token-verifier';
import { UsersModule } from '../src/users/users.module';
import { UsersRepository } from '../src/users/repositories/users.repository';
import { JobsModule } from '../src/jobs/jobs.module';
import { JobRunner } from '../src/jobs/job-runner.service';
import { JobsRepository } from '../src/jobs/repositories/jobs.repository';
import { TemplatesModule } from '../src/templates/templates.module';
import { ContractsModule } from '../src/contracts/contracts.module';
import { ContractsRepository } from '../src/contracts/repositories/contracts.repository';
import { AiModule } from '../src/ai/ai.module';
import { DocumentsModule } from '../src/documents/documents.module';
import { AuditModule } from '../src/audit/audit.module';
import { StorageService } from '../src/storage/storage.service';
import { FakeTokenVerifier } from './support/fake-token-verifier';
import { FakeStorageService } from './support/fake-storage.service';
import { InMemoryContractsRepository } from './support/in-memory-contracts.repository';
import { InMemoryJobsRepository } from './support/in-memory-jobs.repository';
import { InMemoryUsersRepository } from './support/in-memory-users.repository';

const ALICE_AUTH = 'Bearer token-alice';
const BOB_AUTH = 'Bearer token-bob';

describe('Contract lifecycle over HTTP', () => {
  let app: INestApplication;
  let runner: JobRunner;

  beforeAll(async () => {
    const moduleRef = await Test.createTestingModule({
      imports: [
        ConfigModule.forRoot({
          isGlobal: true,
          ignoreEnvFile: true,
          load: [() => ({ JOB_WATCHDOG_ENABLED: 'false' })],
        }),
        AuthModule,
        UsersModule,
        JobsModule,
        TemplatesModule,
        ContractsModule,
        AiModule,
        DocumentsModule,
        AuditModule,
      ],
    })
      .overrideProvider(TokenVerifier)
      .useValue(new FakeTokenVerifier())
      .overrideProvider(StorageService)
      .useValue(new FakeStorageService())
      .overrideProvider(UsersRepository)
      .useValue(new InMemoryUsersRepository())
      .overrideProvider(JobsRepository)
      .useValue(new InMemoryJobsRepository())
      .overrideProvider(ContractsRepository)
      .useValue(new InMemoryContractsRepository())
      .compile();

    app = moduleRef.createNestApplication();
    configureApp(app);
    await app.init();
    runner = app.get(JobRunner);
  });

  afterAll(async () => {
    await app.close();
  });

  const server = () => app.getHttpServer();

  async function createNda(): Promise<string> {
    const res = await request(server())
      .post('/contracts')
      .set('Authorization', ALICE_AUTH)
      .send({ title: 'Supplier NDA', templateId: 'tpl_nda_v1', contractType: 'NDA' })
      .expect(201);
    expect(res.body.status).toBe('DRAFT');
    return res.body.id;
  }

  it('rejects requests without a bearer token', async () => {
    await request(server()).get('/contracts').expect(401);
  });

  it('provisions a profile on first visit', async () => {
    const res = await request(server())
      .get('/users/me')
      .set('Authorization', ALICE_AUTH)
      .expect(200);

    expect(res.body).toMatchObject({
      id: 'alice-uid',
      email: 'alice@example.com',
      firstName: 'Alice',
      lastName: 'Smith',
    });
  });

  it('walks a contract from DRAFT to SIGNED through jobs and transitions', async () => {
    const contractId = await createNda();

    const submitted = await request(server())
      .post('/ai/generate-contract')
      .set('Authorization', ALICE_AUTH)
      .send({
        contractId,
        inputs: {
          disclosing_party: 'Acme Corp',
          receiving_party: 'Globex',
          confidential_subject: 'Pricing data',
        },
      })
      .expect(202);
    expect(submitted.body.status).toBe('PENDING');
    expect(submitted.body.pollUrl).toBe(`/ai/jobs/${submitted.body.jobId}`);

    await runner.drain();

    const generation = await request(server())
      .get(`/ai/jobs/${submitted.body.jobId}`)
      .set('Authorization', ALICE_AUTH)
      .expect(200);
    expect(generation.body.status).toBe('SUCCEEDED');
    expect(generation.body.result).toMatchObject({ contractId, contentVersion: 1 });

    const transitions = await request(server())
      .get(`/contracts/${contractId}/transitions`)
      .set('Authorization', ALICE_AUTH)
      .expect(200);
    expect(transitions.body).toEqual({
      currentStatus: 'GENERATED',
      states: ['SIGNING', 'GENERATED', 'CANCELLED'],
    });

    const skipped = await request(server())
      .patch(`/contracts/${contractId}/status`)
      .set('Authorization', ALICE_AUTH)
      .send({ status: 'SIGNED' })
      .expect(400);
    expect(skipped.body.code).toBe('INVALID_TRANSITION');

    const signing = await request(server())
      .patch(`/contracts/${contractId}/status`)
      .set('Authorization', ALICE_AUTH)
      .send({ status: 'SIGNING' })
      .expect(200);
    expect(signing.body.status).toBe('SIGNING');

    const pdfJob = await request(server())
      .post('/documents/generate-pdf')
      .set('Authorization', ALICE_AUTH)
      .send({ contractId })
      .expect(202);
    await runner.drain();

    const rendered = await request(server())
      .get(`/documents/jobs/${pdfJob.body.jobId}`)
      .set('Authorization', ALICE_AUTH)
      .expect(200);
    expect(rendered.body.status).toBe('SUCCEEDED');
    expect(rendered.body.result.documentKey).toBe(
      `contracts/${contractId}/${pdfJob.body.jobId}.pdf`,
    );

    const download = await request(server())
      .get(`/documents/${contractId}/download`)
      .set('Authorization', ALICE_AUTH)
      .expect(200);
    expect(download.headers['content-type']).toMatch(/^application\/pdf/);
    expect(download.headers['content-disposition']).toBe(
      'attachment; filename="Supplier-NDA.pdf"',
    );

    const verified = await request(server())
      .post(`/documents/${contractId}/verify`)
      .set('Authorization', ALICE_AUTH)
      .expect(200);
    expect(verified.body.valid).toBe(true);
    expect(verified.body.actualHash).toBe(rendered.body.result.documentHash);

    await request(server())
      .patch(`/contracts/${contractId}/status`)
      .set('Authorization', ALICE_AUTH)
      .send({ status: 'SIGNED' })
      .expect(200);

    const final = await request(server())
      .get(`/contracts/${contractId}/transitions`)
      .set('Authorization', ALICE_AUTH)
      .expect(200);
    expect(final.body.states).toEqual([]);

    const history = await request(server())
      .get(`/contracts/${contractId}/history`)
      .set('Authorization', ALICE_AUTH)
      .expect(200);
    expect(history.body).toHaveLength(3);
  });

  it('revises, shares, copies and audits a contract', async () => {
    const contractId = await createNda();
    await request(server())
      .patch(`/contracts/${contractId}/content`)
      .set('Authorization', ALICE_AUTH)
      .send({ content: '<p>Terms</p>', source: 'AI' })
      .expect(200);

    const submitted = await request(server())
      .post('/ai/regenerate')
      .set('Authorization', ALICE_AUTH)
      .send({ contractId, feedback: 'Add a governing law clause' })
      .expect(202);
    expect(submitted.body.pollUrl).toBe(`/ai/jobs/${submitted.body.jobId}`);
    await runner.drain();

    const regenerated = await request(server())
      .get(`/ai/jobs/${submitted.body.jobId}`)
      .set('Authorization', ALICE_AUTH)
      .expect(200);
    expect(regenerated.body.status).toBe('SUCCEEDED');
    expect(regenerated.body.result.contentVersion).toBe(2);

    const party = await request(server())
      .post(`/contracts/${contractId}/parties`)
      .set('Authorization', ALICE_AUTH)
      .send({ role: 'GUEST', name: 'Bob', email: 'Bob@Example.com' })
      .expect(201);
    expect(party.body.email).toBe('bob@example.com');
    await request(server())
      .post(`/contracts/${contractId}/parties`)
      .set('Authorization', ALICE_AUTH)
      .send({ role: 'WITNESS', name: 'Bobby', email: 'bob@example.com' })
      .expect(409);

    const copy = await request(server())
      .post(`/contracts/${contractId}/duplicate`)
      .set('Authorization', ALICE_AUTH)
      .expect(201);
    expect(copy.body.title).toBe('Supplier NDA (Copy)');
    expect(copy.body.status).toBe('DRAFT');

    const stats = await request(server())
      .get('/contracts/stats')
      .set('Authorization', ALICE_AUTH)
      .expect(200);
    expect(stats.body.byStatus.GENERATED).toBeGreaterThanOrEqual(1);

    const trail = await request(server())
      .get(`/audit/contracts/${contractId}/trail`)
      .set('Authorization', ALICE_AUTH)
      .expect(200);
    const types: string[] = trail.body.events.map((e: { eventType: string }) => e.eventType);
    expect(types).toHaveLength(6);
    expect(types[0]).toBe('CONTRACT_CREATED');
    expect(types[5]).toBe('PARTY_ADDED');
    expect(types.filter((t) => t === 'CONTENT_SAVED')).toHaveLength(2);

    await request(server())
      .get(`/audit/contracts/${contractId}/trail`)
      .set('Authorization', BOB_AUTH)
      .expect(404);
  });

  it('hides jobs from other users and unknown ids', async () => {
    const contractId = await createNda();
    const submitted = await request(server())
      .post('/documents/generate-pdf')
      .set('Authorization', ALICE_AUTH)
      .send({ contractId })
      .expect(202);
    await runner.drain();

    await request(server())
      .get(`/jobs/${submitted.body.jobId}`)
      .set('Authorization', BOB_AUTH)
      .expect(404);
    const unknown = await request(server())
      .get(`/jobs/${randomUUID()}`)
      .set('Authorization', ALICE_AUTH)
      .expect(404);
    expect(unknown.body.code).toBe('NOT_FOUND');

    const failed = await request(server())
      .get(`/jobs/${submitted.body.jobId}`)
      .set('Authorization', ALICE_AUTH)
      .expect(200);
    expect(failed.body.status).toBe('FAILED');
    expect(failed.body.error.code).toBe('NO_CONTENT');
  });

  it('rejects malformed job parameters with 400', async () => {
    await request(server())
      .post('/documents/generate-pdf')
      .set('Authorization', ALICE_AUTH)
      .send({ contractId: 'not-a-uuid' })
      .expect(400);
  });

  it('validates generation inputs for anonymous callers', async () => {
    const res = await request(server())
      .post('/ai/validate-input')
      .send({ contractType: 'NDA', inputs: { disclosing_party: 'Acme Corp' } })
      .expect(200);

    expect(res.body.valid).toBe(false);
    expect(res.body.errors).toHaveLength(2);
  });
});
