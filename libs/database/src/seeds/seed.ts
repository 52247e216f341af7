import { Logger } from '@nestjs/common';
import AppDataSource from '../data-source';
import { User } from '../entities/user.entity';
import { Contract } from '../entities/contract.entity';
import { ContractHistoryEntry } from '../entities/contract-history.entity';
import { ContractVersion } from '../entities/contract-version.entity';
import { ContractStatus } from '../enums/contract-status.enum';
import { ContentSource } from '../enums/content-source.enum';

/**
 * Seed script - populates the database with demo contracts.
 *
 * Usage (after `npm run build` and `npm run migration:run`):
 *   npm run seed
 *
 * User ids match the dev-token format, so with AUTH_DEV_TOKENS=true
 * `Authorization: Bearer dev_alice-uid_alice@example.com` signs in as Alice.
 *
 * Idempotent: truncates all tables before inserting.
 */

interface SeedUser {
  id: string;
  email: string;
  firstName: string;
  lastName: string;
}

interface SeedContract {
  title: string;
  contractType: string;
  templateId: string;
  /** Path through the lifecycle, starting after DRAFT */
  path: ContractStatus[];
  content: string | null;
}

const USERS: SeedUser[] = [
  { id: 'alice-uid', email: 'alice@example.com', firstName: 'Alice', lastName: 'Johnson' },
  { id: 'bob-uid', email: 'bob@example.com', firstName: 'Bob', lastName: 'Smith' },
];

const CONTRACTS: SeedContract[] = [
  {
    title: 'Mutual NDA with Acme Ltd',
    contractType: 'NDA',
    templateId: 'tpl_nda_v1',
    path: [],
    content: null,
  },
  {
    title: 'Website redesign services',
    contractType: 'SERVICES',
    templateId: 'tpl_services_v1',
    path: [ContractStatus.GENERATED],
    content:
      '<h1>Service Agreement</h1><p>This agreement is made between Alice Johnson and Studio North.</p>',
  },
  {
    title: 'Senior engineer offer',
    contractType: 'EMPLOYMENT',
    templateId: 'tpl_employment_v1',
    path: [ContractStatus.GENERATED, ContractStatus.SIGNING, ContractStatus.SIGNED],
    content:
      '<h1>Employment Agreement</h1><p>Bob Smith is employed as Senior Engineer.</p>',
  },
  {
    title: 'Abandoned consulting engagement',
    contractType: 'SERVICES',
    templateId: 'tpl_services_v1',
    path: [ContractStatus.CANCELLED],
    content: null,
  },
];

async function seed(): Promise<void> {
  const logger = new Logger('Seed');

  logger.log('Initializing data source...');
  await AppDataSource.initialize();

  const queryRunner = AppDataSource.createQueryRunner();
  await queryRunner.connect();
  await queryRunner.startTransaction();

  try {
    logger.log('Truncating tables...');
    await queryRunner.query(
      'TRUNCATE TABLE async_jobs, contract_versions, contract_history, contracts, users CASCADE',
    );

    // ── Users ──────────────────────────────────────────────
    const userRepo = queryRunner.manager.getRepository(User);
    const savedUsers = await userRepo.save(USERS.map((u) => userRepo.create(u)));
    logger.log(`Inserted ${savedUsers.length} users`);

    // ── Contracts, versions, history ───────────────────────
    const contractRepo = queryRunner.manager.getRepository(Contract);
    const versionRepo = queryRunner.manager.getRepository(ContractVersion);
    const historyRepo = queryRunner.manager.getRepository(ContractHistoryEntry);
    let historyCount = 0;

    for (let i = 0; i < CONTRACTS.length; i++) {
      const { path, content, ...data } = CONTRACTS[i];
      const owner = savedUsers[i % savedUsers.length];
      const finalStatus = path.length > 0 ? path[path.length - 1] : ContractStatus.DRAFT;

      const contract = await contractRepo.save(
        contractRepo.create({
          ...data,
          ownerId: owner.id,
          status: finalStatus,
          version: path.length + 1,
          signedAt: finalStatus === ContractStatus.SIGNED ? new Date() : null,
        }),
      );

      if (content !== null) {
        await versionRepo.save(
          versionRepo.create({
            contractId: contract.id,
            version: 1,
            content,
            source: ContentSource.AI,
            createdBy: owner.id,
          }),
        );
      }

      let from = ContractStatus.DRAFT;
      for (const to of path) {
        await historyRepo.save(
          historyRepo.create({
            contractId: contract.id,
            fromStatus: from,
            toStatus: to,
            actorId: owner.id,
            reason: to === ContractStatus.CANCELLED ? 'Client withdrew' : null,
          }),
        );
        from = to;
        historyCount++;
      }
    }
    logger.log(`Inserted ${CONTRACTS.length} contracts, ${historyCount} history entries`);

    await queryRunner.commitTransaction();
    logger.log('Seed completed successfully');
  } catch (error) {
    logger.error('Seed failed, rolling back transaction...');
    await queryRunner.rollbackTransaction();
    throw error;
  } finally {
    await queryRunner.release();
    await AppDataSource.destroy();
  }
}

seed().catch((error: Error) => {
  // eslint-disable-next-line no-console
  console.error('Fatal seed error:', error.message);
  process.exit(1);
});
