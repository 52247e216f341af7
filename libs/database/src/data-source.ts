import 'reflect-metadata';
import { config } from 'dotenv';
import { DataSource, DataSourceOptions } from 'typeorm';
import { join } from 'path';

import { User } from './entities/user.entity';
import { Contract } from './entities/contract.entity';
import { ContractHistoryEntry } from './entities/contract-history.entity';
import { ContractVersion } from './entities/contract-version.entity';
import { ContractParty } from './entities/contract-party.entity';
import { AsyncJob } from './entities/async-job.entity';

/**
 * Load env vars from the project root .env file, whether this runs from
 * sources (libs/database/src) or from the compiled dist tree.
 */
config({ path: join(__dirname, '../../../.env') });
config({ path: join(__dirname, '../../../../.env') });

/**
 * TypeORM DataSource for the CLI (`migration:run`, `migration:revert`)
 * and the seed script. Dev defaults match docker-compose style local setups.
 */
const dataSourceOptions: DataSourceOptions = {
  type: 'postgres',
  host: process.env['POSTGRES_HOST'] || 'localhost',
  port: parseInt(process.env['POSTGRES_PORT'] || '5432', 10),
  username: process.env['POSTGRES_USER'] || 'clm',
  password: process.env['POSTGRES_PASSWORD'] || 'clm_secret',
  database: process.env['POSTGRES_DB'] || 'clm',
  entities: [User, Contract, ContractHistoryEntry, ContractVersion, ContractParty, AsyncJob],
  migrations: [join(__dirname, 'migrations', '*{.ts,.js}')],
  synchronize: false,
  logging: process.env['NODE_ENV'] !== 'production',
};

const AppDataSource = new DataSource(dataSourceOptions);

export default AppDataSource;
