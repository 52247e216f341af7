import { Module, DynamicModule } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { User } from './entities/user.entity';
import { Contract } from './entities/contract.entity';
import { ContractHistoryEntry } from './entities/contract-history.entity';
import { ContractVersion } from './entities/contract-version.entity';
import { ContractParty } from './entities/contract-party.entity';
import { AsyncJob } from './entities/async-job.entity';

/** All entity classes registered in this database library */
const ENTITIES = [
  User,
  Contract,
  ContractHistoryEntry,
  ContractVersion,
  ContractParty,
  AsyncJob,
] as const;

/**
 * DatabaseModule - registers the TypeORM entity repositories.
 *
 * @example
 * ```ts
 * @Module({
 *   imports: [DatabaseModule.forFeature()],
 * })
 * export class SomeFeatureModule {}
 * ```
 */
@Module({})
export class DatabaseModule {
  static forFeature(): DynamicModule {
    return {
      module: DatabaseModule,
      imports: [TypeOrmModule.forFeature([...ENTITIES])],
      exports: [TypeOrmModule],
    };
  }
}
