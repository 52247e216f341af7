import { Injectable } from '@nestjs/common';
import { DataSource, EntityManager, IsNull, SelectQueryBuilder } from 'typeorm';
import {
  Contract,
  ContractHistoryEntry,
  ContractParty,
  ContractStatus,
  ContractVersion,
  SignatureStatus,
} from '@clm/database';
import {
  AddPartyResult,
  ContractPage,
  ContractPageQuery,
  ContractsRepository,
  NewContent,
  NewContract,
  NewParty,
  RecentContractsQuery,
  RemovePartyResult,
  StatusChange,
  TransitionOutcome,
} from './contracts.repository';
import { isUniqueViolation } from '../../common/database/unique-violation';

@Injectable()
export class TypeOrmContractsRepository extends ContractsRepository {
  constructor(private readonly dataSource: DataSource) {
    super();
  }

  create(input: NewContract): Promise<Contract> {
    const { initialContent, ...fields } = input;
    return this.dataSource.transaction(async (manager) => {
      const contract = await manager.save(
        manager.create(Contract, {
          ...fields,
          status: ContractStatus.DRAFT,
          version: 1,
          documentKey: null,
          documentHash: null,
          signedAt: null,
          deletedAt: null,
        }),
      );
      if (initialContent) {
        await manager.save(
          manager.create(ContractVersion, {
            contractId: contract.id,
            version: 1,
            content: initialContent.content,
            source: initialContent.source,
            createdBy: initialContent.createdBy,
          }),
        );
      }
      return contract;
    });
  }

  findById(id: string): Promise<Contract | null> {
    return this.dataSource
      .getRepository(Contract)
      .findOne({ where: { id, deletedAt: IsNull() } });
  }

  async findPage(query: ContractPageQuery): Promise<ContractPage> {
    const qb = this.liveContractsOf(query.ownerId);

    if (query.status) {
      qb.andWhere('contract.status = :status', { status: query.status });
    }
    if (query.search) {
      qb.andWhere('contract.title ILIKE :search', {
        search: `%${escapeLike(query.search)}%`,
      });
    }

    const [items, total] = await qb
      .orderBy('contract.created_at', 'DESC')
      .skip((query.page - 1) * query.pageSize)
      .take(query.pageSize)
      .getManyAndCount();

    return { items, total };
  }

  transition(change: StatusChange): Promise<TransitionOutcome | null> {
    return this.dataSource.transaction(async (manager) => {
      // 1. Compare-and-set; zero rows means someone else got there first
      const updated = await manager
        .createQueryBuilder()
        .update(Contract)
        .set({
          status: change.toStatus,
          version: () => 'version + 1',
          ...(change.toStatus === ContractStatus.SIGNED && { signedAt: change.at }),
        })
        .where(
          'id = :id AND version = :version AND status = :status AND deleted_at IS NULL',
          {
            id: change.contractId,
            version: change.expectedVersion,
            status: change.fromStatus,
          },
        )
        .execute();

      if ((updated.affected ?? 0) !== 1) {
        return null;
      }

      // 2. History entry for this transition
      const entry = await manager.save(
        manager.create(ContractHistoryEntry, {
          contractId: change.contractId,
          fromStatus: change.fromStatus,
          toStatus: change.toStatus,
          actorId: change.actorId,
          reason: change.reason,
        }),
      );

      // 3. Optional content produced by the same operation
      const contentVersion = change.content
        ? await this.insertNextVersion(manager, change.contractId, change.content)
        : null;

      const contract = await manager.findOneByOrFail(Contract, {
        id: change.contractId,
      });
      return { contract, entry, contentVersion };
    });
  }

  async updateTitle(
    id: string,
    title: string,
    allowedStatuses: readonly ContractStatus[],
  ): Promise<Contract | null> {
    const updated = await this.dataSource
      .createQueryBuilder()
      .update(Contract)
      .set({ title })
      .where('id = :id AND deleted_at IS NULL AND status IN (:...allowed)', {
        id,
        allowed: [...allowedStatuses],
      })
      .execute();

    return (updated.affected ?? 0) === 1 ? this.findById(id) : null;
  }

  appendVersion(
    contractId: string,
    input: NewContent,
    allowedStatuses: readonly ContractStatus[],
  ): Promise<ContractVersion | null> {
    return this.dataSource.transaction(async (manager) => {
      const contract = await this.lockContract(manager, contractId);
      if (!contract || !allowedStatuses.includes(contract.status)) {
        return null;
      }
      return this.insertNextVersion(manager, contractId, input);
    });
  }

  findVersions(contractId: string): Promise<ContractVersion[]> {
    return this.dataSource.getRepository(ContractVersion).find({
      where: { contractId },
      order: { version: 'ASC' },
    });
  }

  findLatestVersion(contractId: string): Promise<ContractVersion | null> {
    return this.dataSource.getRepository(ContractVersion).findOne({
      where: { contractId },
      order: { version: 'DESC' },
    });
  }

  findHistory(contractId: string): Promise<ContractHistoryEntry[]> {
    return this.dataSource.getRepository(ContractHistoryEntry).find({
      where: { contractId },
      order: { createdAt: 'ASC' },
    });
  }

  async softDelete(id: string, at: Date): Promise<boolean> {
    const updated = await this.dataSource
      .createQueryBuilder()
      .update(Contract)
      .set({ deletedAt: at })
      .where('id = :id AND deleted_at IS NULL AND status <> :signed', {
        id,
        signed: ContractStatus.SIGNED,
      })
      .execute();
    return (updated.affected ?? 0) === 1;
  }

  async setDocument(
    id: string,
    documentKey: string,
    documentHash: string,
  ): Promise<void> {
    await this.dataSource
      .getRepository(Contract)
      .update({ id }, { documentKey, documentHash });
  }

  // ── Dashboard reads ──────────────────────────────────────

  async findRecent(query: RecentContractsQuery): Promise<Contract[]> {
    if (query.statuses && query.statuses.length === 0) {
      return [];
    }

    const qb = this.liveContractsOf(query.ownerId);
    if (query.statuses) {
      qb.andWhere('contract.status IN (:...statuses)', { statuses: [...query.statuses] });
    }
    return qb.orderBy('contract.updated_at', 'DESC').take(query.limit).getMany();
  }

  async countByStatus(ownerId: string): Promise<Partial<Record<ContractStatus, number>>> {
    const rows = await this.liveContractsOf(ownerId)
      .select('contract.status', 'status')
      .addSelect('COUNT(*)', 'count')
      .groupBy('contract.status')
      .getRawMany<{ status: ContractStatus; count: string }>();

    const counts: Partial<Record<ContractStatus, number>> = {};
    for (const row of rows) {
      counts[row.status] = Number(row.count);
    }
    return counts;
  }

  countSignedSince(ownerId: string, since: Date): Promise<number> {
    return this.liveContractsOf(ownerId)
      .andWhere('contract.signed_at >= :since', { since })
      .getCount();
  }

  // ── Parties ──────────────────────────────────────────────

  findParties(contractId: string): Promise<ContractParty[]> {
    return this.dataSource.getRepository(ContractParty).find({
      where: { contractId },
      order: { signingOrder: 'ASC', createdAt: 'ASC' },
    });
  }

  async addParty(
    input: NewParty,
    allowedStatuses: readonly ContractStatus[],
  ): Promise<AddPartyResult> {
    try {
      return await this.dataSource.transaction(async (manager): Promise<AddPartyResult> => {
        const contract = await this.lockContract(manager, input.contractId);
        if (!contract || !allowedStatuses.includes(contract.status)) {
          return { outcome: 'locked' };
        }

        const party = await manager.save(
          manager.create(ContractParty, {
            ...input,
            signatureStatus: SignatureStatus.PENDING,
            signedAt: null,
          }),
        );
        return { outcome: 'added', party };
      });
    } catch (error) {
      // UQ_contract_parties_contract_email
      if (isUniqueViolation(error)) {
        return { outcome: 'duplicate-email' };
      }
      throw error;
    }
  }

  async removeParty(contractId: string, partyId: string): Promise<RemovePartyResult> {
    const deleted = await this.dataSource
      .createQueryBuilder()
      .delete()
      .from(ContractParty)
      .where('id = :partyId AND contract_id = :contractId AND signature_status <> :signed', {
        partyId,
        contractId,
        signed: SignatureStatus.SIGNED,
      })
      .execute();
    if ((deleted.affected ?? 0) === 1) {
      return 'removed';
    }

    const remaining = await this.dataSource
      .getRepository(ContractParty)
      .findOne({ where: { id: partyId, contractId } });
    return remaining ? 'signed' : 'not-found';
  }

  // ── Helpers ────────────────────────────────────────────────

  private liveContractsOf(ownerId: string): SelectQueryBuilder<Contract> {
    return this.dataSource
      .getRepository(Contract)
      .createQueryBuilder('contract')
      .where('contract.owner_id = :ownerId', { ownerId })
      .andWhere('contract.deleted_at IS NULL');
  }

  /** Row lock that serialises writers on one contract and pins its status. */
  private lockContract(manager: EntityManager, contractId: string): Promise<Contract | null> {
    return manager
      .getRepository(Contract)
      .createQueryBuilder('contract')
      .setLock('pessimistic_write')
      .where('contract.id = :id AND contract.deleted_at IS NULL', { id: contractId })
      .getOne();
  }

  /** Caller must hold a lock on the contract row. */
  private async insertNextVersion(
    manager: EntityManager,
    contractId: string,
    input: NewContent,
  ): Promise<ContractVersion> {
    const latest = await manager
      .getRepository(ContractVersion)
      .createQueryBuilder('version')
      .select('MAX(version.version)', 'max')
      .where('version.contract_id = :contractId', { contractId })
      .getRawOne<{ max: number | null }>();

    return manager.save(
      manager.create(ContractVersion, {
        contractId,
        version: (latest?.max ?? 0) + 1,
        content: input.content,
        source: input.source,
        createdBy: input.createdBy,
      }),
    );
  }
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (char) => `\\${char}`);
}
