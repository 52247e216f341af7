import { Injectable, Logger } from '@nestjs/common';
import {
  ContentSource,
  Contract,
  ContractHistoryEntry,
  ContractParty,
  ContractStatus,
  ContractVersion,
} from '@clm/database';
import { TemplatesService } from '../templates/templates.service';
import {
  ContractsRepository,
  NewContent,
  TransitionOutcome,
} from './repositories/contracts.repository';
import {
  EDITABLE_STATUSES,
  OPEN_STATUSES,
  allowedTransitions,
  canTransition,
} from './contract-lifecycle';
import {
  CancellationReasonRequiredException,
  ContractConflictException,
  ContractLockedException,
  ContractNotFoundException,
  InvalidContractTemplateException,
  InvalidTransitionException,
  PartiesLockedException,
  PartyEmailTakenException,
  PartyNotFoundException,
  SignedContractDeletionException,
  SignedPartyRemovalException,
} from './exceptions/contract.exceptions';
import { CreateContractDto } from './dto/create-contract.dto';
import { UpdateContractDto } from './dto/update-contract.dto';
import { UpdateContentDto } from './dto/update-content.dto';
import {
  DEFAULT_PAGE_SIZE,
  ListContractsQueryDto,
  MAX_PAGE_SIZE,
} from './dto/list-contracts-query.dto';
import { ContractDetailDto, ContractDto } from './dto/contract.dto';
import { ContractListDto } from './dto/contract-list.dto';
import { ContractVersionDto } from './dto/contract-version.dto';
import { ContractHistoryEntryDto } from './dto/contract-history-entry.dto';
import { TransitionsDto } from './dto/transitions.dto';
import { ContractStatsDto } from './dto/contract-stats.dto';
import { AddPartyDto } from './dto/add-party.dto';
import { ContractPartyDto } from './dto/contract-party.dto';

const RECENT_LIMIT = 10;
const TITLE_MAX_LENGTH = 500;
const COPY_SUFFIX = ' (Copy)';

export interface TransitionOptions {
  reason?: string;
  /** Content produced by the operation that causes the transition */
  content?: { content: string; source: ContentSource };
  /** Checked right before the write; an aborted signal prevents it. */
  signal?: AbortSignal;
}

/** Everything recorded about one contract, for the audit trail. */
export interface ContractActivity {
  contract: Contract;
  history: ContractHistoryEntry[];
  versions: ContractVersion[];
  parties: ContractParty[];
}

/**
 * ContractsService - contract CRUD and the lifecycle state machine.
 *
 * Every status change goes through `transition`, which validates the edge
 * against CONTRACT_TRANSITIONS and then asks the repository for an atomic
 * compare-and-set plus one history entry. Contracts owned by someone else
 * are reported as missing.
 */
@Injectable()
export class ContractsService {
  private readonly logger = new Logger(ContractsService.name);

  constructor(
    private readonly contracts: ContractsRepository,
    private readonly templatesService: TemplatesService,
  ) {}

  // ── CRUD ─────────────────────────────────────────────────

  async create(ownerId: string, dto: CreateContractDto): Promise<ContractDto> {
    const template = this.templatesService.findTemplate(dto.templateId);
    if (!template) {
      throw new InvalidContractTemplateException(`Unknown template: ${dto.templateId}`);
    }
    if (template.contractType !== dto.contractType) {
      throw new InvalidContractTemplateException(
        `Template ${dto.templateId} is for ${template.contractType}, not ${dto.contractType}`,
      );
    }

    const contract = await this.contracts.create({
      title: dto.title.trim(),
      templateId: dto.templateId,
      contractType: dto.contractType,
      ownerId,
    });
    this.logger.log(`Contract ${contract.id} created by ${ownerId}`);
    return ContractDto.fromEntity(contract);
  }

  async list(ownerId: string, query: ListContractsQueryDto): Promise<ContractListDto> {
    const page = query.page ?? 1;
    const pageSize = query.pageSize ?? DEFAULT_PAGE_SIZE;

    const { items, total } = await this.contracts.findPage({
      ownerId,
      status: query.status,
      search: query.search?.trim() || undefined,
      page,
      pageSize,
    });

    return {
      data: items.map((c) => ContractDto.fromEntity(c)),
      pagination: {
        page,
        pageSize,
        totalPages: Math.ceil(total / pageSize),
        totalItems: total,
      },
    };
  }

  /**
   * @throws ContractNotFoundException when absent, deleted or not owned by `ownerId`
   */
  async getOwned(contractId: string, ownerId: string): Promise<Contract> {
    const contract = await this.contracts.findById(contractId);
    if (!contract || contract.ownerId !== ownerId) {
      throw new ContractNotFoundException(contractId);
    }
    return contract;
  }

  async getDetail(contractId: string, ownerId: string): Promise<ContractDetailDto> {
    const contract = await this.getOwned(contractId, ownerId);
    const latest = await this.contracts.findLatestVersion(contractId);
    return ContractDetailDto.fromEntityWithContent(contract, latest);
  }

  async update(
    contractId: string,
    ownerId: string,
    dto: UpdateContractDto,
  ): Promise<ContractDto> {
    const contract = await this.getOwned(contractId, ownerId);
    if (dto.title === undefined) {
      return ContractDto.fromEntity(contract);
    }

    if (!OPEN_STATUSES.includes(contract.status)) {
      throw new ContractLockedException(contract.status, 'update details');
    }

    const updated = await this.contracts.updateTitle(
      contractId,
      dto.title.trim(),
      OPEN_STATUSES,
    );
    if (!updated) {
      throw new ContractConflictException(contractId);
    }

    this.logger.log(`Contract ${contractId} details updated by ${ownerId}`);
    return ContractDto.fromEntity(updated);
  }

  async remove(contractId: string, ownerId: string): Promise<void> {
    const contract = await this.getOwned(contractId, ownerId);
    if (contract.status === ContractStatus.SIGNED) {
      throw new SignedContractDeletionException();
    }

    const deleted = await this.contracts.softDelete(contractId, new Date());
    if (!deleted) {
      throw new ContractConflictException(contractId);
    }
    this.logger.log(`Contract ${contractId} deleted by ${ownerId}`);
  }

  /**
   * New DRAFT owned by the caller with the same template, titled
   * "<title> (Copy)". The latest content, if any, becomes its version 1.
   */
  async duplicate(contractId: string, ownerId: string): Promise<ContractDto> {
    const source = await this.getOwned(contractId, ownerId);
    const latest = await this.contracts.findLatestVersion(contractId);

    const copy = await this.contracts.create({
      title: source.title.slice(0, TITLE_MAX_LENGTH - COPY_SUFFIX.length) + COPY_SUFFIX,
      templateId: source.templateId,
      contractType: source.contractType,
      ownerId,
      initialContent: latest
        ? { content: latest.content, source: ContentSource.USER, createdBy: ownerId }
        : undefined,
    });

    this.logger.log(`Contract ${copy.id} duplicated from ${contractId} by ${ownerId}`);
    return ContractDto.fromEntity(copy);
  }

  // ── Dashboard ────────────────────────────────────────────

  async stats(ownerId: string, now: Date = new Date()): Promise<ContractStatsDto> {
    const startOfMonth = new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), 1));
    const [counts, signedThisMonth] = await Promise.all([
      this.contracts.countByStatus(ownerId),
      this.contracts.countSignedSince(ownerId, startOfMonth),
    ]);

    const byStatus: Record<ContractStatus, number> = {
      [ContractStatus.DRAFT]: counts[ContractStatus.DRAFT] ?? 0,
      [ContractStatus.GENERATED]: counts[ContractStatus.GENERATED] ?? 0,
      [ContractStatus.SIGNING]: counts[ContractStatus.SIGNING] ?? 0,
      [ContractStatus.SIGNED]: counts[ContractStatus.SIGNED] ?? 0,
      [ContractStatus.CANCELLED]: counts[ContractStatus.CANCELLED] ?? 0,
    };

    return {
      total: Object.values(byStatus).reduce((sum, count) => sum + count, 0),
      byStatus,
      pendingSignatures: byStatus[ContractStatus.SIGNING],
      signedThisMonth,
    };
  }

  /** The caller's ten most recently updated contracts. */
  async recent(ownerId: string): Promise<ContractDto[]> {
    const contracts = await this.contracts.findRecent({ ownerId, limit: RECENT_LIMIT });
    return contracts.map((c) => ContractDto.fromEntity(c));
  }

  /** Contracts still waiting on the caller (any non-terminal status). */
  async pending(ownerId: string): Promise<ContractDto[]> {
    const contracts = await this.contracts.findRecent({
      ownerId,
      statuses: OPEN_STATUSES,
      limit: MAX_PAGE_SIZE,
    });
    return contracts.map((c) => ContractDto.fromEntity(c));
  }

  // ── Content & versions ───────────────────────────────────

  /**
   * Appends a content version. AI content on a DRAFT or GENERATED contract
   * counts as a generation and moves it to GENERATED through `transition`.
   */
  async updateContent(
    contractId: string,
    ownerId: string,
    dto: UpdateContentDto,
  ): Promise<ContractVersionDto> {
    const contract = await this.getOwned(contractId, ownerId);
    const source = dto.source ?? ContentSource.USER;

    if (!EDITABLE_STATUSES.includes(contract.status)) {
      throw new ContractLockedException(contract.status, 'update content');
    }

    if (source === ContentSource.AI) {
      const outcome = await this.transition(
        contractId,
        ContractStatus.GENERATED,
        ownerId,
        { content: { content: dto.content, source } },
      );
      return ContractVersionDto.fromEntity(this.requireContentVersion(outcome));
    }

    const content: NewContent = { content: dto.content, source, createdBy: ownerId };
    const version = await this.contracts.appendVersion(
      contractId,
      content,
      EDITABLE_STATUSES,
    );
    if (!version) {
      throw new ContractConflictException(contractId);
    }

    this.logger.log(`Contract ${contractId} content v${version.version} saved by ${ownerId}`);
    return ContractVersionDto.fromEntity(version);
  }

  async listVersions(contractId: string, ownerId: string): Promise<ContractVersionDto[]> {
    await this.getOwned(contractId, ownerId);
    const versions = await this.contracts.findVersions(contractId);
    return versions.map((v) => ContractVersionDto.fromEntity(v));
  }

  findLatestVersion(contractId: string): Promise<ContractVersion | null> {
    return this.contracts.findLatestVersion(contractId);
  }

  recordDocument(contractId: string, documentKey: string, documentHash: string): Promise<void> {
    return this.contracts.setDocument(contractId, documentKey, documentHash);
  }

  // ── Lifecycle ────────────────────────────────────────────

  async validTransitions(contractId: string, ownerId: string): Promise<TransitionsDto> {
    const contract = await this.getOwned(contractId, ownerId);
    return {
      currentStatus: contract.status,
      states: allowedTransitions(contract.status),
    };
  }

  /**
   * Moves the contract to `target`.
   *
   * @throws ContractNotFoundException             unknown / not owned by `actorId`
   * @throws InvalidTransitionException            edge not in the transition table
   * @throws CancellationReasonRequiredException   CANCELLED without a reason
   * @throws ContractConflictException             lost a concurrent update
   */
  async transition(
    contractId: string,
    target: ContractStatus,
    actorId: string,
    options: TransitionOptions = {},
  ): Promise<TransitionOutcome> {
    const contract = await this.getOwned(contractId, actorId);

    if (!canTransition(contract.status, target)) {
      throw new InvalidTransitionException(contract.status, target);
    }

    const reason = options.reason?.trim() || null;
    if (target === ContractStatus.CANCELLED && !reason) {
      throw new CancellationReasonRequiredException();
    }

    options.signal?.throwIfAborted();
    const outcome = await this.contracts.transition({
      contractId,
      expectedVersion: contract.version,
      fromStatus: contract.status,
      toStatus: target,
      actorId,
      reason,
      at: new Date(),
      content: options.content && { ...options.content, createdBy: actorId },
    });

    if (!outcome) {
      this.logger.warn(
        `Transition ${contract.status} → ${target} on ${contractId} lost a concurrent update`,
      );
      throw new ContractConflictException(contractId);
    }

    this.logger.log(
      `Contract ${contractId}: ${contract.status} → ${target} by ${actorId}` +
        (reason ? ` (${reason})` : ''),
    );
    return outcome;
  }

  async history(contractId: string, ownerId: string): Promise<ContractHistoryEntryDto[]> {
    await this.getOwned(contractId, ownerId);
    const entries = await this.contracts.findHistory(contractId);
    return entries.map((e) => ContractHistoryEntryDto.fromEntity(e));
  }

  /** Loads the contract with its history, versions and parties. */
  async activity(contractId: string, ownerId: string): Promise<ContractActivity> {
    const contract = await this.getOwned(contractId, ownerId);
    const [history, versions, parties] = await Promise.all([
      this.contracts.findHistory(contractId),
      this.contracts.findVersions(contractId),
      this.contracts.findParties(contractId),
    ]);
    return { contract, history, versions, parties };
  }

  // ── Parties ──────────────────────────────────────────────

  async listParties(contractId: string, ownerId: string): Promise<ContractPartyDto[]> {
    await this.getOwned(contractId, ownerId);
    const parties = await this.contracts.findParties(contractId);
    return parties.map((p) => ContractPartyDto.fromEntity(p));
  }

  /**
   * @throws PartiesLockedException     contract is SIGNED or CANCELLED
   * @throws PartyEmailTakenException   email already on this contract
   */
  async addParty(
    contractId: string,
    ownerId: string,
    dto: AddPartyDto,
  ): Promise<ContractPartyDto> {
    const contract = await this.getOwned(contractId, ownerId);
    if (!OPEN_STATUSES.includes(contract.status)) {
      throw new PartiesLockedException(contract.status);
    }

    const email = dto.email.trim().toLowerCase();
    const result = await this.contracts.addParty(
      {
        contractId,
        role: dto.role,
        name: dto.name.trim(),
        email,
        signingOrder: dto.order ?? 1,
      },
      OPEN_STATUSES,
    );

    if (result.outcome === 'duplicate-email') {
      throw new PartyEmailTakenException(email);
    }
    if (result.outcome === 'locked') {
      // Status moved on between the read and the write
      throw new ContractConflictException(contractId);
    }

    this.logger.log(`Party ${result.party.id} (${dto.role}) added to ${contractId}`);
    return ContractPartyDto.fromEntity(result.party);
  }

  /**
   * @throws PartyNotFoundException        unknown party, or one of another contract
   * @throws SignedPartyRemovalException   the party has signed
   */
  async removeParty(contractId: string, partyId: string, ownerId: string): Promise<void> {
    await this.getOwned(contractId, ownerId);

    const result = await this.contracts.removeParty(contractId, partyId);
    if (result === 'not-found') {
      throw new PartyNotFoundException(partyId);
    }
    if (result === 'signed') {
      throw new SignedPartyRemovalException();
    }
    this.logger.log(`Party ${partyId} removed from ${contractId} by ${ownerId}`);
  }

  // ── Helpers ────────────────────────────────────────────────

  private requireContentVersion(outcome: TransitionOutcome): ContractVersion {
    if (!outcome.contentVersion) {
      throw new Error(`Transition on ${outcome.contract.id} did not store content`);
    }
    return outcome.contentVersion;
  }
}
