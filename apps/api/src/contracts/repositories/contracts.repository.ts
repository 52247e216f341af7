import type {
  ContentSource,
  Contract,
  ContractHistoryEntry,
  ContractParty,
  ContractStatus,
  ContractVersion,
  PartyRole,
} from '@clm/database';

export interface NewContract {
  title: string;
  contractType: string;
  templateId: string;
  ownerId: string;
  /** Stored as content version 1 in the same transaction */
  initialContent?: NewContent;
}

export interface ContractPageQuery {
  ownerId: string;
  status?: ContractStatus;
  /** Case-insensitive substring of the title */
  search?: string;
  page: number;
  pageSize: number;
}

export interface ContractPage {
  items: Contract[];
  total: number;
}

export interface RecentContractsQuery {
  ownerId: string;
  /** Any status when omitted */
  statuses?: readonly ContractStatus[];
  limit: number;
}

export interface NewParty {
  contractId: string;
  role: PartyRole;
  name: string;
  /** Lower-cased by the caller */
  email: string;
  signingOrder: number;
}

export type AddPartyResult =
  | { outcome: 'added'; party: ContractParty }
  | { outcome: 'locked' }
  | { outcome: 'duplicate-email' };

export type RemovePartyResult = 'removed' | 'not-found' | 'signed';

export interface NewContent {
  content: string;
  source: ContentSource;
  createdBy: string;
}

/**
 * One status change, applied only if the contract still has
 * `expectedVersion` and `fromStatus`.
 */
export interface StatusChange {
  contractId: string;
  expectedVersion: number;
  fromStatus: ContractStatus;
  toStatus: ContractStatus;
  actorId: string;
  reason: string | null;
  at: Date;
  /** Content version to append in the same transaction */
  content?: NewContent;
}

export interface TransitionOutcome {
  contract: Contract;
  entry: ContractHistoryEntry;
  contentVersion: ContractVersion | null;
}

/**
 * Persistence port for contracts, their history and content versions.
 * Soft-deleted contracts are invisible to every method.
 */
export abstract class ContractsRepository {
  abstract create(input: NewContract): Promise<Contract>;

  abstract findById(id: string): Promise<Contract | null>;

  abstract findPage(query: ContractPageQuery): Promise<ContractPage>;

  /**
   * Compare-and-set on (id, version, status): bumps `version`, sets
   * `status` (and `signedAt` on SIGNED), appends one history entry and the
   * optional content version, all in one transaction. Resolves to null
   * when the contract no longer matches.
   */
  abstract transition(change: StatusChange): Promise<TransitionOutcome | null>;

  /** Sets the title when the contract is in one of `allowedStatuses`. */
  abstract updateTitle(
    id: string,
    title: string,
    allowedStatuses: readonly ContractStatus[],
  ): Promise<Contract | null>;

  /**
   * Appends version max+1 when the contract is in one of `allowedStatuses`;
   * null otherwise.
   */
  abstract appendVersion(
    contractId: string,
    input: NewContent,
    allowedStatuses: readonly ContractStatus[],
  ): Promise<ContractVersion | null>;

  /** Ascending by version. */
  abstract findVersions(contractId: string): Promise<ContractVersion[]>;

  abstract findLatestVersion(contractId: string): Promise<ContractVersion | null>;

  /** Ascending by creation. */
  abstract findHistory(contractId: string): Promise<ContractHistoryEntry[]>;

  /** Marks the contract deleted unless it is SIGNED. */
  abstract softDelete(id: string, at: Date): Promise<boolean>;

  /** Records the latest rendered document; does not touch status or version. */
  abstract setDocument(id: string, documentKey: string, documentHash: string): Promise<void>;

  // ── Dashboard reads ──────────────────────────────────────

  /** Most recently updated first. */
  abstract findRecent(query: RecentContractsQuery): Promise<Contract[]>;

  /** Live contracts of `ownerId` per status; statuses without any are absent. */
  abstract countByStatus(ownerId: string): Promise<Partial<Record<ContractStatus, number>>>;

  /** Live contracts of `ownerId` with `signedAt >= since`. */
  abstract countSignedSince(ownerId: string, since: Date): Promise<number>;

  // ── Parties ──────────────────────────────────────────────

  /** Ordered by signing order, then by creation. */
  abstract findParties(contractId: string): Promise<ContractParty[]>;

  /**
   * Adds a party while the contract is in one of `allowedStatuses`.
   * Emails are unique per contract.
   */
  abstract addParty(
    input: NewParty,
    allowedStatuses: readonly ContractStatus[],
  ): Promise<AddPartyResult>;

  /** Removes a party of `contractId` that has not signed. */
  abstract removeParty(contractId: string, partyId: string): Promise<RemovePartyResult>;
}
