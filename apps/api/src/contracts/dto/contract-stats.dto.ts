import type { ContractStatus } from '@clm/database';

/** Dashboard counters over the caller's live contracts. */
export class ContractStatsDto {
  total!: number;
  /** Every status is present, zero when unused */
  byStatus!: Record<ContractStatus, number>;
  /** Contracts currently in SIGNING */
  pendingSignatures!: number;
  /** Signed since the first day of the current month (UTC) */
  signedThisMonth!: number;
}
