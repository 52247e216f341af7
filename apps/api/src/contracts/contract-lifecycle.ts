import { ContractStatus } from '@clm/database';

/**
 * Legal status changes. Any pair not listed is rejected.
 * GENERATED → GENERATED is re-generation and appends a new content version.
 */
export const CONTRACT_TRANSITIONS: Readonly<
  Record<ContractStatus, readonly ContractStatus[]>
> = {
  [ContractStatus.DRAFT]: [ContractStatus.GENERATED, ContractStatus.CANCELLED],
  [ContractStatus.GENERATED]: [
    ContractStatus.SIGNING,
    ContractStatus.GENERATED,
    ContractStatus.CANCELLED,
  ],
  [ContractStatus.SIGNING]: [ContractStatus.SIGNED, ContractStatus.CANCELLED],
  [ContractStatus.SIGNED]: [],
  [ContractStatus.CANCELLED]: [],
};

export function allowedTransitions(from: ContractStatus): ContractStatus[] {
  return [...CONTRACT_TRANSITIONS[from]];
}

export function canTransition(from: ContractStatus, to: ContractStatus): boolean {
  return CONTRACT_TRANSITIONS[from].includes(to);
}

export function isTerminal(status: ContractStatus): boolean {
  return CONTRACT_TRANSITIONS[status].length === 0;
}

/** Statuses in which title and content may still be edited. */
export const EDITABLE_STATUSES: readonly ContractStatus[] = [
  ContractStatus.DRAFT,
  ContractStatus.GENERATED,
];

/** Statuses in which the title may change. */
export const OPEN_STATUSES: readonly ContractStatus[] = Object.values(ContractStatus).filter(
  (status) => !isTerminal(status),
);
