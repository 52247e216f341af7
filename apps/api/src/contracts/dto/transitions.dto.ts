import type { ContractStatus } from '@clm/database';

export class TransitionsDto {
  currentStatus!: ContractStatus;
  /** Empty for terminal statuses */
  states!: ContractStatus[];
}
