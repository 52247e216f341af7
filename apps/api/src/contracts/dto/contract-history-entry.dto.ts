import type { ContractHistoryEntry, ContractStatus } from '@clm/database';

export class ContractHistoryEntryDto {
  fromStatus!: ContractStatus;
  toStatus!: ContractStatus;
  actorId!: string;
  reason!: string | null;
  createdAt!: string;

  static fromEntity(entry: ContractHistoryEntry): ContractHistoryEntryDto {
    const dto = new ContractHistoryEntryDto();
    dto.fromStatus = entry.fromStatus;
    dto.toStatus = entry.toStatus;
    dto.actorId = entry.actorId;
    dto.reason = entry.reason;
    dto.createdAt = entry.createdAt.toISOString();
    return dto;
  }
}
