import type { ContentSource, ContractVersion } from '@clm/database';

export class ContractVersionDto {
  version!: number;
  content!: string;
  source!: ContentSource;
  createdBy!: string;
  createdAt!: string;

  static fromEntity(entity: ContractVersion): ContractVersionDto {
    const dto = new ContractVersionDto();
    dto.version = entity.version;
    dto.content = entity.content;
    dto.source = entity.source;
    dto.createdBy = entity.createdBy;
    dto.createdAt = entity.createdAt.toISOString();
    return dto;
  }
}
