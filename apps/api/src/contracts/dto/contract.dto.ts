import type { Contract, ContractStatus, ContractVersion } from '@clm/database';

export class ContractDto {
  id!: string;
  title!: string;
  status!: ContractStatus;
  templateId!: string;
  contractType!: string;
  ownerId!: string;
  version!: number;
  documentKey!: string | null;
  documentHash!: string | null;
  createdAt!: string;
  updatedAt!: string;
  signedAt!: string | null;

  static fromEntity(contract: Contract): ContractDto {
    const dto = new ContractDto();
    ContractDto.assign(dto, contract);
    return dto;
  }

  protected static assign(dto: ContractDto, contract: Contract): void {
    dto.id = contract.id;
    dto.title = contract.title;
    dto.status = contract.status;
    dto.templateId = contract.templateId;
    dto.contractType = contract.contractType;
    dto.ownerId = contract.ownerId;
    dto.version = contract.version;
    dto.documentKey = contract.documentKey;
    dto.documentHash = contract.documentHash;
    dto.createdAt = contract.createdAt.toISOString();
    dto.updatedAt = contract.updatedAt.toISOString();
    dto.signedAt = contract.signedAt ? contract.signedAt.toISOString() : null;
  }
}

/** Contract plus its latest content. */
export class ContractDetailDto extends ContractDto {
  content!: string | null;
  contentVersion!: number | null;

  static fromEntityWithContent(
    contract: Contract,
    latest: ContractVersion | null,
  ): ContractDetailDto {
    const dto = new ContractDetailDto();
    ContractDto.assign(dto, contract);
    dto.content = latest ? latest.content : null;
    dto.contentVersion = latest ? latest.version : null;
    return dto;
  }
}
