import type { ContractParty, PartyRole, SignatureStatus } from '@clm/database';

export class ContractPartyDto {
  id!: string;
  role!: PartyRole;
  name!: string;
  email!: string;
  signatureStatus!: SignatureStatus;
  signedAt!: string | null;
  order!: number;

  static fromEntity(party: ContractParty): ContractPartyDto {
    const dto = new ContractPartyDto();
    dto.id = party.id;
    dto.role = party.role;
    dto.name = party.name;
    dto.email = party.email;
    dto.signatureStatus = party.signatureStatus;
    dto.signedAt = party.signedAt ? party.signedAt.toISOString() : null;
    dto.order = party.signingOrder;
    return dto;
  }
}
