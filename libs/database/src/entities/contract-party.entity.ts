import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  ManyToOne,
  JoinColumn,
  Unique,
  Check,
} from 'typeorm';
import { PartyRole } from '../enums/party-role.enum';
import { SignatureStatus } from '../enums/signature-status.enum';
import { Contract } from './contract.entity';

/**
 * ContractParty entity - a signer or witness listed on a contract.
 *
 * Invariants:
 * - email is unique per contract
 * - signing_order starts at 1
 * - a party that has SIGNED is never removed
 */
@Entity('contract_parties')
@Unique('UQ_contract_parties_contract_email', ['contractId', 'email'])
@Check('CHK_contract_parties_signing_order', '"signing_order" > 0')
export class ContractParty {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'uuid', name: 'contract_id' })
  contractId!: string;

  @Column({ type: 'enum', enum: PartyRole })
  role!: PartyRole;

  @Column({ type: 'varchar', length: 255 })
  name!: string;

  @Column({ type: 'varchar', length: 255 })
  email!: string;

  @Column({
    type: 'enum',
    enum: SignatureStatus,
    name: 'signature_status',
    default: SignatureStatus.PENDING,
  })
  signatureStatus!: SignatureStatus;

  @Column({ type: 'timestamptz', name: 'signed_at', nullable: true })
  signedAt!: Date | null;

  @Column({ type: 'int', name: 'signing_order', default: 1 })
  signingOrder!: number;

  @CreateDateColumn({ type: 'timestamptz', name: 'created_at' })
  createdAt!: Date;

  @ManyToOne(() => Contract, (contract) => contract.parties, {
    onDelete: 'CASCADE',
    nullable: false,
  })
  @JoinColumn({ name: 'contract_id' })
  contract!: Contract;
}
