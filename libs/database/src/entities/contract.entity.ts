import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  OneToMany,
  Index,
} from 'typeorm';
import { ContractStatus } from '../enums/contract-status.enum';
import { ContractHistoryEntry } from './contract-history.entity';
import { ContractVersion } from './contract-version.entity';
import { ContractParty } from './contract-party.entity';

/**
 * Contract entity - a single agreement moving through its lifecycle.
 *
 * Invariants:
 * - Created in DRAFT
 * - status changes only through a compare-and-set on (id, version, status)
 *   that also appends exactly one ContractHistoryEntry
 * - version increments on every status change; callers holding a stale
 *   version lose the race and get a 409
 * - signed_at is set when status becomes SIGNED
 * - deleted_at marks a soft delete; soft-deleted rows are invisible to the API
 */
@Entity('contracts')
@Index('IDX_contracts_owner_status', ['ownerId', 'status'])
export class Contract {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 500 })
  title!: string;

  @Column({ type: 'varchar', length: 100, name: 'contract_type' })
  contractType!: string;

  @Column({ type: 'varchar', length: 100, name: 'template_id' })
  templateId!: string;

  @Index('IDX_contracts_owner_id')
  @Column({ type: 'varchar', length: 128, name: 'owner_id' })
  ownerId!: string;

  @Column({
    type: 'enum',
    enum: ContractStatus,
    default: ContractStatus.DRAFT,
  })
  status!: ContractStatus;

  @Column({ type: 'int', default: 1 })
  version!: number;

  @Column({ type: 'varchar', length: 1024, name: 'document_key', nullable: true })
  documentKey!: string | null;

  @Column({ type: 'varchar', length: 64, name: 'document_hash', nullable: true })
  documentHash!: string | null;

  @Column({ type: 'timestamptz', name: 'signed_at', nullable: true })
  signedAt!: Date | null;

  @Column({ type: 'timestamptz', name: 'deleted_at', nullable: true })
  deletedAt!: Date | null;

  @CreateDateColumn({ type: 'timestamptz', name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ type: 'timestamptz', name: 'updated_at' })
  updatedAt!: Date;

  // ── Relations ────────────────────────────────────────────

  @OneToMany(() => ContractHistoryEntry, (entry) => entry.contract, {
    cascade: false,
  })
  history!: ContractHistoryEntry[];

  @OneToMany(() => ContractVersion, (version) => version.contract, {
    cascade: false,
  })
  versions!: ContractVersion[];

  @OneToMany(() => ContractParty, (party) => party.contract, {
    cascade: false,
  })
  parties!: ContractParty[];
}
