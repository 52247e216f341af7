import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  ManyToOne,
  JoinColumn,
  Unique,
} from 'typeorm';
import { ContentSource } from '../enums/content-source.enum';
import { Contract } from './contract.entity';

/**
 * ContractVersion entity - one snapshot of a contract's content.
 *
 * Invariants:
 * - version starts at 1 and is unique per contract
 * - Every AI generation (including regeneration) and every user edit
 *   appends a new row; rows are never updated
 */
@Entity('contract_versions')
@Unique('UQ_contract_versions_contract_version', ['contractId', 'version'])
export class ContractVersion {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'uuid', name: 'contract_id' })
  contractId!: string;

  @Column({ type: 'int' })
  version!: number;

  @Column({ type: 'text' })
  content!: string;

  @Column({ type: 'enum', enum: ContentSource })
  source!: ContentSource;

  @Column({ type: 'varchar', length: 128, name: 'created_by' })
  createdBy!: string;

  @CreateDateColumn({ type: 'timestamptz', name: 'created_at' })
  createdAt!: Date;

  @ManyToOne(() => Contract, (contract) => contract.versions, {
    onDelete: 'CASCADE',
    nullable: false,
  })
  @JoinColumn({ name: 'contract_id' })
  contract!: Contract;
}
