import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  ManyToOne,
  JoinColumn,
  Index,
} from 'typeorm';
import { ContractStatus } from '../enums/contract-status.enum';
import { Contract } from './contract.entity';

/**
 * One accepted status transition of a contract. Append-only.
 */
@Entity('contract_history')
@Index('IDX_contract_history_contract_created', ['contractId', 'createdAt'])
export class ContractHistoryEntry {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'uuid', name: 'contract_id' })
  contractId!: string;

  @Column({ type: 'enum', enum: ContractStatus, name: 'from_status' })
  fromStatus!: ContractStatus;

  @Column({ type: 'enum', enum: ContractStatus, name: 'to_status' })
  toStatus!: ContractStatus;

  @Column({ type: 'varchar', length: 128, name: 'actor_id' })
  actorId!: string;

  @Column({ type: 'text', nullable: true })
  reason!: string | null;

  @CreateDateColumn({ type: 'timestamptz', name: 'created_at' })
  createdAt!: Date;

  @ManyToOne(() => Contract, (contract) => contract.history, {
    onDelete: 'CASCADE',
    nullable: false,
  })
  @JoinColumn({ name: 'contract_id' })
  contract!: Contract;
}
