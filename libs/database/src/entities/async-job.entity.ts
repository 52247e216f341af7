import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
} from 'typeorm';
import { JobKind } from '../enums/job-kind.enum';
import { JobStatus } from '../enums/job-status.enum';

/** Structured failure reason stored on a FAILED job. */
export interface JobError {
  code: string;
  message: string;
}

/**
 * AsyncJob entity - tracks one long-running unit of work.
 *
 * Invariants:
 * - Created in PENDING before the submit call returns
 * - Status moves forward only: PENDING → RUNNING → SUCCEEDED | FAILED
 *   (PENDING → FAILED when abandoned); every write is a conditional
 *   update on the current status
 * - result is set only on SUCCEEDED, error only on FAILED
 * - started_at is set when status becomes RUNNING
 * - completed_at is set when status becomes SUCCEEDED or FAILED
 */
@Entity('async_jobs')
@Index('IDX_async_jobs_status_created', ['status', 'createdAt'])
export class AsyncJob {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'enum', enum: JobKind })
  kind!: JobKind;

  @Column({ type: 'enum', enum: JobStatus, default: JobStatus.PENDING })
  status!: JobStatus;

  @Column({ type: 'jsonb', default: () => "'{}'" })
  parameters!: Record<string, unknown>;

  @Column({ type: 'jsonb', nullable: true })
  result!: Record<string, unknown> | null;

  @Column({ type: 'jsonb', nullable: true })
  error!: JobError | null;

  @Index('IDX_async_jobs_requested_by')
  @Column({ type: 'varchar', length: 128, name: 'requested_by' })
  requestedBy!: string;

  @Column({ type: 'timestamptz', name: 'started_at', nullable: true })
  startedAt!: Date | null;

  @Column({ type: 'timestamptz', name: 'completed_at', nullable: true })
  completedAt!: Date | null;

  @CreateDateColumn({ type: 'timestamptz', name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ type: 'timestamptz', name: 'updated_at' })
  updatedAt!: Date;
}
