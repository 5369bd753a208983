import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { EntityRelationalHelper } from '../../../../../utils/relational-entity-helper';
import { ValidationJobState } from '../../../../domain/enums/validation-job-state.enum';
import { ValidationTrigger } from '../../../../domain/enums/validation-trigger.enum';

@Entity({ name: 'validation_jobs' })
@Index(['state', 'availableAt'])
@Index(['documentId', 'enqueuedAt'])
export class ValidationJobEntity extends EntityRelationalHelper {
  @PrimaryGeneratedColumn('uuid')
  id: string;

  @Column({ name: 'document_id', type: 'uuid' })
  documentId: string;

  @Column({ name: 'content_ref', type: 'varchar', length: 500 })
  contentRef: string;

  @Column({ name: 'standard_id', type: 'uuid', nullable: true })
  standardId: string | null;

  @Column({ name: 'standard_version', type: 'integer', nullable: true })
  standardVersion: number | null;

  @Column({ type: 'varchar', length: 20 })
  state: ValidationJobState;

  @Column({ type: 'varchar', length: 20 })
  trigger: ValidationTrigger;

  @Column({ type: 'integer', default: 0 })
  attempts: number;

  @Column({ name: 'max_attempts', type: 'integer' })
  maxAttempts: number;

  @CreateDateColumn({ name: 'enqueued_at', type: 'timestamptz' })
  enqueuedAt: Date;

  @Column({ name: 'available_at', type: 'timestamptz' })
  availableAt: Date;

  @Column({ name: 'started_at', type: 'timestamptz', nullable: true })
  startedAt: Date | null;

  @Column({ name: 'finished_at', type: 'timestamptz', nullable: true })
  finishedAt: Date | null;

  @Column({ name: 'claimed_by', type: 'varchar', length: 100, nullable: true })
  claimedBy: string | null;

  @Column({ name: 'claim_expires_at', type: 'timestamptz', nullable: true })
  claimExpiresAt: Date | null;

  @Column({ name: 'last_error', type: 'text', nullable: true })
  lastError: string | null;

  @Column({ name: 'requires_intervention', type: 'boolean', default: false })
  requiresIntervention: boolean;
}
