import {
  Column,
  Entity,
  Index,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { EntityRelationalHelper } from '../../../../../utils/relational-entity-helper';
import { ComplianceVerdict } from '../../../../../compliance/domain/enums/compliance-verdict.enum';
import { Finding } from '../../../../../compliance/domain/types/compliance-evaluation.type';

@Entity({ name: 'compliance_reports' })
@Index(['documentId', 'generatedAt'])
export class ComplianceReportEntity extends EntityRelationalHelper {
  @PrimaryGeneratedColumn('uuid')
  id: string;

  @Column({ name: 'job_id', type: 'uuid', unique: true })
  jobId: string;

  @Column({ name: 'document_id', type: 'uuid' })
  documentId: string;

  @Column({ name: 'standard_id', type: 'uuid' })
  standardId: string;

  @Column({ name: 'standard_version', type: 'integer' })
  standardVersion: number;

  @Column({ type: 'jsonb' })
  findings: Finding[];

  @Column({ type: 'varchar', length: 30 })
  verdict: ComplianceVerdict;

  @Column({ name: 'generated_at', type: 'timestamptz' })
  generatedAt: Date;
}
