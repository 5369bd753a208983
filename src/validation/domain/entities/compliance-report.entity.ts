import { ComplianceVerdict } from '../../../compliance/domain/enums/compliance-verdict.enum';
import { Finding } from '../../../compliance/domain/types/compliance-evaluation.type';

// Immutable result of one successful job.
export class ComplianceReport {
  id: string;
  jobId: string;
  documentId: string;
  standardId: string;
  standardVersion: number;
  findings: Finding[];
  verdict: ComplianceVerdict;
  generatedAt: Date;
}

export type NewComplianceReport = Omit<ComplianceReport, 'id'>;
