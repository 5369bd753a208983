import { ComplianceReport } from '../entities/compliance-report.entity';
import { ValidationJob } from '../entities/validation-job.entity';
import { ValidationJobState } from '../enums/validation-job-state.enum';

export type JobOutcome = {
  jobId: string;
  // 'claim-lost' when another worker took the job over mid-run
  state: ValidationJobState | 'claim-lost';
  reportId?: string;
};

export type CurrentReport =
  | { status: 'validated'; report: ComplianceReport }
  | { status: 'not-yet-validated' }
  | { status: 'skipped'; job: ValidationJob }
  | { status: 'failed'; job: ValidationJob };
