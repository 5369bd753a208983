import { ValidationJobState } from '../enums/validation-job-state.enum';
import { ValidationTrigger } from '../enums/validation-trigger.enum';

/**
 * One validation run of a document snapshot. `contentRef` pins the bytes at
 * enqueue time; `standardId`/`standardVersion` are filled in once a worker
 * has resolved the governing Standard.
 */
export class ValidationJob {
  id: string;
  documentId: string;
  contentRef: string;
  standardId: string | null;
  standardVersion: number | null;
  state: ValidationJobState;
  trigger: ValidationTrigger;
  attempts: number;
  maxAttempts: number;
  enqueuedAt: Date;
  // Not claimable before this instant (retry backoff)
  availableAt: Date;
  startedAt: Date | null;
  finishedAt: Date | null;
  claimedBy: string | null;
  claimExpiresAt: Date | null;
  lastError: string | null;
  requiresIntervention: boolean;
}

export type NewValidationJob = Pick<
  ValidationJob,
  'documentId' | 'contentRef' | 'trigger' | 'maxAttempts' | 'availableAt'
>;

export type ClaimedJobPatch = Partial<
  Pick<
    ValidationJob,
    | 'state'
    | 'standardId'
    | 'standardVersion'
    | 'availableAt'
    | 'finishedAt'
    | 'claimExpiresAt'
    | 'lastError'
    | 'requiresIntervention'
  >
> & {
  // Drops the claim; set when the job leaves `running`
  releaseClaim?: boolean;
};
