import { NullableType } from '../../../utils/types/nullable.type';
import { IPaginationOptions } from '../../../utils/types/pagination-options';
import {
  ClaimedJobPatch,
  NewValidationJob,
  ValidationJob,
} from '../entities/validation-job.entity';

export abstract class ValidationJobRepository {
  abstract create(data: NewValidationJob): Promise<ValidationJob>;

  abstract findById(id: string): Promise<NullableType<ValidationJob>>;

  abstract findQueued(
    documentId: string,
    contentRef: string,
  ): Promise<NullableType<ValidationJob>>;

  /**
   * Most recently enqueued first; fetches `limit + 1` rows.
   */
  abstract findByDocumentId(
    documentId: string,
    pagination: IPaginationOptions,
  ): Promise<ValidationJob[]>;

  /**
   * Atomically claims the oldest available job: a queued job whose backoff
   * has elapsed, or a running job whose claim expired while it still had
   * attempts left. The claim is a
   * conditional update, so concurrent callers never receive the same job.
   * Returns null when nothing is claimable.
   */
  abstract claimNext(
    workerId: string,
    now: Date,
    claimExpiresAt: Date,
  ): Promise<NullableType<ValidationJob>>;

  /**
   * Moves running jobs whose claim expired after their last allowed attempt
   * to `failed` with `requiresIntervention`, releasing the claim. Each row is
   * settled by a conditional update; returns only the jobs this call settled.
   */
  abstract failAbandoned(now: Date, lastError: string): Promise<ValidationJob[]>;

  /**
   * Applies the patch only while `workerId` still holds the claim on a
   * running job. Returns false when the claim was lost.
   */
  abstract updateClaimed(
    jobId: string,
    workerId: string,
    patch: ClaimedJobPatch,
  ): Promise<boolean>;
}
