import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AuditService } from '../../../audit/audit.service';
import { AuditEventKind } from '../../../audit/domain/enums/audit-event-kind.enum';
import { AuditEntityType } from '../../../audit/domain/enums/audit-entity-type.enum';
import { SYSTEM_ACTOR } from '../../../auth/types/actor.type';
import { BlobStorePort } from '../../../blob-storage/domain/blob-store.port';
import { ComplianceEvaluatorService } from '../../../compliance/compliance-evaluator.service';
import { AllConfigType } from '../../../config/config.type';
import { DocumentLifecycle } from '../../../folder-tree/domain/enums/document-lifecycle.enum';
import { DocumentRepository } from '../../../folder-tree/domain/repositories/document.repository.port';
import { StandardResolverDomainService } from '../../../folder-tree/domain/services/standard-resolver.domain.service';
import { StandardRepository } from '../../../standards/domain/repositories/standard.repository.port';
import {
  describeError,
  isRetryableError,
  JobFollowUpError,
} from '../../../utils/errors/domain-errors';
import { KeyedMutex } from '../../../utils/keyed-mutex';
import { computeBackoffDelay } from '../../../utils/retry-with-backoff';
import { IPaginationOptions } from '../../../utils/types/pagination-options';
import { JsonObject } from '../../../utils/types/json.type';
import { withTimeout } from '../../../utils/with-timeout';
import { ValidationJob } from '../entities/validation-job.entity';
import { ComplianceReport } from '../entities/compliance-report.entity';
import { ValidationJobState } from '../enums/validation-job-state.enum';
import { ValidationTrigger } from '../enums/validation-trigger.enum';
import { ComplianceReportRepository } from '../repositories/compliance-report.repository.port';
import { ValidationJobRepository } from '../repositories/validation-job.repository.port';
import { ValidationJobStateMachine } from '../utils/validation-job-state-machine.util';
import { CurrentReport, JobOutcome } from '../types/validation-outcome.type';

type JobSettings = {
  maxAttempts: number;
  claimTtlMs: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  blobFetchTimeoutMs: number;
};

type SettleDetails = {
  reportId?: string;
  verdict?: string;
  findingCount?: number;
  standardVersion?: number;
  lastError?: string;
};

export const ABANDONED_JOB_ERROR =
  'claim expired during the final attempt; the worker never reported back';

/**
 * Drives validation out of band from the request that caused it.
 *
 * Jobs pin the document bytes they validate. Workers claim them with a
 * conditional update, so each job runs on at most one worker at a time, and
 * renew the claim while they work. Retryable failures go back to the queue
 * with exponential backoff until `maxAttempts`; everything else settles the
 * job. After every run the document is re-resolved and a fresh job is queued
 * when its Standard or content moved on in the meantime.
 */
@Injectable()
export class ValidationOrchestratorDomainService {
  private readonly logger = new Logger(ValidationOrchestratorDomainService.name);
  private readonly enqueueMutex = new KeyedMutex();
  private readonly settings: JobSettings;

  constructor(
    private readonly jobRepository: ValidationJobRepository,
    private readonly reportRepository: ComplianceReportRepository,
    private readonly documentRepository: DocumentRepository,
    private readonly standardRepository: StandardRepository,
    private readonly resolver: StandardResolverDomainService,
    private readonly blobStore: BlobStorePort,
    private readonly compliance: ComplianceEvaluatorService,
    private readonly auditService: AuditService,
    configService: ConfigService<AllConfigType>,
  ) {
    this.settings = {
      maxAttempts: configService.getOrThrow('validation.maxAttempts', {
        infer: true,
      }),
      claimTtlMs: configService.getOrThrow('validation.claimTtlMs', {
        infer: true,
      }),
      backoffBaseMs: configService.getOrThrow('validation.backoffBaseMs', {
        infer: true,
      }),
      backoffMaxMs: configService.getOrThrow('validation.backoffMaxMs', {
        infer: true,
      }),
      blobFetchTimeoutMs: configService.getOrThrow(
        'validation.blobFetchTimeoutMs',
        { infer: true },
      ),
    };
  }

  /**
   * Queues validation of the document's current bytes. Returns the already
   * queued job for the same snapshot if there is one, and null for archived
   * documents. A running job for the document is never cancelled.
   */
  async enqueue(
    documentId: string,
    trigger: ValidationTrigger,
  ): Promise<ValidationJob | null> {
    return this.enqueueMutex.runExclusive(documentId, async () => {
      const document = await this.documentRepository.findById(documentId);
      if (!document) {
        throw new NotFoundException(`Document ${documentId} not found`);
      }
      if (document.lifecycle === DocumentLifecycle.ARCHIVED) {
        return null;
      }

      const queued = await this.jobRepository.findQueued(
        documentId,
        document.contentRef,
      );
      if (queued) {
        return queued;
      }

      const job = await this.jobRepository.create({
        documentId,
        contentRef: document.contentRef,
        trigger,
        maxAttempts: this.settings.maxAttempts,
        availableAt: new Date(),
      });
      this.logger.debug(
        `[ENQUEUE] job ${job.id} document ${documentId} trigger=${trigger}`,
      );
      return job;
    });
  }

  async enqueueMany(
    documentIds: string[],
    trigger: ValidationTrigger,
  ): Promise<ValidationJob[]> {
    const jobs: ValidationJob[] = [];
    for (const documentId of documentIds) {
      const job = await this.enqueue(documentId, trigger);
      if (job) {
        jobs.push(job);
      }
    }
    return jobs;
  }

  async claimNext(workerId: string): Promise<ValidationJob | null> {
    const now = new Date();
    await this.failAbandoned(now);
    return this.jobRepository.claimNext(
      workerId,
      now,
      new Date(now.getTime() + this.settings.claimTtlMs),
    );
  }

  /**
   * Claims and processes one job. Resolves to null when the queue is empty.
   */
  async runOnce(workerId: string): Promise<JobOutcome | null> {
    const job = await this.claimNext(workerId);
    if (!job) {
      return null;
    }
    return this.processJob(job, workerId);
  }

  async processJob(job: ValidationJob, workerId: string): Promise<JobOutcome> {
    const heartbeat = setInterval(
      () => {
        this.renewClaim(job.id, workerId).catch((error: unknown) =>
          this.logger.warn(
            `[HEARTBEAT] job ${job.id}: ${describeError(error)}`,
          ),
        );
      },
      Math.max(1, Math.floor(this.settings.claimTtlMs / 3)),
    );

    try {
      return await this.runPipeline(job, workerId);
    } catch (error) {
      // The job already settled; only the steps after the commit failed
      if (error instanceof JobFollowUpError) {
        this.logger.error(`[COMPLETE] ${error.message}`);
        throw error;
      }
      return await this.handleFailure(job, workerId, error);
    } finally {
      clearInterval(heartbeat);
    }
  }

  async getJob(jobId: string): Promise<ValidationJob> {
    const job = await this.jobRepository.findById(jobId);
    if (!job) {
      throw new NotFoundException(`Validation job ${jobId} not found`);
    }
    return job;
  }

  async listJobs(
    documentId: string,
    pagination: IPaginationOptions,
  ): Promise<ValidationJob[]> {
    await this.requireDocument(documentId);
    return this.jobRepository.findByDocumentId(documentId, pagination);
  }

  async listReports(
    documentId: string,
    pagination: IPaginationOptions,
  ): Promise<ComplianceReport[]> {
    await this.requireDocument(documentId);
    return this.reportRepository.findByDocumentId(documentId, pagination);
  }

  async getCurrentReport(documentId: string): Promise<CurrentReport> {
    await this.requireDocument(documentId);

    const report = await this.reportRepository.findLatestByDocumentId(
      documentId,
    );
    if (report) {
      return { status: 'validated', report };
    }

    const [latestJob] = await this.jobRepository.findByDocumentId(documentId, {
      page: 1,
      limit: 1,
    });
    if (latestJob?.state === ValidationJobState.SKIPPED) {
      return { status: 'skipped', job: latestJob };
    }
    if (latestJob?.state === ValidationJobState.FAILED) {
      return { status: 'failed', job: latestJob };
    }
    return { status: 'not-yet-validated' };
  }

  private async runPipeline(
    job: ValidationJob,
    workerId: string,
  ): Promise<JobOutcome> {
    await this.audit(AuditEventKind.VALIDATE_START, job, {
      jobId: job.id,
      attempt: job.attempts,
      contentRef: job.contentRef,
      trigger: job.trigger,
      workerId,
    });

    const document = await this.requireDocument(job.documentId);
    const resolution = await this.resolver.resolveStandard(document.id);

    if (
      document.lifecycle === DocumentLifecycle.ARCHIVED ||
      resolution.status === 'not-found'
    ) {
      const reason =
        document.lifecycle === DocumentLifecycle.ARCHIVED
          ? 'document is archived'
          : 'no standard governs the document';
      return this.settle(job, workerId, ValidationJobState.SKIPPED, null, {
        lastError: reason,
      });
    }

    const standard = await this.standardRepository.findById(
      resolution.standardId,
    );
    if (!standard) {
      throw new NotFoundException(
        `Standard ${resolution.standardId} not found`,
      );
    }

    const bytes = await withTimeout(
      this.blobStore.get(job.contentRef),
      this.settings.blobFetchTimeoutMs,
      `Fetching ${job.contentRef}`,
    );
    const evaluation = this.compliance.evaluate(bytes, standard);

    // Nothing is persisted once another worker owns the job
    const stillOwned = await this.jobRepository.updateClaimed(
      job.id,
      workerId,
      {
        standardId: standard.id,
        standardVersion: standard.version,
        claimExpiresAt: this.nextClaimExpiry(),
      },
    );
    if (!stillOwned) {
      return this.claimLost(job);
    }

    const report = await this.reportRepository.create({
      jobId: job.id,
      documentId: job.documentId,
      standardId: evaluation.standardId,
      standardVersion: evaluation.standardVersion,
      findings: evaluation.findings,
      verdict: evaluation.verdict,
      generatedAt: new Date(),
    });

    return this.settle(
      job,
      workerId,
      ValidationJobState.SUCCEEDED,
      standard.id,
      {
        reportId: report.id,
        verdict: report.verdict,
        findingCount: report.findings.length,
        standardVersion: standard.version,
      },
    );
  }

  private async settle(
    job: ValidationJob,
    workerId: string,
    state: ValidationJobState.SUCCEEDED | ValidationJobState.SKIPPED,
    usedStandardId: string | null,
    details: SettleDetails,
  ): Promise<JobOutcome> {
    ValidationJobStateMachine.validateTransition(
      ValidationJobState.RUNNING,
      state,
    );

    const owned = await this.jobRepository.updateClaimed(job.id, workerId, {
      state,
      finishedAt: new Date(),
      lastError: details.lastError ?? null,
      releaseClaim: true,
    });
    if (!owned) {
      return this.claimLost(job);
    }

    this.logger.log(
      `[COMPLETE] job ${job.id} document ${job.documentId} ${state}` +
        (details.verdict ? ` verdict=${details.verdict}` : '') +
        (details.lastError ? ` (${details.lastError})` : ''),
    );

    const failures: string[] = [];
    try {
      await this.audit(AuditEventKind.VALIDATE_COMPLETE, job, {
        jobId: job.id,
        outcome: state,
        standardId: usedStandardId,
        standardVersion: details.standardVersion ?? null,
        reportId: details.reportId ?? null,
        verdict: details.verdict ?? null,
        findingCount: details.findingCount ?? null,
        reason: details.lastError ?? null,
      });
    } catch (error) {
      failures.push(`validate-complete was not recorded: ${describeError(error)}`);
    }
    // Runs even when the audit append failed
    try {
      await this.supersedeIfStale(job, usedStandardId);
    } catch (error) {
      failures.push(`the staleness check failed: ${describeError(error)}`);
    }
    if (failures.length > 0) {
      throw new JobFollowUpError(job.id, state, failures);
    }

    return { jobId: job.id, state, reportId: details.reportId };
  }

  private async handleFailure(
    job: ValidationJob,
    workerId: string,
    error: unknown,
  ): Promise<JobOutcome> {
    const message = describeError(error);
    const retryable = isRetryableError(error);
    ValidationJobStateMachine.validateTransition(
      ValidationJobState.RUNNING,
      ValidationJobState.FAILED,
    );

    if (retryable && job.attempts < job.maxAttempts) {
      ValidationJobStateMachine.validateTransition(
        ValidationJobState.FAILED,
        ValidationJobState.QUEUED,
      );
      const delayMs = computeBackoffDelay(job.attempts, {
        baseDelayMs: this.settings.backoffBaseMs,
        maxDelayMs: this.settings.backoffMaxMs,
      });
      const owned = await this.jobRepository.updateClaimed(job.id, workerId, {
        state: ValidationJobState.QUEUED,
        availableAt: new Date(Date.now() + delayMs),
        lastError: message,
        releaseClaim: true,
      });
      if (!owned) {
        return this.claimLost(job);
      }

      this.logger.warn(
        `[RETRY] job ${job.id} attempt ${job.attempts}/${job.maxAttempts} failed, ` +
          `retrying in ${delayMs}ms: ${message}`,
      );
      return { jobId: job.id, state: ValidationJobState.QUEUED };
    }

    const requiresIntervention = retryable;
    const owned = await this.jobRepository.updateClaimed(job.id, workerId, {
      state: ValidationJobState.FAILED,
      finishedAt: new Date(),
      lastError: message,
      requiresIntervention,
      releaseClaim: true,
    });
    if (!owned) {
      return this.claimLost(job);
    }

    await this.recordTerminalFailure(job, message, retryable, requiresIntervention);
    return { jobId: job.id, state: ValidationJobState.FAILED };
  }

  /**
   * Settles jobs whose worker disappeared during the final attempt; they are
   * never claimed again.
   */
  private async failAbandoned(now: Date): Promise<void> {
    const abandoned = await this.jobRepository.failAbandoned(
      now,
      ABANDONED_JOB_ERROR,
    );
    for (const job of abandoned) {
      await this.recordTerminalFailure(job, ABANDONED_JOB_ERROR, true, true);
    }
  }

  // Called once the job is committed as failed
  private async recordTerminalFailure(
    job: ValidationJob,
    message: string,
    retryable: boolean,
    requiresIntervention: boolean,
  ): Promise<void> {
    this.logger.error(
      `[FAILED] job ${job.id} document ${job.documentId} after ${job.attempts} attempt(s): ${message}`,
    );
    try {
      await this.audit(AuditEventKind.VALIDATE_COMPLETE, job, {
        jobId: job.id,
        outcome: ValidationJobState.FAILED,
        error: message,
        attempts: job.attempts,
        retryable,
        requiresIntervention,
      });
    } catch (error) {
      throw new JobFollowUpError(job.id, ValidationJobState.FAILED, [
        `validate-complete was not recorded: ${describeError(error)}`,
      ]);
    }
  }

  /**
   * Queues a fresh job when the run used a Standard or content that is no
   * longer current.
   */
  private async supersedeIfStale(
    job: ValidationJob,
    usedStandardId: string | null,
  ): Promise<void> {
    const document = await this.documentRepository.findById(job.documentId);
    if (!document || document.lifecycle === DocumentLifecycle.ARCHIVED) {
      return;
    }

    const resolution = await this.resolver.resolveStandard(document.id);
    const currentStandardId =
      resolution.status === 'resolved' ? resolution.standardId : null;
    if (
      currentStandardId === usedStandardId &&
      document.contentRef === job.contentRef
    ) {
      return;
    }

    const fresh = await this.enqueue(document.id, ValidationTrigger.SUPERSEDED);
    this.logger.log(
      `[SUPERSEDE] job ${job.id} is stale, follow-up job ${fresh?.id ?? '(none)'}`,
    );
  }

  private async renewClaim(jobId: string, workerId: string): Promise<void> {
    const owned = await this.jobRepository.updateClaimed(jobId, workerId, {
      claimExpiresAt: this.nextClaimExpiry(),
    });
    if (!owned) {
      this.logger.warn(`[HEARTBEAT] lost claim on job ${jobId}`);
    }
  }

  private nextClaimExpiry(): Date {
    return new Date(Date.now() + this.settings.claimTtlMs);
  }

  private claimLost(job: ValidationJob): JobOutcome {
    this.logger.warn(`[CLAIM] job ${job.id} was taken over by another worker`);
    return { jobId: job.id, state: 'claim-lost' };
  }

  private async requireDocument(documentId: string) {
    const document = await this.documentRepository.findById(documentId);
    if (!document) {
      throw new NotFoundException(`Document ${documentId} not found`);
    }
    return document;
  }

  private async audit(
    kind: AuditEventKind,
    job: ValidationJob,
    payload: JsonObject,
  ): Promise<void> {
    await this.auditService.append({
      kind,
      actorSubject: SYSTEM_ACTOR.subject,
      entityType: AuditEntityType.DOCUMENT,
      entityId: job.documentId,
      payload,
    });
  }
}
