import { ValidationJob } from '../../../../domain/entities/validation-job.entity';
import { ValidationJobEntity } from '../entities/validation-job.entity';

export class ValidationJobMapper {
  static toDomain(entity: ValidationJobEntity): ValidationJob {
    const domain = new ValidationJob();
    domain.id = entity.id;
    domain.documentId = entity.documentId;
    domain.contentRef = entity.contentRef;
    domain.standardId = entity.standardId ?? null;
    domain.standardVersion = entity.standardVersion ?? null;
    domain.state = entity.state;
    domain.trigger = entity.trigger;
    domain.attempts = entity.attempts;
    domain.maxAttempts = entity.maxAttempts;
    domain.enqueuedAt = entity.enqueuedAt;
    domain.availableAt = entity.availableAt;
    domain.startedAt = entity.startedAt ?? null;
    domain.finishedAt = entity.finishedAt ?? null;
    domain.claimedBy = entity.claimedBy ?? null;
    domain.claimExpiresAt = entity.claimExpiresAt ?? null;
    domain.lastError = entity.lastError ?? null;
    domain.requiresIntervention = entity.requiresIntervention;
    return domain;
  }
}
