import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Brackets, Repository } from 'typeorm';
import { QueryDeepPartialEntity } from 'typeorm/query-builder/QueryPartialEntity';
import { ValidationJobEntity } from '../entities/validation-job.entity';
import { ValidationJobMapper } from '../mappers/validation-job.mapper';
import { ValidationJobRepository } from '../../../../domain/repositories/validation-job.repository.port';
import {
  ClaimedJobPatch,
  NewValidationJob,
  ValidationJob,
} from '../../../../domain/entities/validation-job.entity';
import { ValidationJobState } from '../../../../domain/enums/validation-job-state.enum';
import { NullableType } from '../../../../../utils/types/nullable.type';
import { IPaginationOptions } from '../../../../../utils/types/pagination-options';

// Candidates fetched per claim round; losers of a race try the next one
const CLAIM_CANDIDATES = 5;

const claimable = (now: Date) =>
  new Brackets((qb) => {
    qb.where('(state = :queued AND available_at <= :now)', {
      queued: ValidationJobState.QUEUED,
      now,
    }).orWhere(
      '(state = :running AND claim_expires_at < :now AND attempts < max_attempts)',
      { running: ValidationJobState.RUNNING, now },
    );
  });

// Claim lapsed on the final attempt: no worker may pick the job up again
const abandoned = (now: Date) =>
  new Brackets((qb) => {
    qb.where(
      'state = :running AND claim_expires_at < :now AND attempts >= max_attempts',
      { running: ValidationJobState.RUNNING, now },
    );
  });

@Injectable()
export class ValidationJobRelationalRepository
  implements ValidationJobRepository
{
  constructor(
    @InjectRepository(ValidationJobEntity)
    private readonly repository: Repository<ValidationJobEntity>,
  ) {}

  async create(data: NewValidationJob): Promise<ValidationJob> {
    const entity = this.repository.create({
      ...data,
      state: ValidationJobState.QUEUED,
      attempts: 0,
      standardId: null,
      standardVersion: null,
      startedAt: null,
      finishedAt: null,
      claimedBy: null,
      claimExpiresAt: null,
      lastError: null,
      requiresIntervention: false,
    });
    const saved = await this.repository.save(entity);
    return ValidationJobMapper.toDomain(saved);
  }

  async findById(id: string): Promise<NullableType<ValidationJob>> {
    const entity = await this.repository.findOne({ where: { id } });
    return entity ? ValidationJobMapper.toDomain(entity) : null;
  }

  async findQueued(
    documentId: string,
    contentRef: string,
  ): Promise<NullableType<ValidationJob>> {
    const entity = await this.repository.findOne({
      where: { documentId, contentRef, state: ValidationJobState.QUEUED },
      order: { enqueuedAt: 'ASC' },
    });
    return entity ? ValidationJobMapper.toDomain(entity) : null;
  }

  async findByDocumentId(
    documentId: string,
    pagination: IPaginationOptions,
  ): Promise<ValidationJob[]> {
    const entities = await this.repository.find({
      where: { documentId },
      order: { enqueuedAt: 'DESC', id: 'ASC' },
      skip: (pagination.page - 1) * pagination.limit,
      take: pagination.limit + 1,
    });
    return entities.map((entity) => ValidationJobMapper.toDomain(entity));
  }

  async claimNext(
    workerId: string,
    now: Date,
    claimExpiresAt: Date,
  ): Promise<NullableType<ValidationJob>> {
    const candidates = await this.repository
      .createQueryBuilder('job')
      .select('job.id', 'id')
      .where(claimable(now))
      .orderBy('job.available_at', 'ASC')
      .limit(CLAIM_CANDIDATES)
      .getRawMany<{ id: string }>();

    for (const { id } of candidates) {
      // The predicate is re-checked by the update itself, so only one
      // concurrent claimer can match the row
      const result = await this.repository
        .createQueryBuilder()
        .update()
        .set({
          state: ValidationJobState.RUNNING,
          claimedBy: workerId,
          claimExpiresAt,
          startedAt: now,
          attempts: () => 'attempts + 1',
        })
        .where('id = :id', { id })
        .andWhere(claimable(now))
        .execute();

      if (result.affected === 1) {
        return this.findById(id);
      }
    }
    return null;
  }

  async failAbandoned(now: Date, lastError: string): Promise<ValidationJob[]> {
    const candidates = await this.repository
      .createQueryBuilder('job')
      .select('job.id', 'id')
      .where(abandoned(now))
      .getRawMany<{ id: string }>();

    const settled: ValidationJob[] = [];
    for (const { id } of candidates) {
      const result = await this.repository
        .createQueryBuilder()
        .update()
        .set({
          state: ValidationJobState.FAILED,
          finishedAt: now,
          lastError,
          requiresIntervention: true,
          claimedBy: null,
          claimExpiresAt: null,
        })
        .where('id = :id', { id })
        .andWhere(abandoned(now))
        .execute();

      if (result.affected === 1) {
        const job = await this.findById(id);
        if (job) {
          settled.push(job);
        }
      }
    }
    return settled;
  }

  async updateClaimed(
    jobId: string,
    workerId: string,
    patch: ClaimedJobPatch,
  ): Promise<boolean> {
    const { releaseClaim, ...fields } = patch;
    const values: QueryDeepPartialEntity<ValidationJobEntity> = releaseClaim
      ? { ...fields, claimedBy: null, claimExpiresAt: null }
      : fields;

    const result = await this.repository.update(
      { id: jobId, claimedBy: workerId, state: ValidationJobState.RUNNING },
      values,
    );
    return result.affected === 1;
  }
}
