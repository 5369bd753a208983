import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../config/config.type';
import {
  AuditEntityRef,
  AuditEvent,
  NewAuditEvent,
} from './domain/entities/audit-event.entity';
import {
  AuditEventFilter,
  AuditEventRepository,
} from './domain/repositories/audit-event.repository.port';
import { retryWithBackoff, RetryOptions } from '../utils/retry-with-backoff';
import { describeError } from '../utils/errors/domain-errors';

export const AUDIT_APPEND_RETRY: Omit<RetryOptions, 'sleep'> = {
  maxAttempts: 3,
  baseDelayMs: 50,
  maxDelayMs: 500,
};

const HISTORY_BATCH_SIZE = 100;

/**
 * Append-only audit ledger.
 *
 * Appends are retried with backoff and re-thrown when storage stays
 * unavailable; an audit event is never silently dropped. Every stored event
 * is also emitted as one structured JSON log line.
 */
@Injectable()
export class AuditService {
  private readonly logger = new Logger(AuditService.name);

  constructor(
    private readonly repository: AuditEventRepository,
    private readonly configService: ConfigService<AllConfigType>,
  ) {}

  async append(event: NewAuditEvent): Promise<AuditEvent> {
    const stored = await retryWithBackoff(
      () => this.repository.append(event),
      {
        ...AUDIT_APPEND_RETRY,
        onRetry: (error, attempt, delayMs) =>
          this.logger.warn(
            `[APPEND] ${event.kind} ${event.entityType}/${event.entityId} attempt ${attempt} failed, ` +
              `retrying in ${delayMs}ms: ${describeError(error)}`,
          ),
      },
    );

    this.logger.log(
      JSON.stringify({
        timestamp: stored.occurredAt.toISOString(),
        service: this.configService.get('app.name', { infer: true }),
        component: 'audit',
        auditId: stored.id,
        kind: stored.kind,
        actor: stored.actorSubject,
        entityType: stored.entityType,
        entityId: stored.entityId,
        payload: stored.payload,
      }),
    );
    return stored;
  }

  /**
   * Lazily walks the history of one entity in id order, starting after
   * `sinceId`. Iteration can be resumed from the id of the last event seen.
   */
  async *history(
    ref: AuditEntityRef,
    sinceId = 0,
  ): AsyncGenerator<AuditEvent, void, undefined> {
    let cursor = sinceId;

    for (;;) {
      const batch = await this.repository.findAfter(
        ref,
        cursor,
        HISTORY_BATCH_SIZE,
      );
      for (const event of batch) {
        cursor = event.id;
        yield event;
      }
      if (batch.length < HISTORY_BATCH_SIZE) {
        return;
      }
    }
  }

  findPage(
    filter: AuditEventFilter,
    sinceId: number,
    limit: number,
  ): Promise<AuditEvent[]> {
    return this.repository.findAfter(filter, sinceId, limit);
  }
}
