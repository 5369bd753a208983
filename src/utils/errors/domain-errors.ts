import {
  ConflictException,
  HttpException,
  ServiceUnavailableException,
  UnprocessableEntityException,
} from '@nestjs/common';

/**
 * Errors raised by domain services. HTTP-facing ones extend the matching Nest
 * exception so controllers need no translation layer; `retryable` is read by
 * the validation worker when it classifies a failed attempt.
 */
export interface ClassifiedError {
  readonly retryable: boolean;
}

export class TransientStorageError
  extends ServiceUnavailableException
  implements ClassifiedError
{
  readonly retryable = true;

  constructor(operation: string, cause?: unknown) {
    super(
      `Blob store ${operation} failed: ${describeError(cause)}`,
      'TransientStorageError',
    );
    this.name = 'TransientStorageError';
  }
}

export class CycleRejectedError
  extends ConflictException
  implements ClassifiedError
{
  readonly retryable = false;

  constructor(folderId: string, newParentId: string) {
    super(
      `Moving folder ${folderId} under ${newParentId} would create a cycle`,
      'CycleRejected',
    );
    this.name = 'CycleRejectedError';
  }
}

export class LineageConflictError
  extends ConflictException
  implements ClassifiedError
{
  readonly retryable = false;

  constructor(predecessorId: string, headId: string) {
    super(
      `Standard ${predecessorId} is not the head of its lineage (head is ${headId})`,
      'LineageConflict',
    );
    this.name = 'LineageConflictError';
  }
}

export class InvalidSourceDocumentError
  extends UnprocessableEntityException
  implements ClassifiedError
{
  readonly retryable = false;

  constructor(documentId: string, reason: string) {
    super(
      `Document ${documentId} cannot be promoted: ${reason}`,
      'InvalidSourceDocument',
    );
    this.name = 'InvalidSourceDocumentError';
  }
}

export class OperationTimeoutError extends Error implements ClassifiedError {
  readonly retryable = true;
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'OperationTimeoutError';
    this.timeoutMs = timeoutMs;

    Object.setPrototypeOf(this, OperationTimeoutError.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.name,
      message: this.message,
      timeoutMs: this.timeoutMs,
    };
  }
}

/**
 * The job already reached its terminal state, but a step after that commit
 * failed: the completion audit event or the staleness check. The job itself
 * is not retried.
 */
export class JobFollowUpError extends Error implements ClassifiedError {
  readonly retryable = false;
  readonly jobId: string;
  readonly failures: string[];

  constructor(jobId: string, state: string, failures: string[]) {
    super(`Job ${jobId} settled as ${state}, but ${failures.join('; ')}`);
    this.name = 'JobFollowUpError';
    this.jobId = jobId;
    this.failures = failures;

    Object.setPrototypeOf(this, JobFollowUpError.prototype);
  }
}

function hasRetryableFlag(error: unknown): error is ClassifiedError {
  return (
    typeof error === 'object' &&
    error !== null &&
    'retryable' in error &&
    typeof error.retryable === 'boolean'
  );
}

/**
 * Classified errors decide for themselves. Other HTTP exceptions (404, 400)
 * describe a state that another attempt will not change; anything else is an
 * unexpected failure and is retried.
 */
export function isRetryableError(error: unknown): boolean {
  if (hasRetryableFlag(error)) {
    return error.retryable;
  }
  if (error instanceof HttpException) {
    return error.getStatus() >= 500;
  }
  return true;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (error === undefined) {
    return 'unknown error';
  }
  return String(error);
}
