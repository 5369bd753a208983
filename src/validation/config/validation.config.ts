import { registerAs } from '@nestjs/config';
import { IsBoolean, IsInt, IsOptional, Max, Min } from 'class-validator';
import validateConfig from '../../utils/validate-config';
import { ValidationConfig } from './validation-config.type';

class EnvironmentVariablesValidator {
  @IsBoolean()
  @IsOptional()
  VALIDATION_WORKER_ENABLED?: boolean;

  @IsInt()
  @Min(1)
  @Max(64)
  @IsOptional()
  VALIDATION_WORKER_CONCURRENCY?: number;

  @IsInt()
  @Min(50)
  @IsOptional()
  VALIDATION_POLL_INTERVAL_MS?: number;

  @IsInt()
  @Min(1000)
  @IsOptional()
  VALIDATION_CLAIM_TTL_MS?: number;

  @IsInt()
  @Min(1)
  @Max(20)
  @IsOptional()
  VALIDATION_MAX_ATTEMPTS?: number;

  @IsInt()
  @Min(0)
  @IsOptional()
  VALIDATION_BACKOFF_BASE_MS?: number;

  @IsInt()
  @Min(0)
  @IsOptional()
  VALIDATION_BACKOFF_MAX_MS?: number;

  @IsInt()
  @Min(100)
  @IsOptional()
  VALIDATION_BLOB_FETCH_TIMEOUT_MS?: number;

  @IsInt()
  @Min(1)
  @Max(200)
  @IsOptional()
  VALIDATION_MAX_DOCUMENT_SIZE_MB?: number;
}

export default registerAs<ValidationConfig>('validation', () => {
  const validated = validateConfig(process.env, EnvironmentVariablesValidator);
  const maxDocumentMb = validated.VALIDATION_MAX_DOCUMENT_SIZE_MB ?? 20;

  return {
    workerEnabled: process.env.VALIDATION_WORKER_ENABLED !== 'false',
    workerConcurrency: validated.VALIDATION_WORKER_CONCURRENCY ?? 2,
    pollIntervalMs: validated.VALIDATION_POLL_INTERVAL_MS ?? 2000,
    claimTtlMs: validated.VALIDATION_CLAIM_TTL_MS ?? 60000,
    maxAttempts: validated.VALIDATION_MAX_ATTEMPTS ?? 5,
    backoffBaseMs: validated.VALIDATION_BACKOFF_BASE_MS ?? 5000,
    backoffMaxMs: validated.VALIDATION_BACKOFF_MAX_MS ?? 300000,
    blobFetchTimeoutMs: validated.VALIDATION_BLOB_FETCH_TIMEOUT_MS ?? 30000,
    maxDocumentBytes: maxDocumentMb * 1024 * 1024,
    // Decompressed parts may legitimately be several times the package size
    maxPartBytes: maxDocumentMb * 4 * 1024 * 1024,
  };
});
