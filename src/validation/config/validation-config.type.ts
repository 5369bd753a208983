export type ValidationConfig = {
  workerEnabled: boolean;
  workerConcurrency: number;
  pollIntervalMs: number;
  claimTtlMs: number;
  maxAttempts: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  blobFetchTimeoutMs: number;
  maxDocumentBytes: number;
  maxPartBytes: number;
};
