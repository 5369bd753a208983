import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Bucket, Storage } from '@google-cloud/storage';
import * as path from 'path';
import { AllConfigType } from '../../config/config.type';
import {
  BlobMetadata,
  BlobStorePort,
  StoredBlob,
} from '../domain/blob-store.port';
import { contentKey, sha256Hex } from '../domain/content-key';
import {
  describeError,
  TransientStorageError,
} from '../../utils/errors/domain-errors';

function errorCode(error: unknown): unknown {
  return typeof error === 'object' && error !== null && 'code' in error
    ? error.code
    : undefined;
}

/**
 * Google Cloud Storage adapter.
 *
 * Credentials come from GOOGLE_APPLICATION_CREDENTIALS when set, otherwise
 * from Application Default Credentials. Object keys are never logged above
 * debug level.
 */
@Injectable()
export class GcsBlobStoreAdapter extends BlobStorePort {
  private readonly logger = new Logger(GcsBlobStoreAdapter.name);
  private readonly bucket: Bucket;
  private readonly prefix: string;

  constructor(configService: ConfigService<AllConfigType>) {
    super();
    const credentialsPathEnv = process.env.GOOGLE_APPLICATION_CREDENTIALS;
    const credentialsPath = credentialsPathEnv
      ? path.isAbsolute(credentialsPathEnv)
        ? credentialsPathEnv
        : path.resolve(process.cwd(), credentialsPathEnv)
      : undefined;

    const storage = credentialsPath
      ? new Storage({ keyFilename: credentialsPath })
      : new Storage();
    if (!credentialsPath) {
      this.logger.log('[GCS] Using Application Default Credentials (ADC).');
    }

    const bucketName = configService.getOrThrow('blobStorage.gcs.bucket', {
      infer: true,
    });
    this.bucket = storage.bucket(bucketName);
    this.prefix = configService.getOrThrow('blobStorage.gcs.prefix', {
      infer: true,
    });

    this.logger.log('GCS blob store initialized');
  }

  async put(content: Buffer, metadata: BlobMetadata): Promise<StoredBlob> {
    const sha256 = sha256Hex(content);
    const key = contentKey(this.prefix, sha256);
    const file = this.bucket.file(key);

    try {
      const [exists] = await file.exists();
      if (!exists) {
        await file.save(content, {
          contentType: metadata.contentType,
          resumable: content.length > 5 * 1024 * 1024,
          metadata: {
            metadata: {
              uploadedBy: metadata.uploadedBy,
              sha256,
            },
          },
        });
      }
    } catch (error) {
      this.logger.error(
        `[GCS] Upload of ${key} by ${metadata.uploadedBy} failed: ${describeError(error)}`,
      );
      throw new TransientStorageError('put', error);
    }

    this.logger.debug(
      `[GCS] Stored ${(content.length / 1024).toFixed(2)} KB at ${key}`,
    );
    return { key, sha256, size: content.length };
  }

  async get(key: string): Promise<Buffer> {
    try {
      const [content] = await this.bucket.file(key).download();
      return content;
    } catch (error) {
      if (errorCode(error) === 404) {
        throw new NotFoundException(`Blob ${key} not found`);
      }
      this.logger.error(`[GCS] Download failed: ${describeError(error)}`);
      throw new TransientStorageError('get', error);
    }
  }

  async delete(key: string): Promise<void> {
    try {
      await this.bucket.file(key).delete();
    } catch (error) {
      if (errorCode(error) === 404) {
        this.logger.debug('[GCS] Blob already deleted or does not exist');
        return;
      }
      this.logger.error(`[GCS] Delete failed: ${describeError(error)}`);
      throw new TransientStorageError('delete', error);
    }
  }
}
