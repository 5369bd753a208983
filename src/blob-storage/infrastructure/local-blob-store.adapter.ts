import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { promises as fs } from 'fs';
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

function isMissingFile(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}

// Development driver: blobs live under a directory on the local disk.
@Injectable()
export class LocalBlobStoreAdapter extends BlobStorePort {
  private readonly logger = new Logger(LocalBlobStoreAdapter.name);
  private readonly root: string;

  constructor(configService: ConfigService<AllConfigType>) {
    super();
    this.root = path.resolve(
      configService.getOrThrow('app.workingDirectory', { infer: true }),
      configService.getOrThrow('blobStorage.local.directory', { infer: true }),
    );
  }

  async put(content: Buffer, metadata: BlobMetadata): Promise<StoredBlob> {
    const sha256 = sha256Hex(content);
    const key = contentKey('', sha256);
    const target = this.resolve(key);

    try {
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.writeFile(target, content, { flag: 'w' });
    } catch (error) {
      this.logger.error(
        `[LOCAL] Write of ${key} by ${metadata.uploadedBy} failed: ${describeError(error)}`,
      );
      throw new TransientStorageError('put', error);
    }
    return { key, sha256, size: content.length };
  }

  async get(key: string): Promise<Buffer> {
    try {
      return await fs.readFile(this.resolve(key));
    } catch (error) {
      if (isMissingFile(error)) {
        throw new NotFoundException(`Blob ${key} not found`);
      }
      throw new TransientStorageError('get', error);
    }
  }

  async delete(key: string): Promise<void> {
    try {
      await fs.unlink(this.resolve(key));
    } catch (error) {
      if (isMissingFile(error)) {
        return;
      }
      throw new TransientStorageError('delete', error);
    }
  }

  private resolve(key: string): string {
    const target = path.resolve(this.root, key);
    if (!target.startsWith(this.root + path.sep)) {
      throw new NotFoundException(`Blob ${key} not found`);
    }
    return target;
  }
}
