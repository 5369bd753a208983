import { NotFoundException } from '@nestjs/common';
import {
  BlobMetadata,
  BlobStorePort,
  StoredBlob,
} from '../../../src/blob-storage/domain/blob-store.port';
import {
  contentKey,
  sha256Hex,
} from '../../../src/blob-storage/domain/content-key';

export class InMemoryBlobStore extends BlobStorePort {
  readonly blobs = new Map<string, Buffer>();
  readonly gets: string[] = [];
  private readonly failures: unknown[] = [];
  private beforeGet: ((key: string) => Promise<void>) | undefined;

  /**
   * Queue errors thrown by the next `get` calls, one per call.
   */
  failNextGets(...errors: unknown[]): void {
    this.failures.push(...errors);
  }

  // Runs before every read; lets a test hold a worker mid-job.
  interceptGets(hook: ((key: string) => Promise<void>) | undefined): void {
    this.beforeGet = hook;
  }

  async put(content: Buffer, _metadata: BlobMetadata): Promise<StoredBlob> {
    const sha256 = sha256Hex(content);
    const key = contentKey('documents/', sha256);
    this.blobs.set(key, Buffer.from(content));
    return { key, sha256, size: content.length };
  }

  async get(key: string): Promise<Buffer> {
    this.gets.push(key);
    if (this.beforeGet) {
      await this.beforeGet(key);
    }
    const failure = this.failures.shift();
    if (failure !== undefined) {
      throw failure;
    }
    const blob = this.blobs.get(key);
    if (!blob) {
      throw new NotFoundException(`Blob ${key} not found`);
    }
    return Buffer.from(blob);
  }

  async delete(key: string): Promise<void> {
    this.blobs.delete(key);
  }
}
