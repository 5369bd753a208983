import { NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { promises as fs } from 'fs';
import { tmpdir } from 'os';
import * as path from 'path';
import { AllConfigType } from '../../config/config.type';
import { LocalBlobStoreAdapter } from './local-blob-store.adapter';
import { buildTestConfigValues } from '../../../test/utils/test-config';

const HELLO_SHA256 =
  'b94d27b9934d3e08a52e52d7da7dabfac484efe37a5380ee9088f7ace2efcde9';

describe('LocalBlobStoreAdapter', () => {
  let workingDirectory: string;
  let store: LocalBlobStoreAdapter;

  beforeEach(async () => {
    workingDirectory = await fs.mkdtemp(path.join(tmpdir(), 'blob-store-'));
    const values = buildTestConfigValues();
    values.app.workingDirectory = workingDirectory;
    values.blobStorage.local.directory = 'blobs';
    store = new LocalBlobStoreAdapter(
      new ConfigService<AllConfigType>(values),
    );
  });

  afterEach(async () => {
    await fs.rm(workingDirectory, { recursive: true, force: true });
  });

  it('should store content under its hash', async () => {
    const blob = await store.put(Buffer.from('hello world'), {
      contentType: 'text/plain',
      uploadedBy: 'author-1',
    });

    expect(blob).toEqual({
      key: `b9/${HELLO_SHA256}`,
      sha256: HELLO_SHA256,
      size: 11,
    });
    const onDisk = await fs.readFile(
      path.join(workingDirectory, 'blobs', 'b9', HELLO_SHA256),
      'utf8',
    );
    expect(onDisk).toBe('hello world');
  });

  it('should return the same key for the same bytes', async () => {
    const metadata = { contentType: 'text/plain', uploadedBy: 'author-1' };
    const first = await store.put(Buffer.from('hello world'), metadata);
    const second = await store.put(Buffer.from('hello world'), {
      ...metadata,
      uploadedBy: 'author-2',
    });

    expect(second.key).toBe(first.key);
  });

  it('should read stored content back', async () => {
    const blob = await store.put(Buffer.from('hello world'), {
      contentType: 'text/plain',
      uploadedBy: 'author-1',
    });

    expect((await store.get(blob.key)).toString('utf8')).toBe('hello world');
  });

  it('should throw NotFoundException for a missing key', async () => {
    await expect(store.get(`b9/${HELLO_SHA256}`)).rejects.toBeInstanceOf(
      NotFoundException,
    );
  });

  it('should refuse keys that escape the storage directory', async () => {
    await expect(store.get('../outside')).rejects.toBeInstanceOf(
      NotFoundException,
    );
  });

  it('should treat deleting a missing key as success', async () => {
    const blob = await store.put(Buffer.from('hello world'), {
      contentType: 'text/plain',
      uploadedBy: 'author-1',
    });

    await store.delete(blob.key);
    await store.delete(blob.key);

    await expect(store.get(blob.key)).rejects.toBeInstanceOf(
      NotFoundException,
    );
  });
});
