export interface BlobMetadata {
  contentType: string;
  // Subject that supplied the bytes
  uploadedBy: string;
}

export interface StoredBlob {
  key: string;
  sha256: string;
  size: number;
}

/**
 * Content-addressed byte storage. Keys are derived from the sha256 of the
 * content, so storing the same bytes twice yields the same key.
 */
export abstract class BlobStorePort {
  abstract put(content: Buffer, metadata: BlobMetadata): Promise<StoredBlob>;

  /**
   * @throws NotFoundException when no blob exists under the key
   * @throws TransientStorageError on any other storage failure
   */
  abstract get(key: string): Promise<Buffer>;

  /**
   * Idempotent: deleting a missing key succeeds.
   */
  abstract delete(key: string): Promise<void>;
}
