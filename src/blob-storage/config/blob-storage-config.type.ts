export type BlobStorageDriver = 'gcs' | 'local';

export type BlobStorageConfig = {
  driver: BlobStorageDriver;
  gcs: {
    bucket: string;
    prefix: string;
  };
  local: {
    directory: string;
  };
};
