import { AppConfig } from './app-config.type';
import { AuthConfig } from '../auth/config/auth-config.type';
import { DatabaseConfig } from '../database/config/database-config.type';
import { BlobStorageConfig } from '../blob-storage/config/blob-storage-config.type';
import { ValidationConfig } from '../validation/config/validation-config.type';
import { ThrottlerConfig } from './throttler-config.type';

export type AllConfigType = {
  app: AppConfig;
  auth: AuthConfig;
  database: DatabaseConfig;
  blobStorage: BlobStorageConfig;
  validation: ValidationConfig;
  throttler: ThrottlerConfig;
};
