import { registerAs } from '@nestjs/config';
import { IsIn, IsOptional, IsString, ValidateIf } from 'class-validator';
import validateConfig from '../../utils/validate-config';
import {
  BlobStorageConfig,
  BlobStorageDriver,
} from './blob-storage-config.type';

class EnvironmentVariablesValidator {
  @IsIn(['gcs', 'local'])
  @IsOptional()
  BLOB_STORAGE_DRIVER?: BlobStorageDriver;

  @ValidateIf((envValues) => envValues.BLOB_STORAGE_DRIVER === 'gcs')
  @IsString()
  BLOB_STORAGE_GCS_BUCKET: string;

  @IsString()
  @IsOptional()
  BLOB_STORAGE_GCS_PREFIX?: string;

  @IsString()
  @IsOptional()
  BLOB_STORAGE_LOCAL_DIRECTORY?: string;
}

export default registerAs<BlobStorageConfig>('blobStorage', () => {
  const validated = validateConfig(process.env, EnvironmentVariablesValidator);

  return {
    driver: validated.BLOB_STORAGE_DRIVER ?? 'local',
    gcs: {
      bucket: validated.BLOB_STORAGE_GCS_BUCKET ?? '',
      prefix: validated.BLOB_STORAGE_GCS_PREFIX ?? 'documents/',
    },
    local: {
      directory: validated.BLOB_STORAGE_LOCAL_DIRECTORY ?? './files',
    },
  };
});
