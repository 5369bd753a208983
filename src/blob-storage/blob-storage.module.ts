import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { BlobStorePort } from './domain/blob-store.port';
import { GcsBlobStoreAdapter } from './infrastructure/gcs-blob-store.adapter';
import { LocalBlobStoreAdapter } from './infrastructure/local-blob-store.adapter';
import { AllConfigType } from '../config/config.type';

@Module({
  providers: [
    {
      provide: BlobStorePort,
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AllConfigType>) =>
        configService.getOrThrow('blobStorage.driver', { infer: true }) ===
        'gcs'
          ? new GcsBlobStoreAdapter(configService)
          : new LocalBlobStoreAdapter(configService),
    },
  ],
  exports: [BlobStorePort],
})
export class BlobStorageModule {}
