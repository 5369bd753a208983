import { Module } from '@nestjs/common';
import { BlobStorageModule } from '../blob-storage/blob-storage.module';
import { ComplianceModule } from '../compliance/compliance.module';
import { FolderTreeModule } from '../folder-tree/folder-tree.module';
import { StandardsModule } from '../standards/standards.module';
import { ValidationModule } from '../validation/validation.module';
import { DocumentsService } from './documents.service';
import { DocumentsController } from './documents.controller';

@Module({
  imports: [
    BlobStorageModule,
    ComplianceModule,
    FolderTreeModule,
    StandardsModule,
    ValidationModule,
  ],
  providers: [DocumentsService],
  controllers: [DocumentsController],
  exports: [DocumentsService],
})
export class DocumentsModule {}
