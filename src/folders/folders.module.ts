import { Module } from '@nestjs/common';
import { DocumentsModule } from '../documents/documents.module';
import { FolderTreeModule } from '../folder-tree/folder-tree.module';
import { StandardsModule } from '../standards/standards.module';
import { ValidationModule } from '../validation/validation.module';
import { FoldersService } from './folders.service';
import { FoldersController } from './folders.controller';

@Module({
  imports: [DocumentsModule, FolderTreeModule, StandardsModule, ValidationModule],
  providers: [FoldersService],
  controllers: [FoldersController],
})
export class FoldersModule {}
