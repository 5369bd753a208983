import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AuditModule } from '../audit/audit.module';
import { FolderEntity } from './infrastructure/persistence/relational/entities/folder.entity';
import { DocumentEntity } from './infrastructure/persistence/relational/entities/document.entity';
import { FolderRepository } from './domain/repositories/folder.repository.port';
import { DocumentRepository } from './domain/repositories/document.repository.port';
import { FolderRelationalRepository } from './infrastructure/persistence/relational/repositories/folder.repository';
import { DocumentRelationalRepository } from './infrastructure/persistence/relational/repositories/document.repository';
import { FolderTreeDomainService } from './domain/services/folder-tree.domain.service';
import { StandardResolverDomainService } from './domain/services/standard-resolver.domain.service';

@Module({
  imports: [TypeOrmModule.forFeature([FolderEntity, DocumentEntity]), AuditModule],
  providers: [
    {
      provide: FolderRepository,
      useClass: FolderRelationalRepository,
    },
    {
      provide: DocumentRepository,
      useClass: DocumentRelationalRepository,
    },
    FolderTreeDomainService,
    StandardResolverDomainService,
  ],
  exports: [
    FolderRepository,
    DocumentRepository,
    FolderTreeDomainService,
    StandardResolverDomainService,
  ],
})
export class FolderTreeModule {}
