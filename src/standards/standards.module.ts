import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AuditModule } from '../audit/audit.module';
import { BlobStorageModule } from '../blob-storage/blob-storage.module';
import { ComplianceModule } from '../compliance/compliance.module';
import { FolderTreeModule } from '../folder-tree/folder-tree.module';
import { StandardEntity } from './infrastructure/persistence/relational/entities/standard.entity';
import { StandardRepository } from './domain/repositories/standard.repository.port';
import { StandardRelationalRepository } from './infrastructure/persistence/relational/repositories/standard.repository';
import { StandardRegistryDomainService } from './domain/services/standard-registry.domain.service';
import { StandardsService } from './standards.service';
import { StandardsController } from './standards.controller';

@Module({
  imports: [
    TypeOrmModule.forFeature([StandardEntity]),
    AuditModule,
    BlobStorageModule,
    ComplianceModule,
    FolderTreeModule,
  ],
  providers: [
    {
      provide: StandardRepository,
      useClass: StandardRelationalRepository,
    },
    StandardRegistryDomainService,
    StandardsService,
  ],
  controllers: [StandardsController],
  exports: [StandardRepository, StandardRegistryDomainService],
})
export class StandardsModule {}
