import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AuditModule } from '../audit/audit.module';
import { BlobStorageModule } from '../blob-storage/blob-storage.module';
import { ComplianceModule } from '../compliance/compliance.module';
import { FolderTreeModule } from '../folder-tree/folder-tree.module';
import { StandardsModule } from '../standards/standards.module';
import { ValidationJobEntity } from './infrastructure/persistence/relational/entities/validation-job.entity';
import { ComplianceReportEntity } from './infrastructure/persistence/relational/entities/compliance-report.entity';
import { ValidationJobRepository } from './domain/repositories/validation-job.repository.port';
import { ValidationJobRelationalRepository } from './infrastructure/persistence/relational/repositories/validation-job.repository';
import { ComplianceReportRepository } from './domain/repositories/compliance-report.repository.port';
import { ComplianceReportRelationalRepository } from './infrastructure/persistence/relational/repositories/compliance-report.repository';
import { ValidationOrchestratorDomainService } from './domain/services/validation-orchestrator.domain.service';
import { ValidationWorkerService } from './workers/validation-worker.service';
import { ValidationService } from './validation.service';
import { ValidationJobsController } from './validation-jobs.controller';
import { DocumentValidationController } from './document-validation.controller';

@Module({
  imports: [
    TypeOrmModule.forFeature([ValidationJobEntity, ComplianceReportEntity]),
    AuditModule,
    BlobStorageModule,
    ComplianceModule,
    FolderTreeModule,
    StandardsModule,
  ],
  providers: [
    {
      provide: ValidationJobRepository,
      useClass: ValidationJobRelationalRepository,
    },
    {
      provide: ComplianceReportRepository,
      useClass: ComplianceReportRelationalRepository,
    },
    ValidationOrchestratorDomainService,
    ValidationWorkerService,
    ValidationService,
  ],
  controllers: [ValidationJobsController, DocumentValidationController],
  exports: [
    ValidationOrchestratorDomainService,
    ValidationService,
    ValidationWorkerService,
  ],
})
export class ValidationModule {}
