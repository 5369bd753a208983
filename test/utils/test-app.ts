import {
  INestApplication,
  ValidationPipe,
  VersioningType,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtService } from '@nestjs/jwt';
import { PassportModule } from '@nestjs/passport';
import { Test } from '@nestjs/testing';
import { AuditController } from '../../src/audit/audit.controller';
import { AuditService } from '../../src/audit/audit.service';
import { AuditEventRepository } from '../../src/audit/domain/repositories/audit-event.repository.port';
import { JwtStrategy } from '../../src/auth/strategies/jwt.strategy';
import { BlobStorePort } from '../../src/blob-storage/domain/blob-store.port';
import { ComplianceEvaluatorService } from '../../src/compliance/compliance-evaluator.service';
import { DocumentsController } from '../../src/documents/documents.controller';
import { DocumentsService } from '../../src/documents/documents.service';
import { DocumentRepository } from '../../src/folder-tree/domain/repositories/document.repository.port';
import { FolderRepository } from '../../src/folder-tree/domain/repositories/folder.repository.port';
import { FolderTreeDomainService } from '../../src/folder-tree/domain/services/folder-tree.domain.service';
import { StandardResolverDomainService } from '../../src/folder-tree/domain/services/standard-resolver.domain.service';
import { FoldersController } from '../../src/folders/folders.controller';
import { FoldersService } from '../../src/folders/folders.service';
import { RoleEnum } from '../../src/roles/roles.enum';
import { StandardRepository } from '../../src/standards/domain/repositories/standard.repository.port';
import { StandardRegistryDomainService } from '../../src/standards/domain/services/standard-registry.domain.service';
import { StandardsController } from '../../src/standards/standards.controller';
import { StandardsService } from '../../src/standards/standards.service';
import { ComplianceReportRepository } from '../../src/validation/domain/repositories/compliance-report.repository.port';
import { ValidationJobRepository } from '../../src/validation/domain/repositories/validation-job.repository.port';
import { ValidationOrchestratorDomainService } from '../../src/validation/domain/services/validation-orchestrator.domain.service';
import { DocumentValidationController } from '../../src/validation/document-validation.controller';
import { ValidationJobsController } from '../../src/validation/validation-jobs.controller';
import { ValidationService } from '../../src/validation/validation.service';
import validationOptions from '../../src/utils/validation-options';
import { InMemoryAuditEventRepository } from './fakes/in-memory-audit-event.repository';
import { InMemoryBlobStore } from './fakes/in-memory-blob-store';
import { InMemoryComplianceReportRepository } from './fakes/in-memory-compliance-report.repository';
import { InMemoryDocumentRepository } from './fakes/in-memory-document.repository';
import { InMemoryFolderRepository } from './fakes/in-memory-folder.repository';
import { InMemoryStandardRepository } from './fakes/in-memory-standard.repository';
import { InMemoryValidationJobRepository } from './fakes/in-memory-validation-job.repository';
import { buildTestConfigService, TEST_JWT_SECRET } from './test-config';

export type TestApp = {
  app: INestApplication;
  orchestrator: ValidationOrchestratorDomainService;
  tokenFor: (role: RoleEnum, subject?: string) => string;
};

/**
 * The HTTP surface wired to in-memory repositories and blob store. No
 * database, scheduler or worker loop: tests drive jobs through the
 * orchestrator.
 */
export async function createTestApp(): Promise<TestApp> {
  const module = await Test.createTestingModule({
    imports: [PassportModule.register({ defaultStrategy: 'jwt' })],
    controllers: [
      FoldersController,
      DocumentsController,
      DocumentValidationController,
      ValidationJobsController,
      StandardsController,
      AuditController,
    ],
    providers: [
      JwtStrategy,
      AuditService,
      ComplianceEvaluatorService,
      FolderTreeDomainService,
      StandardResolverDomainService,
      StandardRegistryDomainService,
      ValidationOrchestratorDomainService,
      FoldersService,
      DocumentsService,
      StandardsService,
      ValidationService,
      { provide: ConfigService, useValue: buildTestConfigService() },
      { provide: AuditEventRepository, useValue: new InMemoryAuditEventRepository() },
      { provide: FolderRepository, useValue: new InMemoryFolderRepository() },
      { provide: DocumentRepository, useValue: new InMemoryDocumentRepository() },
      { provide: StandardRepository, useValue: new InMemoryStandardRepository() },
      {
        provide: ValidationJobRepository,
        useValue: new InMemoryValidationJobRepository(),
      },
      {
        provide: ComplianceReportRepository,
        useValue: new InMemoryComplianceReportRepository(),
      },
      { provide: BlobStorePort, useValue: new InMemoryBlobStore() },
    ],
  }).compile();

  const app = module.createNestApplication();
  app.setGlobalPrefix('api');
  app.enableVersioning({ type: VersioningType.URI });
  app.useGlobalPipes(new ValidationPipe(validationOptions));
  await app.init();

  const jwt = new JwtService({ secret: TEST_JWT_SECRET });
  return {
    app,
    orchestrator: module.get(ValidationOrchestratorDomainService),
    tokenFor: (role, subject = `${role}-1`) =>
      jwt.sign({ sub: subject, role }, { expiresIn: '5m' }),
  };
}
