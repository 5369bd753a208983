import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import {
  BadRequestException,
  NotFoundException,
  PayloadTooLargeException,
} from '@nestjs/common';
import { DocumentsService } from './documents.service';
import { UploadedDocumentFile } from './dto/uploaded-document-file';
import { AuditService } from '../audit/audit.service';
import { AuditEventRepository } from '../audit/domain/repositories/audit-event.repository.port';
import { Actor } from '../auth/types/actor.type';
import { BlobStorePort } from '../blob-storage/domain/blob-store.port';
import { ComplianceEvaluatorService } from '../compliance/compliance-evaluator.service';
import { Folder } from '../folder-tree/domain/entities/folder.entity';
import { DocumentRepository } from '../folder-tree/domain/repositories/document.repository.port';
import { FolderRepository } from '../folder-tree/domain/repositories/folder.repository.port';
import { FolderTreeDomainService } from '../folder-tree/domain/services/folder-tree.domain.service';
import { StandardResolverDomainService } from '../folder-tree/domain/services/standard-resolver.domain.service';
import { RoleEnum } from '../roles/roles.enum';
import { StandardRepository } from '../standards/domain/repositories/standard.repository.port';
import { StandardRegistryDomainService } from '../standards/domain/services/standard-registry.domain.service';
import { ComplianceReportRepository } from '../validation/domain/repositories/compliance-report.repository.port';
import { ValidationJobRepository } from '../validation/domain/repositories/validation-job.repository.port';
import { ValidationOrchestratorDomainService } from '../validation/domain/services/validation-orchestrator.domain.service';
import { ValidationTrigger } from '../validation/domain/enums/validation-trigger.enum';
import { ValidationService } from '../validation/validation.service';
import { InMemoryAuditEventRepository } from '../../test/utils/fakes/in-memory-audit-event.repository';
import { InMemoryBlobStore } from '../../test/utils/fakes/in-memory-blob-store';
import { InMemoryComplianceReportRepository } from '../../test/utils/fakes/in-memory-compliance-report.repository';
import { InMemoryDocumentRepository } from '../../test/utils/fakes/in-memory-document.repository';
import { InMemoryFolderRepository } from '../../test/utils/fakes/in-memory-folder.repository';
import { InMemoryStandardRepository } from '../../test/utils/fakes/in-memory-standard.repository';
import { InMemoryValidationJobRepository } from '../../test/utils/fakes/in-memory-validation-job.repository';
import { buildTestConfigService } from '../../test/utils/test-config';
import { buildOdt } from '../../test/utils/odf-fixture.builder';

const curator: Actor = { subject: 'curator-1', role: RoleEnum.curator };
const author: Actor = { subject: 'author-1', role: RoleEnum.author };

function odtFile(
  bytes: Uint8Array = buildOdt(),
  originalname = 'manual.odt',
): UploadedDocumentFile {
  const buffer = Buffer.from(bytes);
  return {
    buffer,
    originalname,
    mimetype: 'application/vnd.oasis.opendocument.text',
    size: buffer.length,
  };
}

describe('DocumentsService', () => {
  let service: DocumentsService;
  let folderTree: FolderTreeDomainService;
  let orchestrator: ValidationOrchestratorDomainService;
  let blobStore: InMemoryBlobStore;
  let jobs: InMemoryValidationJobRepository;
  let registry: StandardRegistryDomainService;

  let root: Folder;
  let manuals: Folder;

  async function drainQueue(): Promise<void> {
    while (await orchestrator.runOnce('worker-1')) {
      // keep claiming until the queue is empty
    }
  }

  beforeEach(async () => {
    blobStore = new InMemoryBlobStore();
    jobs = new InMemoryValidationJobRepository();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        DocumentsService,
        ValidationService,
        ValidationOrchestratorDomainService,
        FolderTreeDomainService,
        StandardResolverDomainService,
        StandardRegistryDomainService,
        ComplianceEvaluatorService,
        AuditService,
        { provide: ValidationJobRepository, useValue: jobs },
        {
          provide: ComplianceReportRepository,
          useValue: new InMemoryComplianceReportRepository(),
        },
        { provide: FolderRepository, useValue: new InMemoryFolderRepository() },
        {
          provide: DocumentRepository,
          useValue: new InMemoryDocumentRepository(),
        },
        {
          provide: StandardRepository,
          useValue: new InMemoryStandardRepository(),
        },
        { provide: BlobStorePort, useValue: blobStore },
        {
          provide: AuditEventRepository,
          useValue: new InMemoryAuditEventRepository(),
        },
        { provide: ConfigService, useValue: buildTestConfigService() },
      ],
    }).compile();

    service = module.get(DocumentsService);
    folderTree = module.get(FolderTreeDomainService);
    orchestrator = module.get(ValidationOrchestratorDomainService);
    registry = module.get(StandardRegistryDomainService);

    root = await folderTree.createFolder('root', null, curator);
    manuals = await folderTree.createFolder('manuals', root.id, curator);
  });

  describe('upload', () => {
    it('should store the content and queue validation', async () => {
      const file = odtFile();

      const response = await service.upload(manuals.id, file, author);

      expect(blobStore.blobs.size).toBe(1);
      expect(response.document).toMatchObject({
        folderId: manuals.id,
        fileName: 'manual.odt',
        fileSize: file.size,
        uploadedBy: 'author-1',
        lifecycle: 'active',
      });
      expect(response.job).toMatchObject({
        documentId: response.document.id,
        state: 'queued',
        trigger: 'upload',
      });
    });

    it('should reject an empty file before storing anything', async () => {
      const file: UploadedDocumentFile = {
        buffer: Buffer.alloc(0),
        originalname: 'empty.odt',
        mimetype: 'application/vnd.oasis.opendocument.text',
        size: 0,
      };

      await expect(
        service.upload(manuals.id, file, author),
      ).rejects.toBeInstanceOf(BadRequestException);
      expect(blobStore.blobs.size).toBe(0);
    });

    it('should reject a file over the document size limit', async () => {
      const file = { ...odtFile(), size: 1024 * 1024 + 1 };

      await expect(
        service.upload(manuals.id, file, author),
      ).rejects.toBeInstanceOf(PayloadTooLargeException);
      expect(blobStore.blobs.size).toBe(0);
    });

    it('should reject an unknown folder', async () => {
      await expect(
        service.upload('missing-folder', odtFile(), author),
      ).rejects.toBeInstanceOf(NotFoundException);
      expect(blobStore.blobs.size).toBe(0);
    });
  });

  describe('replaceContent', () => {
    it('should queue a revision job for the new content', async () => {
      const { document } = await service.upload(manuals.id, odtFile(), author);
      const revised = odtFile(
        buildOdt({ metadata: { title: 'Quality Manual, revised' } }),
        'manual-v2.odt',
      );

      const response = await service.replaceContent(
        document.id,
        revised,
        author,
      );

      const hash = response.document.contentHash;
      expect(hash).not.toBe(document.contentHash);
      expect(response.document.fileName).toBe('manual-v2.odt');
      expect(response.job).toMatchObject({
        trigger: 'revision',
        contentRef: `documents/${hash.slice(0, 2)}/${hash}`,
      });
      expect(jobs.jobs).toHaveLength(2);
    });
  });

  describe('setOverride', () => {
    it('should refuse an unknown Standard', async () => {
      const { document } = await service.upload(manuals.id, odtFile(), author);

      await expect(
        service.setOverride(document.id, 'missing-standard', curator),
      ).rejects.toBeInstanceOf(NotFoundException);
    });

    it('should queue revalidation when the override changes', async () => {
      const golden = await service.upload(
        root.id,
        odtFile(buildOdt(), 'golden.odt'),
        author,
      );
      const { document } = await service.upload(manuals.id, odtFile(), author);
      await drainQueue();
      const standard = await registry.promote(golden.document.id, curator);

      const response = await service.setOverride(
        document.id,
        standard.id,
        curator,
      );

      expect(response.overrideStandardId).toBe(standard.id);
      expect(jobs.jobs).toHaveLength(3);
      expect(jobs.jobs[2]).toMatchObject({
        documentId: document.id,
        trigger: 'override',
        state: 'queued',
      });
    });

    it('should not queue anything when the override is unchanged', async () => {
      const { document } = await service.upload(manuals.id, odtFile(), author);
      await drainQueue();

      await service.setOverride(document.id, null, curator);

      expect(jobs.jobs).toHaveLength(1);
    });
  });

  describe('moveDocument', () => {
    it('should queue revalidation in the new folder', async () => {
      const { document } = await service.upload(manuals.id, odtFile(), author);
      await drainQueue();

      const response = await service.moveDocument(document.id, root.id, author);

      expect(response.folderId).toBe(root.id);
      expect(jobs.jobs[1]).toMatchObject({
        documentId: document.id,
        trigger: 'move',
      });
    });

    it('should queue revalidation of a document with an override', async () => {
      const { document } = await service.upload(manuals.id, odtFile(), author);
      await drainQueue();
      await folderTree.setOverride(document.id, 'standard-1', curator);

      await service.moveDocument(document.id, root.id, author);

      expect(jobs.jobs).toHaveLength(2);
      expect(jobs.jobs[1]).toMatchObject({
        documentId: document.id,
        trigger: 'move',
        state: 'queued',
      });
    });
  });

  describe('getContent', () => {
    it('should return the bytes of the current revision', async () => {
      const bytes = buildOdt({ metadata: { title: 'Site Manual' } });
      const { document } = await service.upload(
        manuals.id,
        odtFile(bytes, 'site-manual.odt'),
        author,
      );

      const download = await service.getContent(document.id);

      expect(download.fileName).toBe('site-manual.odt');
      expect(download.mimeType).toBe('application/vnd.oasis.opendocument.text');
      expect(download.content.equals(Buffer.from(bytes))).toBe(true);
    });

    it('should throw NotFound when the content is gone', async () => {
      const { document } = await service.upload(manuals.id, odtFile(), author);
      await blobStore.delete(document.contentRef);

      await expect(service.getContent(document.id)).rejects.toBeInstanceOf(
        NotFoundException,
      );
    });
  });

  describe('renameDocument', () => {
    it('should rename without queueing validation', async () => {
      const { document } = await service.upload(manuals.id, odtFile(), author);
      await drainQueue();

      const renamed = await service.renameDocument(
        document.id,
        'handbook.odt',
        author,
      );

      expect(renamed).toMatchObject({
        id: document.id,
        fileName: 'handbook.odt',
        contentHash: document.contentHash,
      });
      expect(jobs.jobs).toHaveLength(1);
    });
  });

  describe('archiveDocument', () => {
    it('should stop further validation of the document', async () => {
      const { document } = await service.upload(manuals.id, odtFile(), author);
      await drainQueue();

      const archived = await service.archiveDocument(document.id, author);

      expect(archived.lifecycle).toBe('archived');
      expect(
        await orchestrator.enqueue(document.id, ValidationTrigger.MANUAL),
      ).toBeNull();
    });
  });
});
