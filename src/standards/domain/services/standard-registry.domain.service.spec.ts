import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { NotFoundException } from '@nestjs/common';
import { strToU8 } from 'fflate';
import { StandardRegistryDomainService } from './standard-registry.domain.service';
import { StandardRepository } from '../repositories/standard.repository.port';
import { AuditService } from '../../../audit/audit.service';
import { AuditEventRepository } from '../../../audit/domain/repositories/audit-event.repository.port';
import { BlobStorePort } from '../../../blob-storage/domain/blob-store.port';
import { ComplianceEvaluatorService } from '../../../compliance/compliance-evaluator.service';
import { ComplianceVerdict } from '../../../compliance/domain/enums/compliance-verdict.enum';
import { DocumentRepository } from '../../../folder-tree/domain/repositories/document.repository.port';
import { Document } from '../../../folder-tree/domain/entities/document.entity';
import { Actor } from '../../../auth/types/actor.type';
import { RoleEnum } from '../../../roles/roles.enum';
import {
  InvalidSourceDocumentError,
  LineageConflictError,
} from '../../../utils/errors/domain-errors';
import { InMemoryAuditEventRepository } from '../../../../test/utils/fakes/in-memory-audit-event.repository';
import { InMemoryBlobStore } from '../../../../test/utils/fakes/in-memory-blob-store';
import { InMemoryDocumentRepository } from '../../../../test/utils/fakes/in-memory-document.repository';
import { InMemoryStandardRepository } from '../../../../test/utils/fakes/in-memory-standard.repository';
import { buildTestConfigService } from '../../../../test/utils/test-config';
import { buildOdt, GOLDEN_BODY } from '../../../../test/utils/odf-fixture.builder';

const curator: Actor = { subject: 'curator-1', role: RoleEnum.curator };

describe('StandardRegistryDomainService', () => {
  let service: StandardRegistryDomainService;
  let compliance: ComplianceEvaluatorService;
  let blobStore: InMemoryBlobStore;
  let documents: InMemoryDocumentRepository;
  let standards: InMemoryStandardRepository;
  let audit: InMemoryAuditEventRepository;

  async function storeDocument(
    bytes: Uint8Array,
    fileName = 'quality-manual.odt',
  ): Promise<Document> {
    const blob = await blobStore.put(Buffer.from(bytes), {
      contentType: 'application/vnd.oasis.opendocument.text',
      uploadedBy: 'author-1',
    });
    return documents.create({
      folderId: 'folder-1',
      fileName,
      mimeType: 'application/vnd.oasis.opendocument.text',
      fileSize: blob.size,
      contentRef: blob.key,
      contentHash: blob.sha256,
      uploadedBy: 'author-1',
    });
  }

  beforeEach(async () => {
    blobStore = new InMemoryBlobStore();
    documents = new InMemoryDocumentRepository();
    standards = new InMemoryStandardRepository();
    audit = new InMemoryAuditEventRepository();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        StandardRegistryDomainService,
        ComplianceEvaluatorService,
        AuditService,
        { provide: StandardRepository, useValue: standards },
        { provide: DocumentRepository, useValue: documents },
        { provide: BlobStorePort, useValue: blobStore },
        { provide: AuditEventRepository, useValue: audit },
        { provide: ConfigService, useValue: buildTestConfigService() },
      ],
    }).compile();

    service = module.get(StandardRegistryDomainService);
    compliance = module.get(ComplianceEvaluatorService);
  });

  describe('promote', () => {
    it('should start a new lineage at version 1', async () => {
      const golden = await storeDocument(buildOdt());

      const standard = await service.promote(golden.id, curator);

      expect(standard).toMatchObject({
        name: 'quality-manual',
        version: 1,
        lineageId: standard.id,
        predecessorId: null,
        sourceDocumentId: golden.id,
        sourceContentRef: golden.contentRef,
        promotedBy: 'curator-1',
      });
      expect(standard.rules).toHaveLength(17);
      expect(audit.events).toHaveLength(1);
      expect(audit.events[0]).toMatchObject({
        kind: 'promote',
        entityType: 'standard',
        entityId: standard.id,
        payload: { documentId: golden.id, version: 1, ruleCount: 17 },
      });
    });

    it('should find its own golden document compliant', async () => {
      const golden = await storeDocument(buildOdt());
      const standard = await service.promote(golden.id, curator);

      const evaluation = compliance.evaluate(buildOdt(), standard);

      expect(evaluation.verdict).toBe(ComplianceVerdict.COMPLIANT);
    });

    it('should promote a golden document whose style names match object members', async () => {
      const bytes = buildOdt({
        body: [
          { heading: 'Introduction', level: 1, style: 'constructor' },
          { paragraph: 'Purpose of this manual.', style: '__proto__' },
        ],
      });
      const golden = await storeDocument(bytes);

      const standard = await service.promote(golden.id, curator);

      expect(standard.rules).toHaveLength(8);
      expect(
        standard.rules.find((rule) => rule.id === 'allowed-styles')?.params,
      ).toEqual({ styles: ['__proto__', 'constructor'] });
      expect(compliance.evaluate(bytes, standard).verdict).toBe(
        ComplianceVerdict.COMPLIANT,
      );
    });

    it('should continue a lineage from its head', async () => {
      const golden = await storeDocument(buildOdt());
      const v1 = await service.promote(golden.id, curator, { name: 'Manual' });

      const revised = await storeDocument(
        buildOdt({ body: GOLDEN_BODY.slice(0, 6) }),
        'manual-rev.odt',
      );
      const v2 = await service.promote(revised.id, curator, {
        predecessorStandardId: v1.id,
      });

      expect(v2).toMatchObject({
        name: 'Manual',
        version: 2,
        lineageId: v1.id,
        predecessorId: v1.id,
      });
      expect((await service.getLineage(v1.id)).map((s) => s.version)).toEqual([
        1, 2,
      ]);
    });

    it('should reject a predecessor that is no longer the head', async () => {
      const golden = await storeDocument(buildOdt());
      const v1 = await service.promote(golden.id, curator);
      await service.promote(golden.id, curator, { predecessorStandardId: v1.id });

      await expect(
        service.promote(golden.id, curator, { predecessorStandardId: v1.id }),
      ).rejects.toThrow(LineageConflictError);
    });

    it('should let exactly one of two concurrent re-promotions win', async () => {
      const golden = await storeDocument(buildOdt());
      const v1 = await service.promote(golden.id, curator);

      const results = await Promise.allSettled([
        service.promote(golden.id, curator, { predecessorStandardId: v1.id }),
        service.promote(golden.id, curator, { predecessorStandardId: v1.id }),
      ]);

      expect(results.map((result) => result.status).sort()).toEqual([
        'fulfilled',
        'rejected',
      ]);
      expect(await standards.findLineage(v1.id)).toHaveLength(2);
    });

    it('should reject a source that cannot be parsed', async () => {
      const broken = await storeDocument(strToU8('not a document'));

      await expect(service.promote(broken.id, curator)).rejects.toThrow(
        InvalidSourceDocumentError,
      );
      expect(standards.standards.size).toBe(0);
      expect(audit.events).toHaveLength(0);
    });

    it('should reject a source with macros', async () => {
      const withMacros = await storeDocument(buildOdt({ macros: true }));

      await expect(service.promote(withMacros.id, curator)).rejects.toThrow(
        'golden documents must not embed macros',
      );
    });

    it('should throw NotFound for an unknown document', async () => {
      await expect(service.promote('missing', curator)).rejects.toThrow(
        NotFoundException,
      );
    });
  });
});
