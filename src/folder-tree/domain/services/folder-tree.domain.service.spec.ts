import { Test, TestingModule } from '@nestjs/testing';
import { BadRequestException, NotFoundException } from '@nestjs/common';
import { FolderTreeDomainService } from './folder-tree.domain.service';
import { StandardResolverDomainService } from './standard-resolver.domain.service';
import { FolderRepository } from '../repositories/folder.repository.port';
import { DocumentRepository } from '../repositories/document.repository.port';
import { DocumentContent } from '../entities/document.entity';
import { Folder } from '../entities/folder.entity';
import { AuditService } from '../../../audit/audit.service';
import { AuditEventRepository } from '../../../audit/domain/repositories/audit-event.repository.port';
import { Actor } from '../../../auth/types/actor.type';
import { RoleEnum } from '../../../roles/roles.enum';
import { CycleRejectedError } from '../../../utils/errors/domain-errors';
import { ConfigService } from '@nestjs/config';
import { InMemoryFolderRepository } from '../../../../test/utils/fakes/in-memory-folder.repository';
import { InMemoryDocumentRepository } from '../../../../test/utils/fakes/in-memory-document.repository';
import { InMemoryAuditEventRepository } from '../../../../test/utils/fakes/in-memory-audit-event.repository';
import { buildTestConfigService } from '../../../../test/utils/test-config';

const curator: Actor = { subject: 'curator-1', role: RoleEnum.curator };

function content(name: string): DocumentContent {
  return {
    fileName: `${name}.odt`,
    mimeType: 'application/vnd.oasis.opendocument.text',
    fileSize: 100,
    contentRef: `documents/aa/${name}`,
    contentHash: name.padEnd(64, '0'),
  };
}

describe('FolderTreeDomainService', () => {
  let service: FolderTreeDomainService;
  let resolver: StandardResolverDomainService;
  let folders: InMemoryFolderRepository;
  let documents: InMemoryDocumentRepository;
  let audit: InMemoryAuditEventRepository;

  let root: Folder;
  let a: Folder;
  let b: Folder;

  beforeEach(async () => {
    folders = new InMemoryFolderRepository();
    documents = new InMemoryDocumentRepository();
    audit = new InMemoryAuditEventRepository();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        FolderTreeDomainService,
        StandardResolverDomainService,
        AuditService,
        { provide: FolderRepository, useValue: folders },
        { provide: DocumentRepository, useValue: documents },
        { provide: AuditEventRepository, useValue: audit },
        { provide: ConfigService, useValue: buildTestConfigService() },
      ],
    }).compile();

    service = module.get(FolderTreeDomainService);
    resolver = module.get(StandardResolverDomainService);

    root = await service.createFolder('root', null, curator);
    a = await service.createFolder('a', root.id, curator);
    b = await service.createFolder('b', a.id, curator);
  });

  describe('createFolder', () => {
    it('should reject a second root', async () => {
      await expect(service.createFolder('other', null, curator)).rejects.toThrow(
        BadRequestException,
      );
    });

    it('should reject an unknown parent', async () => {
      await expect(
        service.createFolder('orphan', 'missing', curator),
      ).rejects.toThrow(NotFoundException);
    });

    it('should audit each creation', () => {
      expect(audit.kinds()).toEqual([
        'folder-create',
        'folder-create',
        'folder-create',
      ]);
    });
  });

  describe('resolution', () => {
    it('should follow an assignment, an override and its removal', async () => {
      await service.assignStandard(b.id, 'S1', curator);
      const d = await service.addDocument(b.id, content('d'), curator);

      expect(await resolver.resolveStandard(d.id)).toEqual({
        status: 'resolved',
        standardId: 'S1',
        source: 'folder',
        folderId: b.id,
      });

      await service.setOverride(d.id, 'S2', curator);
      expect(await resolver.resolveStandard(d.id)).toEqual({
        status: 'resolved',
        standardId: 'S2',
        source: 'override',
      });

      await service.setOverride(d.id, null, curator);
      expect(await resolver.resolveStandard(d.id)).toMatchObject({
        standardId: 'S1',
        source: 'folder',
      });
    });

    it('should use the nearest assigned ancestor', async () => {
      await service.assignStandard(root.id, 'S0', curator);
      await service.assignStandard(a.id, 'S1', curator);
      const d = await service.addDocument(b.id, content('d'), curator);

      expect(await resolver.resolveStandard(d.id)).toMatchObject({
        standardId: 'S1',
        folderId: a.id,
      });
    });

    it('should report not-found when no ancestor is assigned', async () => {
      const d = await service.addDocument(b.id, content('d'), curator);

      expect(await resolver.resolveStandard(d.id)).toEqual({
        status: 'not-found',
      });
    });

    it('should throw for an unknown document', async () => {
      await expect(resolver.resolveStandard('missing')).rejects.toThrow(
        NotFoundException,
      );
    });
  });

  describe('assignStandard', () => {
    it('should report inheriting documents and skip shadowed ones', async () => {
      const c = await service.createFolder('c', a.id, curator);
      await service.assignStandard(c.id, 'S9', curator);

      const inA = await service.addDocument(a.id, content('in-a'), curator);
      const inB = await service.addDocument(b.id, content('in-b'), curator);
      await service.addDocument(c.id, content('in-c'), curator);
      const overridden = await service.addDocument(
        b.id,
        content('overridden'),
        curator,
      );
      await service.setOverride(overridden.id, 'S7', curator);
      const archived = await service.addDocument(
        b.id,
        content('archived'),
        curator,
      );
      await service.archiveDocument(archived.id, curator);

      const mutation = await service.assignStandard(a.id, 'S1', curator);

      expect(mutation.result.assignedStandardId).toBe('S1');
      expect([...mutation.affectedDocumentIds].sort()).toEqual(
        [inA.id, inB.id].sort(),
      );
    });

    it('should audit assign, reassign and unassign', async () => {
      await service.assignStandard(a.id, 'S1', curator);
      await service.assignStandard(a.id, 'S2', curator);
      await service.assignStandard(a.id, null, curator);

      expect(audit.kinds().slice(3)).toEqual(['assign', 'reassign', 'unassign']);
      expect(audit.events[4].payload).toEqual({
        standardId: 'S2',
        previousStandardId: 'S1',
      });
    });

    it('should do nothing when the assignment is unchanged', async () => {
      await service.assignStandard(a.id, 'S1', curator);
      await service.addDocument(a.id, content('x'), curator);

      const mutation = await service.assignStandard(a.id, 'S1', curator);

      expect(mutation.affectedDocumentIds).toEqual([]);
      expect(audit.kinds().filter((kind) => kind === 'assign')).toHaveLength(1);
    });
  });

  describe('reparentFolder', () => {
    it('should reject moving a folder under its own descendant', async () => {
      await expect(service.reparentFolder(a.id, b.id, curator)).rejects.toThrow(
        CycleRejectedError,
      );
      await expect(service.reparentFolder(a.id, a.id, curator)).rejects.toThrow(
        CycleRejectedError,
      );

      expect((await folders.findById(a.id))?.parentId).toBe(root.id);
      expect(audit.kinds()).not.toContain('reparent');
    });

    it('should reject re-parenting the root', async () => {
      await expect(
        service.reparentFolder(root.id, a.id, curator),
      ).rejects.toThrow(BadRequestException);
    });

    it('should move the folder and report its inheriting documents', async () => {
      const f = await service.createFolder('f', root.id, curator);
      await service.assignStandard(f.id, 'SF', curator);
      const d = await service.addDocument(b.id, content('d'), curator);

      const mutation = await service.reparentFolder(b.id, f.id, curator);

      expect(mutation.result.parentId).toBe(f.id);
      expect(mutation.affectedDocumentIds).toEqual([d.id]);
      expect(await resolver.resolveStandard(d.id)).toMatchObject({
        standardId: 'SF',
      });
    });

    it('should not affect documents of a moved folder with its own assignment', async () => {
      const f = await service.createFolder('f', root.id, curator);
      await service.assignStandard(b.id, 'SB', curator);
      await service.addDocument(b.id, content('d'), curator);

      const mutation = await service.reparentFolder(b.id, f.id, curator);

      expect(mutation.affectedDocumentIds).toEqual([]);
    });
  });

  describe('documents', () => {
    it('should move a document and audit the move', async () => {
      const d = await service.addDocument(a.id, content('d'), curator);

      const mutation = await service.moveDocument(d.id, b.id, curator);

      expect(mutation.result.folderId).toBe(b.id);
      expect(mutation.affectedDocumentIds).toEqual([d.id]);
      expect(audit.events[audit.events.length - 1].payload).toEqual({
        fromFolderId: a.id,
        toFolderId: b.id,
      });
    });

    it('should report a moved document even when it carries an override', async () => {
      const d = await service.addDocument(a.id, content('d'), curator);
      await service.setOverride(d.id, 'standard-1', curator);

      const mutation = await service.moveDocument(d.id, b.id, curator);

      expect(mutation.affectedDocumentIds).toEqual([d.id]);
    });

    it('should not report a moved archived document', async () => {
      const d = await service.addDocument(a.id, content('d'), curator);
      await service.archiveDocument(d.id, curator);

      const mutation = await service.moveDocument(d.id, b.id, curator);

      expect(mutation.affectedDocumentIds).toEqual([]);
    });

    it('should refuse to revise an archived document', async () => {
      const d = await service.addDocument(a.id, content('d'), curator);
      await service.archiveDocument(d.id, curator);

      await expect(
        service.replaceContent(d.id, content('d2'), curator),
      ).rejects.toThrow(BadRequestException);
    });

    it('should point a revision at its new bytes', async () => {
      const d = await service.addDocument(a.id, content('d'), curator);

      const revised = await service.replaceContent(
        d.id,
        content('d2'),
        curator,
      );

      expect(revised.contentRef).toBe('documents/aa/d2');
      expect(audit.events[audit.events.length - 1]).toMatchObject({
        kind: 'upload',
        payload: { revision: true, previousContentRef: 'documents/aa/d' },
      });
    });
  });

  describe('rename', () => {
    it('should rename a document and audit both names', async () => {
      const d = await service.addDocument(a.id, content('d'), curator);

      const renamed = await service.renameDocument(d.id, 'handbook.odt', curator);

      expect(renamed).toMatchObject({
        fileName: 'handbook.odt',
        contentRef: 'documents/aa/d',
      });
      expect(audit.events[audit.events.length - 1]).toMatchObject({
        kind: 'rename',
        entityType: 'document',
        entityId: d.id,
        payload: { from: 'd.odt', to: 'handbook.odt' },
      });
    });

    it('should rename a folder and audit both names', async () => {
      const renamed = await service.renameFolder(b.id, 'archive-2026', curator);

      expect(renamed).toMatchObject({ name: 'archive-2026', parentId: a.id });
      expect(audit.events[audit.events.length - 1]).toMatchObject({
        kind: 'rename',
        entityType: 'folder',
        entityId: b.id,
        payload: { from: 'b', to: 'archive-2026' },
      });
    });

    it('should not audit a rename to the current name', async () => {
      const d = await service.addDocument(a.id, content('d'), curator);
      const before = audit.events.length;

      await service.renameDocument(d.id, 'd.odt', curator);
      await service.renameFolder(a.id, 'a', curator);

      expect(audit.events).toHaveLength(before);
    });

    it('should throw NotFound for an unknown folder', async () => {
      await expect(
        service.renameFolder('missing', 'x', curator),
      ).rejects.toThrow(NotFoundException);
    });
  });

  it('should not revise a document archived by an earlier concurrent call', async () => {
    const d = await service.addDocument(a.id, content('d'), curator);

    const results = await Promise.allSettled([
      service.archiveDocument(d.id, curator),
      service.replaceContent(d.id, content('d2'), curator),
    ]);

    expect(results.map((result) => result.status)).toEqual([
      'fulfilled',
      'rejected',
    ]);
    expect(await documents.findById(d.id)).toMatchObject({
      lifecycle: 'archived',
      contentRef: 'documents/aa/d',
    });
  });

  it('should serialize concurrent mutations', async () => {
    const f = await service.createFolder('f', root.id, curator);

    // a -> under f and f -> under b race; only one order is cycle free
    const results = await Promise.allSettled([
      service.reparentFolder(a.id, f.id, curator),
      service.reparentFolder(f.id, b.id, curator),
    ]);

    expect(results[0].status).toBe('fulfilled');
    expect(results[1].status).toBe('rejected');
    expect((await folders.findById(f.id))?.parentId).toBe(root.id);
  });
});
