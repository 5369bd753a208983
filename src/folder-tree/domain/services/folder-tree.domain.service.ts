import {
  BadRequestException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { AuditService } from '../../../audit/audit.service';
import { AuditEventKind } from '../../../audit/domain/enums/audit-event-kind.enum';
import { AuditEntityType } from '../../../audit/domain/enums/audit-entity-type.enum';
import { Actor } from '../../../auth/types/actor.type';
import { CycleRejectedError } from '../../../utils/errors/domain-errors';
import { KeyedMutex } from '../../../utils/keyed-mutex';
import { IPaginationOptions } from '../../../utils/types/pagination-options';
import { Document, DocumentContent } from '../entities/document.entity';
import { Folder } from '../entities/folder.entity';
import { DocumentLifecycle } from '../enums/document-lifecycle.enum';
import { FolderTree } from '../folder-tree';
import { DocumentRepository } from '../repositories/document.repository.port';
import { FolderRepository } from '../repositories/folder.repository.port';
import { TreeMutation } from '../types/tree-mutation.type';

// The hierarchy is single-rooted, so one key serializes every mutation.
const TREE_LOCK = 'folder-tree';

/**
 * Owns folders, documents and their membership edges.
 *
 * Mutations run one at a time within the process and append an audit event.
 * Those that can change which Standard governs a document report the
 * affected active documents; the caller decides how to re-validate them.
 */
@Injectable()
export class FolderTreeDomainService {
  private readonly logger = new Logger(FolderTreeDomainService.name);
  private readonly mutex = new KeyedMutex();

  constructor(
    private readonly folderRepository: FolderRepository,
    private readonly documentRepository: DocumentRepository,
    private readonly auditService: AuditService,
  ) {}

  async createFolder(
    name: string,
    parentId: string | null,
    actor: Actor,
  ): Promise<Folder> {
    return this.mutex.runExclusive(TREE_LOCK, async () => {
      if (parentId === null) {
        const root = await this.folderRepository.findRoot();
        if (root) {
          throw new BadRequestException(
            'A root folder already exists; new folders need a parent',
          );
        }
      } else {
        await this.getFolder(parentId);
      }

      const folder = await this.folderRepository.create({ name, parentId });
      await this.auditService.append({
        kind: AuditEventKind.FOLDER_CREATE,
        actorSubject: actor.subject,
        entityType: AuditEntityType.FOLDER,
        entityId: folder.id,
        payload: { name, parentId },
      });

      this.logger.log(`[FOLDER_CREATE] ${folder.id} under ${parentId ?? '(root)'}`);
      return folder;
    });
  }

  async getFolder(folderId: string): Promise<Folder> {
    const folder = await this.folderRepository.findById(folderId);
    if (!folder) {
      throw new NotFoundException(`Folder ${folderId} not found`);
    }
    return folder;
  }

  async renameFolder(
    folderId: string,
    name: string,
    actor: Actor,
  ): Promise<Folder> {
    return this.mutex.runExclusive(TREE_LOCK, async () => {
      const folder = await this.getFolder(folderId);
      if (folder.name === name) {
        return folder;
      }

      const updated = await this.folderRepository.update(folderId, { name });
      await this.auditService.append({
        kind: AuditEventKind.RENAME,
        actorSubject: actor.subject,
        entityType: AuditEntityType.FOLDER,
        entityId: folderId,
        payload: { from: folder.name, to: name },
      });
      return updated;
    });
  }

  async listChildren(folderId: string): Promise<Folder[]> {
    await this.getFolder(folderId);
    return this.folderRepository.findChildren(folderId);
  }

  async listDocuments(
    folderId: string,
    pagination: IPaginationOptions,
  ): Promise<Document[]> {
    await this.getFolder(folderId);
    return this.documentRepository.findByFolderId(folderId, pagination);
  }

  /**
   * Moves a folder under a new parent. Moving a folder under itself or one
   * of its descendants is rejected and leaves the tree unchanged.
   */
  async reparentFolder(
    folderId: string,
    newParentId: string,
    actor: Actor,
  ): Promise<TreeMutation<Folder>> {
    return this.mutex.runExclusive(TREE_LOCK, async () => {
      const folder = await this.getFolder(folderId);
      await this.getFolder(newParentId);

      if (folder.parentId === null) {
        throw new BadRequestException('The root folder cannot be re-parented');
      }
      if (folder.parentId === newParentId) {
        return { result: folder, affectedDocumentIds: [] };
      }

      const tree = FolderTree.fromFolders(await this.folderRepository.findAll());
      if (tree.isWithinSubtree(newParentId, folderId)) {
        throw new CycleRejectedError(folderId, newParentId);
      }

      const updated = await this.folderRepository.update(folderId, {
        parentId: newParentId,
      });
      await this.auditService.append({
        kind: AuditEventKind.REPARENT,
        actorSubject: actor.subject,
        entityType: AuditEntityType.FOLDER,
        entityId: folderId,
        payload: { fromParentId: folder.parentId, toParentId: newParentId },
      });

      const affectedDocumentIds = await this.inheritingDocuments(
        tree.affectedByMove(folderId),
      );
      this.logger.log(
        `[REPARENT] ${folderId} -> ${newParentId}, ${affectedDocumentIds.length} document(s) affected`,
      );
      return { result: updated, affectedDocumentIds };
    });
  }

  /**
   * Sets, replaces or clears (`standardId = null`) a folder's assignment.
   * Subtrees with their own assignment and overridden documents are
   * unaffected. Existing reports are left untouched.
   */
  async assignStandard(
    folderId: string,
    standardId: string | null,
    actor: Actor,
  ): Promise<TreeMutation<Folder>> {
    return this.mutex.runExclusive(TREE_LOCK, async () => {
      const folder = await this.getFolder(folderId);
      const previousStandardId = folder.assignedStandardId;

      if (previousStandardId === standardId) {
        return { result: folder, affectedDocumentIds: [] };
      }

      const updated = await this.folderRepository.update(folderId, {
        assignedStandardId: standardId,
      });

      let kind = AuditEventKind.REASSIGN;
      if (standardId === null) {
        kind = AuditEventKind.UNASSIGN;
      } else if (previousStandardId === null) {
        kind = AuditEventKind.ASSIGN;
      }
      await this.auditService.append({
        kind,
        actorSubject: actor.subject,
        entityType: AuditEntityType.FOLDER,
        entityId: folderId,
        payload: { standardId, previousStandardId },
      });

      const tree = FolderTree.fromFolders(await this.folderRepository.findAll());
      const affectedDocumentIds = await this.inheritingDocuments(
        tree.inheritingSubtree(folderId),
      );
      this.logger.log(
        `[${kind.toUpperCase()}] folder ${folderId} standard ${standardId ?? '(none)'}, ` +
          `${affectedDocumentIds.length} document(s) affected`,
      );
      return { result: updated, affectedDocumentIds };
    });
  }

  async addDocument(
    folderId: string,
    content: DocumentContent,
    actor: Actor,
  ): Promise<Document> {
    return this.mutex.runExclusive(TREE_LOCK, async () => {
      await this.getFolder(folderId);

      const document = await this.documentRepository.create({
        ...content,
        folderId,
        uploadedBy: actor.subject,
      });
      await this.auditService.append({
        kind: AuditEventKind.UPLOAD,
        actorSubject: actor.subject,
        entityType: AuditEntityType.DOCUMENT,
        entityId: document.id,
        payload: {
          folderId,
          contentRef: document.contentRef,
          contentHash: document.contentHash,
          fileSize: document.fileSize,
          revision: false,
        },
      });
      return document;
    });
  }

  /**
   * Points a document at the bytes of a new revision.
   */
  async replaceContent(
    documentId: string,
    content: DocumentContent,
    actor: Actor,
  ): Promise<Document> {
    return this.mutex.runExclusive(TREE_LOCK, async () => {
      const document = await this.getDocument(documentId);
      if (document.lifecycle === DocumentLifecycle.ARCHIVED) {
        throw new BadRequestException('Archived documents cannot be revised');
      }

      const updated = await this.documentRepository.update(documentId, content);
      await this.auditService.append({
        kind: AuditEventKind.UPLOAD,
        actorSubject: actor.subject,
        entityType: AuditEntityType.DOCUMENT,
        entityId: documentId,
        payload: {
          folderId: updated.folderId,
          contentRef: updated.contentRef,
          contentHash: updated.contentHash,
          fileSize: updated.fileSize,
          revision: true,
          previousContentRef: document.contentRef,
        },
      });
      return updated;
    });
  }

  /**
   * Changes the display name only; the content and its validation are
   * untouched.
   */
  async renameDocument(
    documentId: string,
    fileName: string,
    actor: Actor,
  ): Promise<Document> {
    return this.mutex.runExclusive(TREE_LOCK, async () => {
      const document = await this.getDocument(documentId);
      if (document.fileName === fileName) {
        return document;
      }

      const updated = await this.documentRepository.update(documentId, {
        fileName,
      });
      await this.auditService.append({
        kind: AuditEventKind.RENAME,
        actorSubject: actor.subject,
        entityType: AuditEntityType.DOCUMENT,
        entityId: documentId,
        payload: { from: document.fileName, to: fileName },
      });
      return updated;
    });
  }

  async getDocument(documentId: string): Promise<Document> {
    const document = await this.documentRepository.findById(documentId);
    if (!document) {
      throw new NotFoundException(`Document ${documentId} not found`);
    }
    return document;
  }

  async moveDocument(
    documentId: string,
    folderId: string,
    actor: Actor,
  ): Promise<TreeMutation<Document>> {
    return this.mutex.runExclusive(TREE_LOCK, async () => {
      const document = await this.getDocument(documentId);
      await this.getFolder(folderId);

      if (document.folderId === folderId) {
        return { result: document, affectedDocumentIds: [] };
      }

      const updated = await this.documentRepository.update(documentId, {
        folderId,
      });
      await this.auditService.append({
        kind: AuditEventKind.MOVE,
        actorSubject: actor.subject,
        entityType: AuditEntityType.DOCUMENT,
        entityId: documentId,
        payload: { fromFolderId: document.folderId, toFolderId: folderId },
      });

      return {
        result: updated,
        affectedDocumentIds:
          updated.lifecycle === DocumentLifecycle.ACTIVE ? [documentId] : [],
      };
    });
  }

  /**
   * Sets or clears (`standardId = null`) a per-document override.
   */
  async setOverride(
    documentId: string,
    standardId: string | null,
    actor: Actor,
  ): Promise<TreeMutation<Document>> {
    return this.mutex.runExclusive(TREE_LOCK, async () => {
      const document = await this.getDocument(documentId);
      if (document.overrideStandardId === standardId) {
        return { result: document, affectedDocumentIds: [] };
      }

      const updated = await this.documentRepository.update(documentId, {
        overrideStandardId: standardId,
      });
      await this.auditService.append({
        kind:
          standardId === null
            ? AuditEventKind.OVERRIDE_CLEAR
            : AuditEventKind.OVERRIDE_SET,
        actorSubject: actor.subject,
        entityType: AuditEntityType.DOCUMENT,
        entityId: documentId,
        payload: {
          standardId,
          previousStandardId: document.overrideStandardId,
        },
      });

      return {
        result: updated,
        affectedDocumentIds:
          updated.lifecycle === DocumentLifecycle.ACTIVE ? [documentId] : [],
      };
    });
  }

  async archiveDocument(documentId: string, actor: Actor): Promise<Document> {
    return this.mutex.runExclusive(TREE_LOCK, async () => {
      const document = await this.getDocument(documentId);
      if (document.lifecycle === DocumentLifecycle.ARCHIVED) {
        return document;
      }

      const updated = await this.documentRepository.update(documentId, {
        lifecycle: DocumentLifecycle.ARCHIVED,
      });
      await this.auditService.append({
        kind: AuditEventKind.ARCHIVE,
        actorSubject: actor.subject,
        entityType: AuditEntityType.DOCUMENT,
        entityId: documentId,
        payload: { folderId: document.folderId },
      });
      return updated;
    });
  }

  private isValidatable(document: Document): boolean {
    return (
      document.lifecycle === DocumentLifecycle.ACTIVE &&
      document.overrideStandardId === null
    );
  }

  // Active, non-overridden documents directly inside the given folders.
  private async inheritingDocuments(folderIds: string[]): Promise<string[]> {
    if (folderIds.length === 0) {
      return [];
    }
    const documents = await this.documentRepository.findByFolderIds(folderIds);
    return documents
      .filter((document) => this.isValidatable(document))
      .map((document) => document.id);
  }
}
