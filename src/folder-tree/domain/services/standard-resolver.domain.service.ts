import { Injectable, NotFoundException } from '@nestjs/common';
import { DocumentRepository } from '../repositories/document.repository.port';
import { FolderRepository } from '../repositories/folder.repository.port';
import { StandardResolution } from '../types/standard-resolution.type';

/**
 * Determines the Standard a document must comply with.
 *
 * A per-document override wins unconditionally. Otherwise the nearest folder
 * assignment on the path from the document's folder to the root applies.
 */
@Injectable()
export class StandardResolverDomainService {
  constructor(
    private readonly documentRepository: DocumentRepository,
    private readonly folderRepository: FolderRepository,
  ) {}

  async resolveStandard(documentId: string): Promise<StandardResolution> {
    const document = await this.documentRepository.findById(documentId);
    if (!document) {
      throw new NotFoundException(`Document ${documentId} not found`);
    }

    if (document.overrideStandardId) {
      return {
        status: 'resolved',
        standardId: document.overrideStandardId,
        source: 'override',
      };
    }
    return this.resolveForFolder(document.folderId);
  }

  async resolveForFolder(folderId: string): Promise<StandardResolution> {
    const visited = new Set<string>();
    let current = await this.folderRepository.findById(folderId);
    if (!current) {
      throw new NotFoundException(`Folder ${folderId} not found`);
    }

    while (current && !visited.has(current.id)) {
      if (current.assignedStandardId) {
        return {
          status: 'resolved',
          standardId: current.assignedStandardId,
          source: 'folder',
          folderId: current.id,
        };
      }
      visited.add(current.id);
      current =
        current.parentId === null
          ? null
          : await this.folderRepository.findById(current.parentId);
    }
    return { status: 'not-found' };
  }
}
