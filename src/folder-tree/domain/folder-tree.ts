import { Folder } from './entities/folder.entity';

type FolderNode = Pick<Folder, 'id' | 'parentId' | 'assignedStandardId'>;

export type FolderAssignment = {
  folderId: string;
  standardId: string;
};

/**
 * Immutable snapshot of the folder hierarchy: nodes keyed by id with parent
 * back-references, plus a children index built once from the same rows.
 */
export class FolderTree {
  private readonly nodes = new Map<string, FolderNode>();
  private readonly children = new Map<string, string[]>();

  private constructor(folders: FolderNode[]) {
    for (const folder of folders) {
      this.nodes.set(folder.id, {
        id: folder.id,
        parentId: folder.parentId,
        assignedStandardId: folder.assignedStandardId,
      });
    }
    for (const folder of folders) {
      if (folder.parentId === null) {
        continue;
      }
      const siblings = this.children.get(folder.parentId) ?? [];
      siblings.push(folder.id);
      this.children.set(folder.parentId, siblings);
    }
  }

  static fromFolders(folders: FolderNode[]): FolderTree {
    return new FolderTree(folders);
  }

  has(folderId: string): boolean {
    return this.nodes.has(folderId);
  }

  /**
   * The folder itself followed by each ancestor up to the root.
   */
  pathToRoot(folderId: string): string[] {
    const path: string[] = [];
    const seen = new Set<string>();
    let current = this.nodes.get(folderId);

    while (current && !seen.has(current.id)) {
      seen.add(current.id);
      path.push(current.id);
      current =
        current.parentId === null ? undefined : this.nodes.get(current.parentId);
    }
    return path;
  }

  /**
   * True when `folderId` is `ancestorId` or lies below it.
   */
  isWithinSubtree(folderId: string, ancestorId: string): boolean {
    return this.pathToRoot(folderId).includes(ancestorId);
  }

  nearestAssignment(folderId: string): FolderAssignment | null {
    for (const id of this.pathToRoot(folderId)) {
      const standardId = this.nodes.get(id)?.assignedStandardId;
      if (standardId) {
        return { folderId: id, standardId };
      }
    }
    return null;
  }

  /**
   * Folders that inherit their Standard through `folderId`: the folder and
   * its descendants, minus any subtree rooted at a descendant with its own
   * assignment. Breadth-first, so parents precede their children.
   */
  inheritingSubtree(folderId: string): string[] {
    if (!this.nodes.has(folderId)) {
      return [];
    }
    const result: string[] = [];
    const queue = [folderId];
    const seen = new Set<string>();

    while (queue.length > 0) {
      const id = queue.shift();
      if (id === undefined || seen.has(id)) {
        continue;
      }
      seen.add(id);
      result.push(id);

      for (const childId of this.children.get(id) ?? []) {
        if (!this.nodes.get(childId)?.assignedStandardId) {
          queue.push(childId);
        }
      }
    }
    return result;
  }

  /**
   * Folders whose effective Standard can change when `folderId` is moved to
   * another parent. A folder with its own assignment shields its subtree.
   */
  affectedByMove(folderId: string): string[] {
    if (this.nodes.get(folderId)?.assignedStandardId) {
      return [];
    }
    return this.inheritingSubtree(folderId);
  }
}
