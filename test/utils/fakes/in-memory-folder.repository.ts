import { randomUUID } from 'crypto';
import {
  Folder,
  NewFolder,
} from '../../../src/folder-tree/domain/entities/folder.entity';
import {
  FolderPatch,
  FolderRepository,
} from '../../../src/folder-tree/domain/repositories/folder.repository.port';

export class InMemoryFolderRepository extends FolderRepository {
  readonly folders = new Map<string, Folder>();

  async create(data: NewFolder): Promise<Folder> {
    const now = new Date();
    const folder: Folder = {
      id: randomUUID(),
      name: data.name,
      parentId: data.parentId,
      assignedStandardId: null,
      createdAt: now,
      updatedAt: now,
    };
    this.folders.set(folder.id, folder);
    return { ...folder };
  }

  async findById(id: string): Promise<Folder | null> {
    const folder = this.folders.get(id);
    return folder ? { ...folder } : null;
  }

  async findRoot(): Promise<Folder | null> {
    const root = [...this.folders.values()].find(
      (folder) => folder.parentId === null,
    );
    return root ? { ...root } : null;
  }

  async findChildren(parentId: string): Promise<Folder[]> {
    return [...this.folders.values()]
      .filter((folder) => folder.parentId === parentId)
      .sort((a, b) => a.name.localeCompare(b.name))
      .map((folder) => ({ ...folder }));
  }

  async findAll(): Promise<Folder[]> {
    return [...this.folders.values()].map((folder) => ({ ...folder }));
  }

  async update(id: string, patch: FolderPatch): Promise<Folder> {
    const folder = this.folders.get(id);
    if (!folder) {
      throw new Error(`Folder ${id} not found`);
    }
    const updated: Folder = { ...folder, ...patch, updatedAt: new Date() };
    this.folders.set(id, updated);
    return { ...updated };
  }
}
