import { NullableType } from '../../../utils/types/nullable.type';
import { Folder, NewFolder } from '../entities/folder.entity';

export type FolderPatch = Partial<
  Pick<Folder, 'name' | 'parentId' | 'assignedStandardId'>
>;

export abstract class FolderRepository {
  abstract create(data: NewFolder): Promise<Folder>;

  abstract findById(id: string): Promise<NullableType<Folder>>;

  abstract findRoot(): Promise<NullableType<Folder>>;

  abstract findChildren(parentId: string): Promise<Folder[]>;

  /**
   * Every folder of the tree; used to build a `FolderTree` snapshot.
   */
  abstract findAll(): Promise<Folder[]>;

  abstract update(id: string, patch: FolderPatch): Promise<Folder>;
}
