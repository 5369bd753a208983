/**
 * A node of the single-rooted folder hierarchy. Only the root has no parent.
 */
export class Folder {
  id: string;
  name: string;
  parentId: string | null;
  assignedStandardId: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export type NewFolder = Pick<Folder, 'name' | 'parentId'>;
