import { NullableType } from '../../../utils/types/nullable.type';
import { IPaginationOptions } from '../../../utils/types/pagination-options';
import { Document, NewDocument } from '../entities/document.entity';

export type DocumentPatch = Partial<
  Pick<
    Document,
    | 'folderId'
    | 'fileName'
    | 'mimeType'
    | 'fileSize'
    | 'contentRef'
    | 'contentHash'
    | 'overrideStandardId'
    | 'lifecycle'
  >
>;

export abstract class DocumentRepository {
  abstract create(data: NewDocument): Promise<Document>;

  abstract findById(id: string): Promise<NullableType<Document>>;

  /**
   * Page of a folder's documents ordered by creation time. Fetches
   * `limit + 1` rows so callers can tell whether another page exists.
   */
  abstract findByFolderId(
    folderId: string,
    pagination: IPaginationOptions,
  ): Promise<Document[]>;

  abstract findByFolderIds(folderIds: string[]): Promise<Document[]>;

  abstract update(id: string, patch: DocumentPatch): Promise<Document>;
}
