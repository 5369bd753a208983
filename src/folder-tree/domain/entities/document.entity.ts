import { DocumentLifecycle } from '../enums/document-lifecycle.enum';

export class Document {
  id: string;
  folderId: string;
  fileName: string;
  mimeType: string;
  fileSize: number;
  // Blob key of the current revision's bytes
  contentRef: string;
  contentHash: string;
  overrideStandardId: string | null;
  lifecycle: DocumentLifecycle;
  uploadedBy: string;
  createdAt: Date;
  updatedAt: Date;
}

export type NewDocument = Pick<
  Document,
  | 'folderId'
  | 'fileName'
  | 'mimeType'
  | 'fileSize'
  | 'contentRef'
  | 'contentHash'
  | 'uploadedBy'
>;

export type DocumentContent = Pick<
  Document,
  'fileName' | 'mimeType' | 'fileSize' | 'contentRef' | 'contentHash'
>;
