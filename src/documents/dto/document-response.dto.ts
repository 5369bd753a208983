import { ApiProperty } from '@nestjs/swagger';
import { Expose } from 'class-transformer';
import { DocumentLifecycle } from '../../folder-tree/domain/enums/document-lifecycle.enum';

export class DocumentResponseDto {
  @ApiProperty()
  @Expose()
  id: string;

  @ApiProperty()
  @Expose()
  folderId: string;

  @ApiProperty({ example: 'quality-manual.odt' })
  @Expose()
  fileName: string;

  @ApiProperty({ example: 'application/vnd.oasis.opendocument.text' })
  @Expose()
  mimeType: string;

  @ApiProperty({ example: 24576 })
  @Expose()
  fileSize: number;

  @ApiProperty({ description: 'sha256 of the current content' })
  @Expose()
  contentHash: string;

  @ApiProperty({ type: String, nullable: true })
  @Expose()
  overrideStandardId: string | null;

  @ApiProperty({ enum: DocumentLifecycle })
  @Expose()
  lifecycle: DocumentLifecycle;

  @ApiProperty()
  @Expose()
  uploadedBy: string;

  @ApiProperty()
  @Expose()
  createdAt: Date;

  @ApiProperty()
  @Expose()
  updatedAt: Date;
}
