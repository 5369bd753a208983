import { ApiProperty } from '@nestjs/swagger';
import { IsUUID } from 'class-validator';

export class UploadDocumentDto {
  @ApiProperty({ description: 'Folder the document is filed in' })
  @IsUUID()
  folderId: string;
}
