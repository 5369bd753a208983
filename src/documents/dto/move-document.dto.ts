import { ApiProperty } from '@nestjs/swagger';
import { IsUUID } from 'class-validator';

export class MoveDocumentDto {
  @ApiProperty()
  @IsUUID()
  folderId: string;
}
