import { ApiProperty } from '@nestjs/swagger';
import { IsUUID } from 'class-validator';

export class ReparentFolderDto {
  @ApiProperty()
  @IsUUID()
  parentId: string;
}
