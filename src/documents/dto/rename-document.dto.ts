import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString, MaxLength } from 'class-validator';

export class RenameDocumentDto {
  @ApiProperty({ example: 'quality-manual-2026.odt' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  fileName: string;
}
