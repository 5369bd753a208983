import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString, MaxLength } from 'class-validator';

export class RenameFolderDto {
  @ApiProperty({ example: 'Site manuals' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  name: string;
}
