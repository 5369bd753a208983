import { ApiProperty } from '@nestjs/swagger';
import {
  IsNotEmpty,
  IsString,
  IsUUID,
  MaxLength,
  ValidateIf,
} from 'class-validator';

export class CreateFolderDto {
  @ApiProperty({ example: 'Quality manuals' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  name: string;

  @ApiProperty({
    type: String,
    nullable: true,
    description: 'Parent folder; null creates the root',
  })
  @ValidateIf((_, value) => value !== null)
  @IsUUID()
  parentId: string | null;
}
