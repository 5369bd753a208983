import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsOptional, IsString, IsUUID, MaxLength } from 'class-validator';

export class PromoteStandardDto {
  @ApiProperty({
    description: 'Golden document whose current revision becomes the Standard',
    example: '5b0c8a3e-2f1d-4c55-9e7e-0d5f3c1a9b42',
  })
  @IsUUID()
  documentId: string;

  @ApiPropertyOptional({ example: 'Quality Manual', maxLength: 255 })
  @IsOptional()
  @IsString()
  @MaxLength(255)
  name?: string;

  @ApiPropertyOptional({
    description:
      'Head of an existing lineage; the new Standard becomes its next version',
  })
  @IsOptional()
  @IsUUID()
  predecessorStandardId?: string;
}
