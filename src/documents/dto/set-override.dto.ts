import { ApiProperty } from '@nestjs/swagger';
import { IsUUID, ValidateIf } from 'class-validator';

export class SetOverrideDto {
  @ApiProperty({
    type: String,
    nullable: true,
    description: 'Standard that governs the document; null clears the override',
  })
  @ValidateIf((_, value) => value !== null)
  @IsUUID()
  standardId: string | null;
}
