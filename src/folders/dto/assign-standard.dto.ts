import { ApiProperty } from '@nestjs/swagger';
import { IsUUID, ValidateIf } from 'class-validator';

export class AssignStandardDto {
  @ApiProperty({
    type: String,
    nullable: true,
    description: 'Standard for the folder subtree; null clears the assignment',
  })
  @ValidateIf((_, value) => value !== null)
  @IsUUID()
  standardId: string | null;
}
