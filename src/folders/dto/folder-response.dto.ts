import { ApiProperty } from '@nestjs/swagger';
import { Expose } from 'class-transformer';
import { StandardResolutionResponseDto } from '../../documents/dto/standard-resolution-response.dto';

export class FolderResponseDto {
  @ApiProperty()
  @Expose()
  id: string;

  @ApiProperty()
  @Expose()
  name: string;

  @ApiProperty({ type: String, nullable: true })
  @Expose()
  parentId: string | null;

  @ApiProperty({ type: String, nullable: true })
  @Expose()
  assignedStandardId: string | null;

  @ApiProperty()
  @Expose()
  createdAt: Date;

  @ApiProperty()
  @Expose()
  updatedAt: Date;
}

export class FolderDetailResponseDto extends FolderResponseDto {
  @ApiProperty({
    type: StandardResolutionResponseDto,
    description: 'Nearest assignment on the path to the root',
  })
  effectiveStandard: StandardResolutionResponseDto;
}

export class FolderMutationResponseDto {
  @ApiProperty({ type: FolderResponseDto })
  folder: FolderResponseDto;

  @ApiProperty({
    example: 3,
    description: 'Documents queued for re-validation by the change',
  })
  revalidatedDocuments: number;
}
