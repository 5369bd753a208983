import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { StandardResolution } from '../../folder-tree/domain/types/standard-resolution.type';

export class StandardResolutionResponseDto {
  @ApiProperty({ enum: ['resolved', 'not-found'] })
  status: 'resolved' | 'not-found';

  @ApiPropertyOptional()
  standardId?: string;

  @ApiPropertyOptional({ enum: ['override', 'folder'] })
  source?: 'override' | 'folder';

  @ApiPropertyOptional({ description: 'Folder the assignment comes from' })
  folderId?: string;

  static fromResolution(
    resolution: StandardResolution,
  ): StandardResolutionResponseDto {
    const dto = new StandardResolutionResponseDto();
    dto.status = resolution.status;
    if (resolution.status === 'resolved') {
      dto.standardId = resolution.standardId;
      dto.source = resolution.source;
      if (resolution.source === 'folder') {
        dto.folderId = resolution.folderId;
      }
    }
    return dto;
  }
}
