import { ApiProperty } from '@nestjs/swagger';
import { ValidationJobResponseDto } from '../../validation/dto/validation-job-response.dto';
import { DocumentResponseDto } from './document-response.dto';

export class DocumentUploadResponseDto {
  @ApiProperty({ type: DocumentResponseDto })
  document: DocumentResponseDto;

  @ApiProperty({ type: ValidationJobResponseDto, nullable: true })
  job: ValidationJobResponseDto | null;
}
