import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { ComplianceReportResponseDto } from './compliance-report-response.dto';
import { ValidationJobResponseDto } from './validation-job-response.dto';

export enum CurrentReportStatus {
  VALIDATED = 'validated',
  NOT_YET_VALIDATED = 'not-yet-validated',
  SKIPPED = 'skipped',
  FAILED = 'failed',
}

export class CurrentReportResponseDto {
  @ApiProperty({ enum: CurrentReportStatus })
  status: CurrentReportStatus;

  @ApiPropertyOptional({ type: ComplianceReportResponseDto })
  report?: ComplianceReportResponseDto;

  @ApiPropertyOptional({
    type: ValidationJobResponseDto,
    description: 'The job that was skipped or failed',
  })
  job?: ValidationJobResponseDto;
}
