import { ApiProperty } from '@nestjs/swagger';
import { Expose, Type } from 'class-transformer';
import { ComplianceVerdict } from '../../compliance/domain/enums/compliance-verdict.enum';
import { RuleSeverity } from '../../compliance/domain/enums/rule-severity.enum';

export class FindingResponseDto {
  @ApiProperty({ example: 'required-section:4' })
  @Expose()
  ruleId: string;

  @ApiProperty({ enum: RuleSeverity })
  @Expose()
  severity: RuleSeverity;

  @ApiProperty({ example: 'section:Approval' })
  @Expose()
  location: string;

  @ApiProperty({ example: 'Missing mandatory section "Approval" at level 1' })
  @Expose()
  message: string;
}

export class ComplianceReportResponseDto {
  @ApiProperty()
  @Expose()
  id: string;

  @ApiProperty()
  @Expose()
  jobId: string;

  @ApiProperty()
  @Expose()
  documentId: string;

  @ApiProperty()
  @Expose()
  standardId: string;

  @ApiProperty()
  @Expose()
  standardVersion: number;

  @ApiProperty({ enum: ComplianceVerdict })
  @Expose()
  verdict: ComplianceVerdict;

  @ApiProperty({ type: [FindingResponseDto] })
  @Expose()
  @Type(() => FindingResponseDto)
  findings: FindingResponseDto[];

  @ApiProperty()
  @Expose()
  generatedAt: Date;
}
