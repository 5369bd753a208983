import { ApiProperty } from '@nestjs/swagger';
import { Expose, Type } from 'class-transformer';
import { RuleKind } from '../../compliance/domain/enums/rule-kind.enum';
import { RuleSeverity } from '../../compliance/domain/enums/rule-severity.enum';

export class RuleResponseDto {
  @ApiProperty({ example: 'required-section:1' })
  @Expose()
  id: string;

  @ApiProperty({ enum: RuleKind })
  @Expose()
  kind: RuleKind;

  @ApiProperty({ enum: RuleSeverity })
  @Expose()
  severity: RuleSeverity;

  @ApiProperty()
  @Expose()
  description: string;

  @ApiProperty({ type: Object, example: { title: 'Scope', level: 2 } })
  @Expose()
  params: object;
}

export class StandardResponseDto {
  @ApiProperty()
  @Expose()
  id: string;

  @ApiProperty()
  @Expose()
  name: string;

  @ApiProperty({ example: 2 })
  @Expose()
  version: number;

  @ApiProperty()
  @Expose()
  lineageId: string;

  @ApiProperty({ type: String, nullable: true })
  @Expose()
  predecessorId: string | null;

  @ApiProperty()
  @Expose()
  sourceDocumentId: string;

  @ApiProperty()
  @Expose()
  promotedBy: string;

  @ApiProperty()
  @Expose()
  promotedAt: Date;

  @ApiProperty({ type: [RuleResponseDto] })
  @Expose()
  @Type(() => RuleResponseDto)
  rules: RuleResponseDto[];
}
