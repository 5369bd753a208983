import { ApiProperty } from '@nestjs/swagger';
import { Expose } from 'class-transformer';
import { ValidationJobState } from '../domain/enums/validation-job-state.enum';
import { ValidationTrigger } from '../domain/enums/validation-trigger.enum';

export class ValidationJobResponseDto {
  @ApiProperty()
  @Expose()
  id: string;

  @ApiProperty()
  @Expose()
  documentId: string;

  @ApiProperty({ description: 'Content snapshot the job validates' })
  @Expose()
  contentRef: string;

  @ApiProperty({ type: String, nullable: true })
  @Expose()
  standardId: string | null;

  @ApiProperty({ type: Number, nullable: true })
  @Expose()
  standardVersion: number | null;

  @ApiProperty({ enum: ValidationJobState })
  @Expose()
  state: ValidationJobState;

  @ApiProperty({ enum: ValidationTrigger })
  @Expose()
  trigger: ValidationTrigger;

  @ApiProperty({ example: 1 })
  @Expose()
  attempts: number;

  @ApiProperty({ example: 5 })
  @Expose()
  maxAttempts: number;

  @ApiProperty()
  @Expose()
  enqueuedAt: Date;

  @ApiProperty({ type: Date, nullable: true })
  @Expose()
  startedAt: Date | null;

  @ApiProperty({ type: Date, nullable: true })
  @Expose()
  finishedAt: Date | null;

  @ApiProperty({ type: String, nullable: true })
  @Expose()
  lastError: string | null;

  @ApiProperty({
    description: 'Retries were exhausted and an operator should look at it',
  })
  @Expose()
  requiresIntervention: boolean;
}
