import { Module } from '@nestjs/common';
import { ComplianceEvaluatorService } from './compliance-evaluator.service';

@Module({
  providers: [ComplianceEvaluatorService],
  exports: [ComplianceEvaluatorService],
})
export class ComplianceModule {}
