import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../config/config.type';
import { evaluateCompliance } from './domain/compliance-evaluator';
import { parseOdfDocument, ParseLimits, ParseOutcome } from './domain/parser/odf-parser';
import { deriveRules } from './domain/rules/rule-derivation';
import {
  ComplianceEvaluation,
  StandardRuleSet,
} from './domain/types/compliance-evaluation.type';
import { Rule } from './domain/types/rule.type';
import { StructuralProfile } from './domain/types/structural-profile.type';

/**
 * Nest-facing wrapper over the pure parser, rule derivation and evaluator,
 * applying the configured document size limits.
 */
@Injectable()
export class ComplianceEvaluatorService {
  private readonly logger = new Logger(ComplianceEvaluatorService.name);
  private readonly limits: ParseLimits;

  constructor(configService: ConfigService<AllConfigType>) {
    this.limits = {
      maxDocumentBytes: configService.getOrThrow(
        'validation.maxDocumentBytes',
        { infer: true },
      ),
      maxPartBytes: configService.getOrThrow('validation.maxPartBytes', {
        infer: true,
      }),
    };
  }

  get maxDocumentBytes(): number {
    return this.limits.maxDocumentBytes;
  }

  parse(documentBytes: Uint8Array): ParseOutcome {
    return parseOdfDocument(documentBytes, this.limits);
  }

  deriveRules(profile: StructuralProfile): Rule[] {
    return deriveRules(profile);
  }

  evaluate(
    documentBytes: Uint8Array,
    standard: StandardRuleSet,
  ): ComplianceEvaluation {
    const startedAt = Date.now();
    const evaluation = evaluateCompliance(documentBytes, standard, this.limits);

    this.logger.debug(
      `[EVALUATE] standard=${standard.id} v${standard.version} verdict=${evaluation.verdict} ` +
        `findings=${evaluation.findings.length} took=${Date.now() - startedAt}ms`,
    );
    return evaluation;
  }
}
