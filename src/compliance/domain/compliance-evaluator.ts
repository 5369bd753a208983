import { ComplianceVerdict } from './enums/compliance-verdict.enum';
import { RuleSeverity } from './enums/rule-severity.enum';
import {
  ComplianceEvaluation,
  Finding,
  StandardRuleSet,
} from './types/compliance-evaluation.type';
import { StructuralProfile } from './types/structural-profile.type';
import {
  DEFAULT_PARSE_LIMITS,
  parseOdfDocument,
  ParseLimits,
} from './parser/odf-parser';
import { checkRule } from './rules/rule-predicates';
import { describeError } from '../../utils/errors/domain-errors';

export const MALFORMED_DOCUMENT_RULE_ID = 'malformed-document';

export function aggregateVerdict(findings: Finding[]): ComplianceVerdict {
  if (findings.some((finding) => finding.severity === RuleSeverity.ERROR)) {
    return ComplianceVerdict.NON_COMPLIANT;
  }
  if (findings.some((finding) => finding.severity === RuleSeverity.WARNING)) {
    return ComplianceVerdict.COMPLIANT_WITH_WARNINGS;
  }
  return ComplianceVerdict.COMPLIANT;
}

/**
 * Runs every rule of the Standard against an already parsed profile.
 * Findings are ordered by rule declaration order, then by location.
 */
export function evaluateProfile(
  profile: StructuralProfile,
  standard: StandardRuleSet,
): ComplianceEvaluation {
  const ranked: Array<{ rank: number; finding: Finding }> = [];

  standard.rules.forEach((rule, rank) => {
    let findings: Finding[];
    try {
      findings = checkRule(rule, profile);
    } catch (error) {
      findings = [
        {
          ruleId: rule.id,
          severity: RuleSeverity.ERROR,
          location: 'rule',
          message: `Rule could not be evaluated: ${describeError(error)}`,
        },
      ];
    }
    for (const finding of findings) {
      ranked.push({ rank, finding });
    }
  });

  ranked.sort(
    (a, b) =>
      a.rank - b.rank ||
      (a.finding.location < b.finding.location
        ? -1
        : a.finding.location > b.finding.location
          ? 1
          : 0),
  );
  const findings = ranked.map(({ finding }) => finding);

  return {
    standardId: standard.id,
    standardVersion: standard.version,
    findings,
    verdict: aggregateVerdict(findings),
  };
}

/**
 * Total function: a document that cannot be parsed produces a single
 * `malformed-document` error finding instead of an exception.
 */
export function evaluateCompliance(
  documentBytes: Uint8Array,
  standard: StandardRuleSet,
  limits: ParseLimits = DEFAULT_PARSE_LIMITS,
): ComplianceEvaluation {
  const parsed = parseOdfDocument(documentBytes, limits);

  if (!parsed.ok) {
    const findings: Finding[] = [
      {
        ruleId: MALFORMED_DOCUMENT_RULE_ID,
        severity: RuleSeverity.ERROR,
        location: 'document',
        message: `Document could not be parsed: ${parsed.reason}`,
      },
    ];
    return {
      standardId: standard.id,
      standardVersion: standard.version,
      findings,
      verdict: ComplianceVerdict.NON_COMPLIANT,
    };
  }

  return evaluateProfile(parsed.profile, standard);
}
