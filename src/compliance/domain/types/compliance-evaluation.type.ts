import { ComplianceVerdict } from '../enums/compliance-verdict.enum';
import { RuleSeverity } from '../enums/rule-severity.enum';
import { Rule } from './rule.type';

export interface Finding {
  ruleId: string;
  severity: RuleSeverity;
  location: string;
  message: string;
}

export interface ComplianceEvaluation {
  standardId: string;
  standardVersion: number;
  findings: Finding[];
  verdict: ComplianceVerdict;
}

// The slice of a Standard the evaluator needs.
export interface StandardRuleSet {
  id: string;
  version: number;
  rules: Rule[];
}
