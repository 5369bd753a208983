export enum ComplianceVerdict {
  COMPLIANT = 'compliant',
  NON_COMPLIANT = 'non-compliant',
  COMPLIANT_WITH_WARNINGS = 'compliant-with-warnings',
}
