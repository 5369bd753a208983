export enum RuleSeverity {
  ERROR = 'error',
  WARNING = 'warning',
}
