export enum AuditEntityType {
  FOLDER = 'folder',
  DOCUMENT = 'document',
  STANDARD = 'standard',
  VALIDATION_JOB = 'validation-job',
}
