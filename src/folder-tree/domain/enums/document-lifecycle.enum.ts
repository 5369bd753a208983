export enum DocumentLifecycle {
  ACTIVE = 'active',
  // Archived documents keep their history but are never validated again
  ARCHIVED = 'archived',
}
