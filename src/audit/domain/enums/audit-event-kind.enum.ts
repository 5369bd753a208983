export enum AuditEventKind {
  UPLOAD = 'upload',
  PROMOTE = 'promote',
  ASSIGN = 'assign',
  REASSIGN = 'reassign',
  UNASSIGN = 'unassign',
  VALIDATE_START = 'validate-start',
  VALIDATE_COMPLETE = 'validate-complete',
  OVERRIDE_SET = 'override-set',
  OVERRIDE_CLEAR = 'override-clear',
  FOLDER_CREATE = 'folder-create',
  REPARENT = 'reparent',
  MOVE = 'move',
  ARCHIVE = 'archive',
  RENAME = 'rename',
}
