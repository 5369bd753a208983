// Why a job was enqueued
export enum ValidationTrigger {
  UPLOAD = 'upload',
  REVISION = 'revision',
  MANUAL = 'manual',
  ASSIGN = 'assign',
  REPARENT = 'reparent',
  MOVE = 'move',
  OVERRIDE = 'override',
  SUPERSEDED = 'superseded',
}
