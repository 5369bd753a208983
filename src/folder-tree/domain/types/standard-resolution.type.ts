export type StandardResolution =
  | { status: 'resolved'; standardId: string; source: 'override' }
  | {
      status: 'resolved';
      standardId: string;
      source: 'folder';
      folderId: string;
    }
  | { status: 'not-found' };

export type ResolvedStandard = Extract<
  StandardResolution,
  { status: 'resolved' }
>;
