import { Rule } from '../../../compliance/domain/types/rule.type';

/**
 * An immutable, versioned rule set promoted from a golden document.
 *
 * Versions of one Standard form a lineage: `lineageId` is the id of version
 * 1 and each later version points at its predecessor. A new version is a
 * new row; existing rows are never edited.
 */
export class Standard {
  id: string;
  name: string;
  rules: Rule[];
  version: number;
  lineageId: string;
  predecessorId: string | null;
  sourceDocumentId: string;
  sourceContentRef: string;
  promotedBy: string;
  promotedAt: Date;
}
