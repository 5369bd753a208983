import { Column, Entity, Index, PrimaryColumn } from 'typeorm';
import { EntityRelationalHelper } from '../../../../../utils/relational-entity-helper';
import { Rule } from '../../../../../compliance/domain/types/rule.type';

@Entity({ name: 'standards' })
@Index(['lineageId', 'version'], { unique: true })
export class StandardEntity extends EntityRelationalHelper {
  // Assigned by the registry: version 1 uses its own id as lineage id
  @PrimaryColumn('uuid')
  id: string;

  @Column({ type: 'varchar', length: 255 })
  name: string;

  @Column({ type: 'jsonb' })
  rules: Rule[];

  @Column({ type: 'integer' })
  version: number;

  @Column({ name: 'lineage_id', type: 'uuid' })
  lineageId: string;

  @Column({ name: 'predecessor_id', type: 'uuid', nullable: true })
  predecessorId: string | null;

  @Column({ name: 'source_document_id', type: 'uuid' })
  @Index()
  sourceDocumentId: string;

  @Column({ name: 'source_content_ref', type: 'varchar', length: 500 })
  sourceContentRef: string;

  @Column({ name: 'promoted_by', type: 'varchar', length: 255 })
  promotedBy: string;

  @Column({ name: 'promoted_at', type: 'timestamptz' })
  promotedAt: Date;
}
