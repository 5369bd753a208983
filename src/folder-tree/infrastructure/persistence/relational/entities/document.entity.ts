import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';
import { EntityRelationalHelper } from '../../../../../utils/relational-entity-helper';
import { DocumentLifecycle } from '../../../../domain/enums/document-lifecycle.enum';
import { FolderEntity } from './folder.entity';

@Entity({ name: 'documents' })
export class DocumentEntity extends EntityRelationalHelper {
  @PrimaryGeneratedColumn('uuid')
  id: string;

  @ManyToOne(() => FolderEntity, { nullable: false, eager: false })
  @JoinColumn({ name: 'folder_id' })
  folder: FolderEntity;

  @Column({ name: 'folder_id', type: 'uuid' })
  @Index()
  folderId: string;

  @Column({ name: 'file_name', type: 'varchar', length: 255 })
  fileName: string;

  @Column({ name: 'mime_type', type: 'varchar', length: 100 })
  mimeType: string;

  @Column({ name: 'file_size', type: 'integer' })
  fileSize: number;

  @Column({ name: 'content_ref', type: 'varchar', length: 500 })
  contentRef: string;

  @Column({ name: 'content_hash', type: 'char', length: 64 })
  contentHash: string;

  @Column({ name: 'override_standard_id', type: 'uuid', nullable: true })
  overrideStandardId: string | null;

  @Column({ type: 'varchar', length: 20, default: DocumentLifecycle.ACTIVE })
  @Index()
  lifecycle: DocumentLifecycle;

  @Column({ name: 'uploaded_by', type: 'varchar', length: 255 })
  uploadedBy: string;

  @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
  createdAt: Date;

  @UpdateDateColumn({ name: 'updated_at', type: 'timestamptz' })
  updatedAt: Date;
}
