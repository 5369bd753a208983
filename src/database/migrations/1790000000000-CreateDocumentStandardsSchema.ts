import { MigrationInterface, QueryRunner } from 'typeorm';

export class CreateDocumentStandardsSchema1790000000000
  implements MigrationInterface
{
  name = 'CreateDocumentStandardsSchema1790000000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query('CREATE EXTENSION IF NOT EXISTS "uuid-ossp"');

    await queryRunner.query(`
      CREATE TABLE "folders" (
        "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
        "name" varchar(255) NOT NULL,
        "parent_id" uuid,
        "assigned_standard_id" uuid,
        "created_at" timestamptz NOT NULL DEFAULT now(),
        "updated_at" timestamptz NOT NULL DEFAULT now(),
        CONSTRAINT "PK_folders" PRIMARY KEY ("id"),
        CONSTRAINT "FK_folders_parent" FOREIGN KEY ("parent_id")
          REFERENCES "folders"("id") ON DELETE RESTRICT
      )
    `);
    await queryRunner.query(
      'CREATE INDEX "IDX_folders_parent_id" ON "folders" ("parent_id")',
    );
    // At most one folder without a parent
    await queryRunner.query(
      'CREATE UNIQUE INDEX "UQ_folders_single_root" ON "folders" ((parent_id IS NULL)) WHERE parent_id IS NULL',
    );

    await queryRunner.query(`
      CREATE TABLE "documents" (
        "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
        "folder_id" uuid NOT NULL,
        "file_name" varchar(255) NOT NULL,
        "mime_type" varchar(100) NOT NULL,
        "file_size" integer NOT NULL,
        "content_ref" varchar(500) NOT NULL,
        "content_hash" char(64) NOT NULL,
        "override_standard_id" uuid,
        "lifecycle" varchar(20) NOT NULL DEFAULT 'active',
        "uploaded_by" varchar(255) NOT NULL,
        "created_at" timestamptz NOT NULL DEFAULT now(),
        "updated_at" timestamptz NOT NULL DEFAULT now(),
        CONSTRAINT "PK_documents" PRIMARY KEY ("id"),
        CONSTRAINT "FK_documents_folder" FOREIGN KEY ("folder_id")
          REFERENCES "folders"("id") ON DELETE RESTRICT
      )
    `);
    await queryRunner.query(
      'CREATE INDEX "IDX_documents_folder_id" ON "documents" ("folder_id")',
    );
    await queryRunner.query(
      'CREATE INDEX "IDX_documents_lifecycle" ON "documents" ("lifecycle")',
    );

    await queryRunner.query(`
      CREATE TABLE "standards" (
        "id" uuid NOT NULL,
        "name" varchar(255) NOT NULL,
        "rules" jsonb NOT NULL,
        "version" integer NOT NULL,
        "lineage_id" uuid NOT NULL,
        "predecessor_id" uuid,
        "source_document_id" uuid NOT NULL,
        "source_content_ref" varchar(500) NOT NULL,
        "promoted_by" varchar(255) NOT NULL,
        "promoted_at" timestamptz NOT NULL,
        CONSTRAINT "PK_standards" PRIMARY KEY ("id"),
        CONSTRAINT "FK_standards_predecessor" FOREIGN KEY ("predecessor_id")
          REFERENCES "standards"("id") ON DELETE RESTRICT
      )
    `);
    await queryRunner.query(
      'CREATE UNIQUE INDEX "UQ_standards_lineage_version" ON "standards" ("lineage_id", "version")',
    );
    await queryRunner.query(
      'CREATE INDEX "IDX_standards_source_document_id" ON "standards" ("source_document_id")',
    );

    await queryRunner.query(`
      CREATE TABLE "validation_jobs" (
        "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
        "document_id" uuid NOT NULL,
        "content_ref" varchar(500) NOT NULL,
        "standard_id" uuid,
        "standard_version" integer,
        "state" varchar(20) NOT NULL,
        "trigger" varchar(20) NOT NULL,
        "attempts" integer NOT NULL DEFAULT 0,
        "max_attempts" integer NOT NULL,
        "enqueued_at" timestamptz NOT NULL DEFAULT now(),
        "available_at" timestamptz NOT NULL,
        "started_at" timestamptz,
        "finished_at" timestamptz,
        "claimed_by" varchar(100),
        "claim_expires_at" timestamptz,
        "last_error" text,
        "requires_intervention" boolean NOT NULL DEFAULT false,
        CONSTRAINT "PK_validation_jobs" PRIMARY KEY ("id"),
        CONSTRAINT "FK_validation_jobs_document" FOREIGN KEY ("document_id")
          REFERENCES "documents"("id") ON DELETE CASCADE
      )
    `);
    await queryRunner.query(
      'CREATE INDEX "IDX_validation_jobs_state_available_at" ON "validation_jobs" ("state", "available_at")',
    );
    await queryRunner.query(
      'CREATE INDEX "IDX_validation_jobs_document_enqueued_at" ON "validation_jobs" ("document_id", "enqueued_at")',
    );

    await queryRunner.query(`
      CREATE TABLE "compliance_reports" (
        "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
        "job_id" uuid NOT NULL,
        "document_id" uuid NOT NULL,
        "standard_id" uuid NOT NULL,
        "standard_version" integer NOT NULL,
        "findings" jsonb NOT NULL,
        "verdict" varchar(30) NOT NULL,
        "generated_at" timestamptz NOT NULL,
        CONSTRAINT "PK_compliance_reports" PRIMARY KEY ("id"),
        CONSTRAINT "UQ_compliance_reports_job_id" UNIQUE ("job_id"),
        CONSTRAINT "FK_compliance_reports_job" FOREIGN KEY ("job_id")
          REFERENCES "validation_jobs"("id") ON DELETE CASCADE,
        CONSTRAINT "FK_compliance_reports_standard" FOREIGN KEY ("standard_id")
          REFERENCES "standards"("id") ON DELETE RESTRICT
      )
    `);
    await queryRunner.query(
      'CREATE INDEX "IDX_compliance_reports_document_generated_at" ON "compliance_reports" ("document_id", "generated_at")',
    );

    await queryRunner.query(`
      CREATE TABLE "audit_events" (
        "id" BIGSERIAL NOT NULL,
        "kind" varchar(40) NOT NULL,
        "actor_subject" varchar(255) NOT NULL,
        "entity_type" varchar(40) NOT NULL,
        "entity_id" varchar(64) NOT NULL,
        "occurred_at" timestamptz NOT NULL DEFAULT now(),
        "payload" jsonb NOT NULL DEFAULT '{}',
        CONSTRAINT "PK_audit_events" PRIMARY KEY ("id")
      )
    `);
    await queryRunner.query(
      'CREATE INDEX "IDX_audit_events_entity" ON "audit_events" ("entity_type", "entity_id", "id")',
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query('DROP TABLE "audit_events"');
    await queryRunner.query('DROP TABLE "compliance_reports"');
    await queryRunner.query('DROP TABLE "validation_jobs"');
    await queryRunner.query('DROP TABLE "standards"');
    await queryRunner.query('DROP TABLE "documents"');
    await queryRunner.query('DROP TABLE "folders"');
  }
}
