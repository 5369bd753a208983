import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { AuditService } from '../../../audit/audit.service';
import { AuditEventKind } from '../../../audit/domain/enums/audit-event-kind.enum';
import { AuditEntityType } from '../../../audit/domain/enums/audit-entity-type.enum';
import { Actor } from '../../../auth/types/actor.type';
import { BlobStorePort } from '../../../blob-storage/domain/blob-store.port';
import { ComplianceEvaluatorService } from '../../../compliance/compliance-evaluator.service';
import { DocumentRepository } from '../../../folder-tree/domain/repositories/document.repository.port';
import {
  InvalidSourceDocumentError,
  LineageConflictError,
} from '../../../utils/errors/domain-errors';
import { KeyedMutex } from '../../../utils/keyed-mutex';
import { IPaginationOptions } from '../../../utils/types/pagination-options';
import { Standard } from '../entities/standard.entity';
import { StandardRepository } from '../repositories/standard.repository.port';

export type PromoteOptions = {
  name?: string;
  // Current head of the lineage the new version continues
  predecessorStandardId?: string;
};

function baseName(fileName: string): string {
  const dot = fileName.lastIndexOf('.');
  return dot > 0 ? fileName.slice(0, dot) : fileName;
}

/**
 * Registry of immutable Standards.
 *
 * Promotion derives a rule set from the structure of a golden document
 * using the same parser the evaluator runs. It never schedules validation:
 * a Standard only takes effect once it is assigned to a folder or document.
 */
@Injectable()
export class StandardRegistryDomainService {
  private readonly logger = new Logger(StandardRegistryDomainService.name);
  private readonly mutex = new KeyedMutex();

  constructor(
    private readonly standardRepository: StandardRepository,
    private readonly documentRepository: DocumentRepository,
    private readonly blobStore: BlobStorePort,
    private readonly compliance: ComplianceEvaluatorService,
    private readonly auditService: AuditService,
  ) {}

  async promote(
    documentId: string,
    actor: Actor,
    options: PromoteOptions = {},
  ): Promise<Standard> {
    return this.mutex.runExclusive(`promote:${documentId}`, async () => {
      const document = await this.documentRepository.findById(documentId);
      if (!document) {
        throw new NotFoundException(`Document ${documentId} not found`);
      }

      let predecessor: Standard | null = null;
      if (options.predecessorStandardId) {
        predecessor = await this.getStandard(options.predecessorStandardId);
        const head = await this.standardRepository.findHead(
          predecessor.lineageId,
        );
        if (head && head.id !== predecessor.id) {
          throw new LineageConflictError(predecessor.id, head.id);
        }
      }

      const bytes = await this.blobStore.get(document.contentRef);
      const parsed = this.compliance.parse(bytes);
      if (!parsed.ok) {
        throw new InvalidSourceDocumentError(documentId, parsed.reason);
      }
      if (parsed.profile.hasMacros) {
        throw new InvalidSourceDocumentError(
          documentId,
          'golden documents must not embed macros',
        );
      }

      const id = randomUUID();
      const standard = await this.standardRepository.create({
        id,
        name: options.name ?? predecessor?.name ?? baseName(document.fileName),
        rules: this.compliance.deriveRules(parsed.profile),
        version: predecessor ? predecessor.version + 1 : 1,
        lineageId: predecessor ? predecessor.lineageId : id,
        predecessorId: predecessor ? predecessor.id : null,
        sourceDocumentId: document.id,
        sourceContentRef: document.contentRef,
        promotedBy: actor.subject,
        promotedAt: new Date(),
      });

      await this.auditService.append({
        kind: AuditEventKind.PROMOTE,
        actorSubject: actor.subject,
        entityType: AuditEntityType.STANDARD,
        entityId: standard.id,
        payload: {
          documentId: document.id,
          contentRef: document.contentRef,
          lineageId: standard.lineageId,
          version: standard.version,
          predecessorId: standard.predecessorId,
          ruleCount: standard.rules.length,
        },
      });

      this.logger.log(
        `[PROMOTE] ${standard.id} v${standard.version} from document ${document.id} ` +
          `(${standard.rules.length} rules)`,
      );
      return standard;
    });
  }

  async getStandard(standardId: string): Promise<Standard> {
    const standard = await this.standardRepository.findById(standardId);
    if (!standard) {
      throw new NotFoundException(`Standard ${standardId} not found`);
    }
    return standard;
  }

  listStandards(pagination: IPaginationOptions): Promise<Standard[]> {
    return this.standardRepository.findPage(pagination);
  }

  async getLineage(standardId: string): Promise<Standard[]> {
    const standard = await this.getStandard(standardId);
    return this.standardRepository.findLineage(standard.lineageId);
  }
}
