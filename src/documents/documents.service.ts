import {
  BadRequestException,
  Injectable,
  Logger,
  PayloadTooLargeException,
} from '@nestjs/common';
import { plainToClass } from 'class-transformer';
import { Actor } from '../auth/types/actor.type';
import { BlobStorePort } from '../blob-storage/domain/blob-store.port';
import { ComplianceEvaluatorService } from '../compliance/compliance-evaluator.service';
import {
  Document,
  DocumentContent,
} from '../folder-tree/domain/entities/document.entity';
import { FolderTreeDomainService } from '../folder-tree/domain/services/folder-tree.domain.service';
import { StandardResolverDomainService } from '../folder-tree/domain/services/standard-resolver.domain.service';
import { StandardRegistryDomainService } from '../standards/domain/services/standard-registry.domain.service';
import { ValidationJob } from '../validation/domain/entities/validation-job.entity';
import { ValidationTrigger } from '../validation/domain/enums/validation-trigger.enum';
import { ValidationOrchestratorDomainService } from '../validation/domain/services/validation-orchestrator.domain.service';
import { ValidationService } from '../validation/validation.service';
import { DocumentResponseDto } from './dto/document-response.dto';
import { DocumentUploadResponseDto } from './dto/document-upload-response.dto';
import { StandardResolutionResponseDto } from './dto/standard-resolution-response.dto';
import { UploadedDocumentFile } from './dto/uploaded-document-file';

export interface DocumentContentDownload {
  fileName: string;
  mimeType: string;
  content: Buffer;
}

/**
 * Application layer for documents: stores uploaded bytes, applies the
 * folder-tree mutation and queues validation for whatever it affected.
 */
@Injectable()
export class DocumentsService {
  private readonly logger = new Logger(DocumentsService.name);

  constructor(
    private readonly folderTree: FolderTreeDomainService,
    private readonly resolver: StandardResolverDomainService,
    private readonly registry: StandardRegistryDomainService,
    private readonly orchestrator: ValidationOrchestratorDomainService,
    private readonly validationService: ValidationService,
    private readonly blobStore: BlobStorePort,
    private readonly compliance: ComplianceEvaluatorService,
  ) {}

  async upload(
    folderId: string,
    file: UploadedDocumentFile,
    actor: Actor,
  ): Promise<DocumentUploadResponseDto> {
    await this.folderTree.getFolder(folderId);
    const content = await this.storeContent(file, actor);

    const document = await this.folderTree.addDocument(
      folderId,
      content,
      actor,
    );
    const job = await this.orchestrator.enqueue(
      document.id,
      ValidationTrigger.UPLOAD,
    );

    this.logger.log(
      `[UPLOAD] document ${document.id} in folder ${folderId} by ${actor.subject}, ` +
        `${content.fileSize} bytes, job ${job?.id ?? '(none)'}`,
    );
    return this.toUploadResponse(document, job);
  }

  async replaceContent(
    documentId: string,
    file: UploadedDocumentFile,
    actor: Actor,
  ): Promise<DocumentUploadResponseDto> {
    await this.folderTree.getDocument(documentId);
    const content = await this.storeContent(file, actor);

    const document = await this.folderTree.replaceContent(
      documentId,
      content,
      actor,
    );
    const job = await this.orchestrator.enqueue(
      document.id,
      ValidationTrigger.REVISION,
    );

    this.logger.log(
      `[REVISION] document ${document.id} by ${actor.subject}, job ${job?.id ?? '(none)'}`,
    );
    return this.toUploadResponse(document, job);
  }

  async getDocument(documentId: string): Promise<DocumentResponseDto> {
    return this.toResponseDto(await this.folderTree.getDocument(documentId));
  }

  async getContent(documentId: string): Promise<DocumentContentDownload> {
    const document = await this.folderTree.getDocument(documentId);
    return {
      fileName: document.fileName,
      mimeType: document.mimeType,
      content: await this.blobStore.get(document.contentRef),
    };
  }

  async renameDocument(
    documentId: string,
    fileName: string,
    actor: Actor,
  ): Promise<DocumentResponseDto> {
    return this.toResponseDto(
      await this.folderTree.renameDocument(documentId, fileName, actor),
    );
  }

  async setOverride(
    documentId: string,
    standardId: string | null,
    actor: Actor,
  ): Promise<DocumentResponseDto> {
    if (standardId !== null) {
      await this.registry.getStandard(standardId);
    }
    const mutation = await this.folderTree.setOverride(
      documentId,
      standardId,
      actor,
    );
    await this.orchestrator.enqueueMany(
      mutation.affectedDocumentIds,
      ValidationTrigger.OVERRIDE,
    );
    return this.toResponseDto(mutation.result);
  }

  async moveDocument(
    documentId: string,
    folderId: string,
    actor: Actor,
  ): Promise<DocumentResponseDto> {
    const mutation = await this.folderTree.moveDocument(
      documentId,
      folderId,
      actor,
    );
    await this.orchestrator.enqueueMany(
      mutation.affectedDocumentIds,
      ValidationTrigger.MOVE,
    );
    return this.toResponseDto(mutation.result);
  }

  async archiveDocument(
    documentId: string,
    actor: Actor,
  ): Promise<DocumentResponseDto> {
    return this.toResponseDto(
      await this.folderTree.archiveDocument(documentId, actor),
    );
  }

  async resolveStandard(
    documentId: string,
  ): Promise<StandardResolutionResponseDto> {
    return StandardResolutionResponseDto.fromResolution(
      await this.resolver.resolveStandard(documentId),
    );
  }

  toResponseDto(document: Document): DocumentResponseDto {
    return plainToClass(DocumentResponseDto, document, {
      excludeExtraneousValues: true,
    });
  }

  private async storeContent(
    file: UploadedDocumentFile,
    actor: Actor,
  ): Promise<DocumentContent> {
    if (file.size === 0) {
      throw new BadRequestException('Uploaded file is empty');
    }
    if (file.size > this.compliance.maxDocumentBytes) {
      throw new PayloadTooLargeException(
        `Documents are limited to ${this.compliance.maxDocumentBytes} bytes`,
      );
    }

    const stored = await this.blobStore.put(file.buffer, {
      contentType: file.mimetype,
      uploadedBy: actor.subject,
    });
    return {
      fileName: file.originalname,
      mimeType: file.mimetype,
      fileSize: stored.size,
      contentRef: stored.key,
      contentHash: stored.sha256,
    };
  }

  private toUploadResponse(
    document: Document,
    job: ValidationJob | null,
  ): DocumentUploadResponseDto {
    return {
      document: this.toResponseDto(document),
      job: job ? this.validationService.toJobDto(job) : null,
    };
  }
}
