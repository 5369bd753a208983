import { Injectable } from '@nestjs/common';
import { plainToClass } from 'class-transformer';
import { Actor } from '../auth/types/actor.type';
import { DocumentsService } from '../documents/documents.service';
import { DocumentResponseDto } from '../documents/dto/document-response.dto';
import { StandardResolutionResponseDto } from '../documents/dto/standard-resolution-response.dto';
import { Folder } from '../folder-tree/domain/entities/folder.entity';
import { FolderTreeDomainService } from '../folder-tree/domain/services/folder-tree.domain.service';
import { StandardResolverDomainService } from '../folder-tree/domain/services/standard-resolver.domain.service';
import { TreeMutation } from '../folder-tree/domain/types/tree-mutation.type';
import { StandardRegistryDomainService } from '../standards/domain/services/standard-registry.domain.service';
import { InfinityPaginationResponseDto } from '../utils/dto/infinity-pagination-response.dto';
import { infinityPagination } from '../utils/infinity-pagination';
import { ValidationTrigger } from '../validation/domain/enums/validation-trigger.enum';
import { ValidationOrchestratorDomainService } from '../validation/domain/services/validation-orchestrator.domain.service';
import { CreateFolderDto } from './dto/create-folder.dto';
import {
  FolderDetailResponseDto,
  FolderMutationResponseDto,
  FolderResponseDto,
} from './dto/folder-response.dto';
import { ListFolderDocumentsDto } from './dto/list-folder-documents.dto';

@Injectable()
export class FoldersService {
  constructor(
    private readonly folderTree: FolderTreeDomainService,
    private readonly resolver: StandardResolverDomainService,
    private readonly registry: StandardRegistryDomainService,
    private readonly orchestrator: ValidationOrchestratorDomainService,
    private readonly documentsService: DocumentsService,
  ) {}

  async createFolder(
    dto: CreateFolderDto,
    actor: Actor,
  ): Promise<FolderResponseDto> {
    return this.toResponseDto(
      await this.folderTree.createFolder(dto.name, dto.parentId, actor),
    );
  }

  async renameFolder(
    folderId: string,
    name: string,
    actor: Actor,
  ): Promise<FolderResponseDto> {
    return this.toResponseDto(
      await this.folderTree.renameFolder(folderId, name, actor),
    );
  }

  async getFolder(folderId: string): Promise<FolderDetailResponseDto> {
    const folder = await this.folderTree.getFolder(folderId);
    const resolution = await this.resolver.resolveForFolder(folderId);
    return {
      ...this.toResponseDto(folder),
      effectiveStandard:
        StandardResolutionResponseDto.fromResolution(resolution),
    };
  }

  async listChildren(folderId: string): Promise<FolderResponseDto[]> {
    const children = await this.folderTree.listChildren(folderId);
    return children.map((folder) => this.toResponseDto(folder));
  }

  async listDocuments(
    folderId: string,
    query: ListFolderDocumentsDto,
  ): Promise<InfinityPaginationResponseDto<DocumentResponseDto>> {
    const pagination = { page: query.page ?? 1, limit: query.limit ?? 50 };
    const page = infinityPagination(
      await this.folderTree.listDocuments(folderId, pagination),
      pagination,
    );
    return {
      data: page.data.map((document) =>
        this.documentsService.toResponseDto(document),
      ),
      hasNextPage: page.hasNextPage,
    };
  }

  async assignStandard(
    folderId: string,
    standardId: string | null,
    actor: Actor,
  ): Promise<FolderMutationResponseDto> {
    if (standardId !== null) {
      await this.registry.getStandard(standardId);
    }
    const mutation = await this.folderTree.assignStandard(
      folderId,
      standardId,
      actor,
    );
    return this.revalidate(mutation, ValidationTrigger.ASSIGN);
  }

  async reparentFolder(
    folderId: string,
    parentId: string,
    actor: Actor,
  ): Promise<FolderMutationResponseDto> {
    const mutation = await this.folderTree.reparentFolder(
      folderId,
      parentId,
      actor,
    );
    return this.revalidate(mutation, ValidationTrigger.REPARENT);
  }

  private async revalidate(
    mutation: TreeMutation<Folder>,
    trigger: ValidationTrigger,
  ): Promise<FolderMutationResponseDto> {
    const jobs = await this.orchestrator.enqueueMany(
      mutation.affectedDocumentIds,
      trigger,
    );
    return {
      folder: this.toResponseDto(mutation.result),
      revalidatedDocuments: jobs.length,
    };
  }

  private toResponseDto(folder: Folder): FolderResponseDto {
    return plainToClass(FolderResponseDto, folder, {
      excludeExtraneousValues: true,
    });
  }
}
