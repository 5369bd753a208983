import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseUUIDPipe,
  Patch,
  Post,
  Query,
  Request,
  UseGuards,
} from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import {
  ApiBadRequestResponse,
  ApiBearerAuth,
  ApiConflictResponse,
  ApiCreatedResponse,
  ApiForbiddenResponse,
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiOperation,
  ApiTags,
  ApiUnauthorizedResponse,
} from '@nestjs/swagger';
import { Request as ExpressRequest } from 'express';
import { RolesGuard } from '../roles/roles.guard';
import { Roles } from '../roles/roles.decorator';
import { RoleEnum } from '../roles/roles.enum';
import { extractActorFromRequest } from '../auth/utils/actor-extractor.util';
import {
  InfinityPaginationResponse,
  InfinityPaginationResponseDto,
} from '../utils/dto/infinity-pagination-response.dto';
import { DocumentResponseDto } from '../documents/dto/document-response.dto';
import { FoldersService } from './folders.service';
import { CreateFolderDto } from './dto/create-folder.dto';
import { AssignStandardDto } from './dto/assign-standard.dto';
import { ReparentFolderDto } from './dto/reparent-folder.dto';
import { RenameFolderDto } from './dto/rename-folder.dto';
import { ListFolderDocumentsDto } from './dto/list-folder-documents.dto';
import {
  FolderDetailResponseDto,
  FolderMutationResponseDto,
  FolderResponseDto,
} from './dto/folder-response.dto';

@ApiTags('Folders')
@Controller({ path: 'folders', version: '1' })
@UseGuards(AuthGuard('jwt'), RolesGuard)
@ApiBearerAuth()
@ApiUnauthorizedResponse({ description: 'Invalid or expired access token' })
@ApiForbiddenResponse({ description: 'Role not allowed' })
export class FoldersController {
  constructor(private readonly foldersService: FoldersService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @Roles(RoleEnum.curator)
  @ApiOperation({ summary: 'Create a folder (or the root)' })
  @ApiCreatedResponse({ type: FolderResponseDto })
  @ApiBadRequestResponse({ description: 'A root folder already exists' })
  @ApiNotFoundResponse({ description: 'Parent not found' })
  create(
    @Body() dto: CreateFolderDto,
    @Request() req: ExpressRequest,
  ): Promise<FolderResponseDto> {
    return this.foldersService.createFolder(dto, extractActorFromRequest(req));
  }

  @Get(':id')
  @Roles(RoleEnum.reader)
  @ApiOperation({ summary: 'Folder with its effective Standard' })
  @ApiOkResponse({ type: FolderDetailResponseDto })
  @ApiNotFoundResponse({ description: 'Folder not found' })
  get(
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<FolderDetailResponseDto> {
    return this.foldersService.getFolder(id);
  }

  @Get(':id/children')
  @Roles(RoleEnum.reader)
  @ApiOperation({ summary: 'Direct child folders, by name' })
  @ApiOkResponse({ type: [FolderResponseDto] })
  @ApiNotFoundResponse({ description: 'Folder not found' })
  children(
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<FolderResponseDto[]> {
    return this.foldersService.listChildren(id);
  }

  @Get(':id/documents')
  @Roles(RoleEnum.reader)
  @ApiOperation({ summary: 'Documents filed directly in the folder' })
  @ApiOkResponse({ type: InfinityPaginationResponse(DocumentResponseDto) })
  @ApiNotFoundResponse({ description: 'Folder not found' })
  documents(
    @Param('id', ParseUUIDPipe) id: string,
    @Query() query: ListFolderDocumentsDto,
  ): Promise<InfinityPaginationResponseDto<DocumentResponseDto>> {
    return this.foldersService.listDocuments(id, query);
  }

  @Post(':id/assign')
  @HttpCode(HttpStatus.OK)
  @Roles(RoleEnum.curator)
  @ApiOperation({
    summary: 'Set, replace or clear the Standard of a folder',
    description:
      'Queues re-validation of every active document that inherits the ' +
      'assignment. Existing reports are kept.',
  })
  @ApiOkResponse({ type: FolderMutationResponseDto })
  @ApiNotFoundResponse({ description: 'Folder or Standard not found' })
  assign(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: AssignStandardDto,
    @Request() req: ExpressRequest,
  ): Promise<FolderMutationResponseDto> {
    return this.foldersService.assignStandard(
      id,
      dto.standardId,
      extractActorFromRequest(req),
    );
  }

  @Patch(':id')
  @Roles(RoleEnum.curator)
  @ApiOperation({ summary: 'Rename a folder' })
  @ApiOkResponse({ type: FolderResponseDto })
  @ApiNotFoundResponse({ description: 'Folder not found' })
  rename(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: RenameFolderDto,
    @Request() req: ExpressRequest,
  ): Promise<FolderResponseDto> {
    return this.foldersService.renameFolder(
      id,
      dto.name,
      extractActorFromRequest(req),
    );
  }

  @Patch(':id/parent')
  @Roles(RoleEnum.curator)
  @ApiOperation({ summary: 'Move a folder under another parent' })
  @ApiOkResponse({ type: FolderMutationResponseDto })
  @ApiBadRequestResponse({ description: 'The root cannot be moved' })
  @ApiNotFoundResponse({ description: 'Folder or parent not found' })
  @ApiConflictResponse({ description: 'The move would create a cycle' })
  reparent(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: ReparentFolderDto,
    @Request() req: ExpressRequest,
  ): Promise<FolderMutationResponseDto> {
    return this.foldersService.reparentFolder(
      id,
      dto.parentId,
      extractActorFromRequest(req),
    );
  }
}
