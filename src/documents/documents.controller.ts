import {
  BadRequestException,
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseUUIDPipe,
  Patch,
  Post,
  Put,
  Request,
  StreamableFile,
  UploadedFile,
  UseGuards,
  UseInterceptors,
} from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import { FileInterceptor } from '@nestjs/platform-express';
import { Throttle } from '@nestjs/throttler';
import {
  ApiBadRequestResponse,
  ApiBearerAuth,
  ApiBody,
  ApiConsumes,
  ApiCreatedResponse,
  ApiForbiddenResponse,
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiOperation,
  ApiPayloadTooLargeResponse,
  ApiTags,
  ApiTooManyRequestsResponse,
  ApiUnauthorizedResponse,
} from '@nestjs/swagger';
import { Request as ExpressRequest } from 'express';
import { RolesGuard } from '../roles/roles.guard';
import { Roles } from '../roles/roles.decorator';
import { RoleEnum } from '../roles/roles.enum';
import { extractActorFromRequest } from '../auth/utils/actor-extractor.util';
import { DocumentsService } from './documents.service';
import {
  ACCEPTED_DOCUMENT_MIME_TYPES,
  UPLOAD_HARD_LIMIT_BYTES,
} from './documents.constants';
import { UploadDocumentDto } from './dto/upload-document.dto';
import { MoveDocumentDto } from './dto/move-document.dto';
import { RenameDocumentDto } from './dto/rename-document.dto';
import { SetOverrideDto } from './dto/set-override.dto';
import { DocumentResponseDto } from './dto/document-response.dto';
import { DocumentUploadResponseDto } from './dto/document-upload-response.dto';
import { StandardResolutionResponseDto } from './dto/standard-resolution-response.dto';
import { UploadedDocumentFile } from './dto/uploaded-document-file';

const documentFileInterceptor = FileInterceptor('file', {
  limits: { fileSize: UPLOAD_HARD_LIMIT_BYTES, files: 1 },
  fileFilter: (_req, file, callback) => {
    if (!ACCEPTED_DOCUMENT_MIME_TYPES.includes(file.mimetype)) {
      return callback(
        new BadRequestException(
          `Invalid file type. Allowed types: ${ACCEPTED_DOCUMENT_MIME_TYPES.join(', ')}`,
        ),
        false,
      );
    }
    callback(null, true);
  },
});

function requireFile(
  file: UploadedDocumentFile | undefined,
): UploadedDocumentFile {
  if (!file) {
    throw new BadRequestException('File is required');
  }
  return file;
}

@ApiTags('Documents')
@Controller({ path: 'documents', version: '1' })
@UseGuards(AuthGuard('jwt'), RolesGuard)
@ApiBearerAuth()
@ApiUnauthorizedResponse({ description: 'Invalid or expired access token' })
@ApiForbiddenResponse({ description: 'Role not allowed' })
export class DocumentsController {
  constructor(private readonly documentsService: DocumentsService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @Roles(RoleEnum.author)
  @Throttle({ default: { limit: 10, ttl: 60000 } }) // 10 uploads per minute
  @ApiOperation({
    summary: 'Upload a document into a folder',
    description: 'Stores the content and queues its validation.',
  })
  @ApiConsumes('multipart/form-data')
  @ApiBody({
    schema: {
      type: 'object',
      properties: {
        folderId: { type: 'string', format: 'uuid' },
        file: { type: 'string', format: 'binary' },
      },
      required: ['folderId', 'file'],
    },
  })
  @ApiCreatedResponse({ type: DocumentUploadResponseDto })
  @ApiBadRequestResponse({ description: 'Missing, empty or unsupported file' })
  @ApiNotFoundResponse({ description: 'Folder not found' })
  @ApiPayloadTooLargeResponse({ description: 'File exceeds the size limit' })
  @ApiTooManyRequestsResponse({ description: 'Too many uploads' })
  @UseInterceptors(documentFileInterceptor)
  upload(
    @Body() dto: UploadDocumentDto,
    @UploadedFile() file: UploadedDocumentFile | undefined,
    @Request() req: ExpressRequest,
  ): Promise<DocumentUploadResponseDto> {
    return this.documentsService.upload(
      dto.folderId,
      requireFile(file),
      extractActorFromRequest(req),
    );
  }

  @Put(':id/content')
  @Roles(RoleEnum.author)
  @Throttle({ default: { limit: 10, ttl: 60000 } })
  @ApiOperation({
    summary: 'Upload a new revision',
    description: 'Replaces the current content and queues its validation.',
  })
  @ApiConsumes('multipart/form-data')
  @ApiBody({
    schema: {
      type: 'object',
      properties: { file: { type: 'string', format: 'binary' } },
      required: ['file'],
    },
  })
  @ApiOkResponse({ type: DocumentUploadResponseDto })
  @ApiBadRequestResponse({ description: 'Missing file or archived document' })
  @ApiNotFoundResponse({ description: 'Document not found' })
  @ApiPayloadTooLargeResponse({ description: 'File exceeds the size limit' })
  @UseInterceptors(documentFileInterceptor)
  replaceContent(
    @Param('id', ParseUUIDPipe) id: string,
    @UploadedFile() file: UploadedDocumentFile | undefined,
    @Request() req: ExpressRequest,
  ): Promise<DocumentUploadResponseDto> {
    return this.documentsService.replaceContent(
      id,
      requireFile(file),
      extractActorFromRequest(req),
    );
  }

  @Get(':id')
  @Roles(RoleEnum.reader)
  @ApiOperation({ summary: 'Document metadata' })
  @ApiOkResponse({ type: DocumentResponseDto })
  @ApiNotFoundResponse({ description: 'Document not found' })
  get(@Param('id', ParseUUIDPipe) id: string): Promise<DocumentResponseDto> {
    return this.documentsService.getDocument(id);
  }

  @Get(':id/content')
  @Roles(RoleEnum.reader)
  @ApiOperation({ summary: 'Download the current content' })
  @ApiOkResponse({
    description: 'The stored bytes of the current revision',
    schema: { type: 'string', format: 'binary' },
  })
  @ApiNotFoundResponse({ description: 'Document or its content not found' })
  async content(
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<StreamableFile> {
    const download = await this.documentsService.getContent(id);
    return new StreamableFile(download.content, {
      type: download.mimeType,
      length: download.content.length,
      disposition: `attachment; filename*=UTF-8''${encodeURIComponent(download.fileName)}`,
    });
  }

  @Patch(':id')
  @Roles(RoleEnum.author)
  @ApiOperation({ summary: 'Rename the document' })
  @ApiOkResponse({ type: DocumentResponseDto })
  @ApiNotFoundResponse({ description: 'Document not found' })
  rename(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: RenameDocumentDto,
    @Request() req: ExpressRequest,
  ): Promise<DocumentResponseDto> {
    return this.documentsService.renameDocument(
      id,
      dto.fileName,
      extractActorFromRequest(req),
    );
  }

  @Get(':id/standard')
  @Roles(RoleEnum.reader)
  @ApiOperation({ summary: 'Standard that currently governs the document' })
  @ApiOkResponse({ type: StandardResolutionResponseDto })
  @ApiNotFoundResponse({ description: 'Document not found' })
  standard(
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<StandardResolutionResponseDto> {
    return this.documentsService.resolveStandard(id);
  }

  @Post(':id/override')
  @HttpCode(HttpStatus.OK)
  @Roles(RoleEnum.curator)
  @ApiOperation({
    summary: 'Set or clear the per-document Standard override',
    description: 'Queues re-validation when the override changes.',
  })
  @ApiOkResponse({ type: DocumentResponseDto })
  @ApiNotFoundResponse({ description: 'Document or Standard not found' })
  override(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: SetOverrideDto,
    @Request() req: ExpressRequest,
  ): Promise<DocumentResponseDto> {
    return this.documentsService.setOverride(
      id,
      dto.standardId,
      extractActorFromRequest(req),
    );
  }

  @Post(':id/move')
  @HttpCode(HttpStatus.OK)
  @Roles(RoleEnum.author)
  @ApiOperation({ summary: 'Move the document to another folder' })
  @ApiOkResponse({ type: DocumentResponseDto })
  @ApiNotFoundResponse({ description: 'Document or folder not found' })
  move(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: MoveDocumentDto,
    @Request() req: ExpressRequest,
  ): Promise<DocumentResponseDto> {
    return this.documentsService.moveDocument(
      id,
      dto.folderId,
      extractActorFromRequest(req),
    );
  }

  @Post(':id/archive')
  @HttpCode(HttpStatus.OK)
  @Roles(RoleEnum.author)
  @ApiOperation({
    summary: 'Archive the document',
    description: 'Archived documents are no longer validated.',
  })
  @ApiOkResponse({ type: DocumentResponseDto })
  @ApiNotFoundResponse({ description: 'Document not found' })
  archive(
    @Param('id', ParseUUIDPipe) id: string,
    @Request() req: ExpressRequest,
  ): Promise<DocumentResponseDto> {
    return this.documentsService.archiveDocument(
      id,
      extractActorFromRequest(req),
    );
  }
}
