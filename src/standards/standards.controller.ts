import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseUUIDPipe,
  Post,
  Query,
  Request,
  UseGuards,
} from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import {
  ApiBearerAuth,
  ApiConflictResponse,
  ApiCreatedResponse,
  ApiForbiddenResponse,
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiOperation,
  ApiTags,
  ApiUnauthorizedResponse,
  ApiUnprocessableEntityResponse,
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
import { StandardsService } from './standards.service';
import { PromoteStandardDto } from './dto/promote-standard.dto';
import { ListStandardsDto } from './dto/list-standards.dto';
import { StandardResponseDto } from './dto/standard-response.dto';

@ApiTags('Standards')
@Controller({ path: 'standards', version: '1' })
@UseGuards(AuthGuard('jwt'), RolesGuard)
@ApiBearerAuth()
@ApiUnauthorizedResponse({ description: 'Invalid or expired access token' })
@ApiForbiddenResponse({ description: 'Role not allowed' })
export class StandardsController {
  constructor(private readonly standardsService: StandardsService) {}

  @Post('promote')
  @HttpCode(HttpStatus.CREATED)
  @Roles(RoleEnum.curator)
  @ApiOperation({
    summary: 'Promote a golden document to a Standard',
    description:
      'Derives the rule set from the structure of the document. With ' +
      'predecessorStandardId the result is the next version of that lineage.',
  })
  @ApiCreatedResponse({ type: StandardResponseDto })
  @ApiNotFoundResponse({ description: 'Document or predecessor not found' })
  @ApiConflictResponse({
    description: 'Predecessor is not the head of its lineage',
  })
  @ApiUnprocessableEntityResponse({
    description: 'Document cannot be parsed or embeds macros',
  })
  promote(
    @Body() dto: PromoteStandardDto,
    @Request() req: ExpressRequest,
  ): Promise<StandardResponseDto> {
    return this.standardsService.promote(dto, extractActorFromRequest(req));
  }

  @Get()
  @Roles(RoleEnum.reader)
  @ApiOperation({ summary: 'List Standards, most recently promoted first' })
  @ApiOkResponse({ type: InfinityPaginationResponse(StandardResponseDto) })
  list(
    @Query() query: ListStandardsDto,
  ): Promise<InfinityPaginationResponseDto<StandardResponseDto>> {
    return this.standardsService.listStandards(query);
  }

  @Get(':id')
  @Roles(RoleEnum.reader)
  @ApiOperation({ summary: 'Get a Standard with its rules' })
  @ApiOkResponse({ type: StandardResponseDto })
  @ApiNotFoundResponse({ description: 'Standard not found' })
  get(
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<StandardResponseDto> {
    return this.standardsService.getStandard(id);
  }

  @Get(':id/lineage')
  @Roles(RoleEnum.reader)
  @ApiOperation({ summary: 'All versions of the Standard, oldest first' })
  @ApiOkResponse({ type: [StandardResponseDto] })
  @ApiNotFoundResponse({ description: 'Standard not found' })
  lineage(
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<StandardResponseDto[]> {
    return this.standardsService.getLineage(id);
  }
}
