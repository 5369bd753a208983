import { Controller, Get, Query, UseGuards } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import {
  ApiBadRequestResponse,
  ApiBearerAuth,
  ApiForbiddenResponse,
  ApiOkResponse,
  ApiOperation,
  ApiTags,
  ApiUnauthorizedResponse,
} from '@nestjs/swagger';
import { plainToClass } from 'class-transformer';
import { RolesGuard } from '../roles/roles.guard';
import { Roles } from '../roles/roles.decorator';
import { RoleEnum } from '../roles/roles.enum';
import { AuditService } from './audit.service';
import { ListAuditEventsDto } from './dto/list-audit-events.dto';
import {
  AuditEventPageResponseDto,
  AuditEventResponseDto,
} from './dto/audit-event-response.dto';
import { infinityPagination } from '../utils/infinity-pagination';

@ApiTags('Audit')
@Controller({ path: 'audit', version: '1' })
@UseGuards(AuthGuard('jwt'), RolesGuard)
@ApiBearerAuth()
export class AuditController {
  constructor(private readonly auditService: AuditService) {}

  @Get()
  @Roles(RoleEnum.reader)
  @ApiOperation({
    summary: 'Page through the audit ledger',
    description:
      'Events in id order, optionally restricted to one entity. ' +
      'Use nextSinceId from a response as sinceId of the next request.',
  })
  @ApiOkResponse({ type: AuditEventPageResponseDto })
  @ApiUnauthorizedResponse({ description: 'Invalid or expired access token' })
  @ApiForbiddenResponse({ description: 'Role not allowed' })
  @ApiBadRequestResponse({ description: 'Invalid query parameters' })
  async listEvents(
    @Query() query: ListAuditEventsDto,
  ): Promise<AuditEventPageResponseDto> {
    const limit = query.limit ?? 100;
    const events = await this.auditService.findPage(
      { entityType: query.entityType, entityId: query.entityId },
      query.sinceId ?? 0,
      limit + 1,
    );

    const page = infinityPagination(events, { page: 1, limit });
    const last = page.data[page.data.length - 1];
    return {
      data: page.data.map((event) =>
        plainToClass(AuditEventResponseDto, event, {
          excludeExtraneousValues: true,
        }),
      ),
      hasNextPage: page.hasNextPage,
      nextSinceId: last ? last.id : null,
    };
  }
}
