import {
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseUUIDPipe,
  Post,
  Query,
  UseGuards,
} from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import {
  ApiAcceptedResponse,
  ApiBearerAuth,
  ApiForbiddenResponse,
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiOperation,
  ApiTags,
  ApiUnauthorizedResponse,
} from '@nestjs/swagger';
import { RolesGuard } from '../roles/roles.guard';
import { Roles } from '../roles/roles.decorator';
import { RoleEnum } from '../roles/roles.enum';
import {
  InfinityPaginationResponse,
  InfinityPaginationResponseDto,
} from '../utils/dto/infinity-pagination-response.dto';
import { ValidationService } from './validation.service';
import { ComplianceReportResponseDto } from './dto/compliance-report-response.dto';
import { CurrentReportResponseDto } from './dto/current-report-response.dto';
import { ListValidationHistoryDto } from './dto/list-validation-history.dto';
import { ValidationJobResponseDto } from './dto/validation-job-response.dto';

/**
 * Validation state of a single document: reports, jobs and manual
 * re-validation.
 */
@ApiTags('Validation')
@Controller({ path: 'documents', version: '1' })
@UseGuards(AuthGuard('jwt'), RolesGuard)
@ApiBearerAuth()
@ApiUnauthorizedResponse({ description: 'Invalid or expired access token' })
@ApiForbiddenResponse({ description: 'Role not allowed' })
export class DocumentValidationController {
  constructor(private readonly validationService: ValidationService) {}

  @Get(':id/report')
  @Roles(RoleEnum.reader)
  @ApiOperation({
    summary: 'Latest compliance report',
    description:
      'Without a report the status tells whether validation is pending, ' +
      'was skipped or failed.',
  })
  @ApiOkResponse({ type: CurrentReportResponseDto })
  @ApiNotFoundResponse({ description: 'Document not found' })
  currentReport(
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<CurrentReportResponseDto> {
    return this.validationService.getCurrentReport(id);
  }

  @Get(':id/reports')
  @Roles(RoleEnum.reader)
  @ApiOperation({ summary: 'Report history, newest first' })
  @ApiOkResponse({
    type: InfinityPaginationResponse(ComplianceReportResponseDto),
  })
  @ApiNotFoundResponse({ description: 'Document not found' })
  reports(
    @Param('id', ParseUUIDPipe) id: string,
    @Query() query: ListValidationHistoryDto,
  ): Promise<InfinityPaginationResponseDto<ComplianceReportResponseDto>> {
    return this.validationService.listReports(id, query);
  }

  @Get(':id/jobs')
  @Roles(RoleEnum.reader)
  @ApiOperation({ summary: 'Validation jobs, most recently enqueued first' })
  @ApiOkResponse({ type: InfinityPaginationResponse(ValidationJobResponseDto) })
  @ApiNotFoundResponse({ description: 'Document not found' })
  jobs(
    @Param('id', ParseUUIDPipe) id: string,
    @Query() query: ListValidationHistoryDto,
  ): Promise<InfinityPaginationResponseDto<ValidationJobResponseDto>> {
    return this.validationService.listJobs(id, query);
  }

  @Post(':id/validate')
  @HttpCode(HttpStatus.ACCEPTED)
  @Roles(RoleEnum.author)
  @ApiOperation({
    summary: 'Queue validation of the current content',
    description:
      'Returns the already queued job when one exists for the same content, ' +
      'and null for archived documents.',
  })
  @ApiAcceptedResponse({ type: ValidationJobResponseDto })
  @ApiNotFoundResponse({ description: 'Document not found' })
  validate(
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<ValidationJobResponseDto | null> {
    return this.validationService.requestValidation(id);
  }
}
