import { Injectable } from '@nestjs/common';
import { plainToClass } from 'class-transformer';
import { InfinityPaginationResponseDto } from '../utils/dto/infinity-pagination-response.dto';
import { infinityPagination } from '../utils/infinity-pagination';
import { IPaginationOptions } from '../utils/types/pagination-options';
import { ComplianceReport } from './domain/entities/compliance-report.entity';
import { ValidationJob } from './domain/entities/validation-job.entity';
import { ValidationTrigger } from './domain/enums/validation-trigger.enum';
import { ValidationOrchestratorDomainService } from './domain/services/validation-orchestrator.domain.service';
import { ComplianceReportResponseDto } from './dto/compliance-report-response.dto';
import {
  CurrentReportResponseDto,
  CurrentReportStatus,
} from './dto/current-report-response.dto';
import { ListValidationHistoryDto } from './dto/list-validation-history.dto';
import { ValidationJobResponseDto } from './dto/validation-job-response.dto';

@Injectable()
export class ValidationService {
  constructor(
    private readonly orchestrator: ValidationOrchestratorDomainService,
  ) {}

  /**
   * Manual re-validation. Null when the document is archived.
   */
  async requestValidation(
    documentId: string,
  ): Promise<ValidationJobResponseDto | null> {
    const job = await this.orchestrator.enqueue(
      documentId,
      ValidationTrigger.MANUAL,
    );
    return job ? this.toJobDto(job) : null;
  }

  async getJob(jobId: string): Promise<ValidationJobResponseDto> {
    return this.toJobDto(await this.orchestrator.getJob(jobId));
  }

  async listJobs(
    documentId: string,
    query: ListValidationHistoryDto,
  ): Promise<InfinityPaginationResponseDto<ValidationJobResponseDto>> {
    const pagination = this.pagination(query);
    const page = infinityPagination(
      await this.orchestrator.listJobs(documentId, pagination),
      pagination,
    );
    return {
      data: page.data.map((job) => this.toJobDto(job)),
      hasNextPage: page.hasNextPage,
    };
  }

  async listReports(
    documentId: string,
    query: ListValidationHistoryDto,
  ): Promise<InfinityPaginationResponseDto<ComplianceReportResponseDto>> {
    const pagination = this.pagination(query);
    const page = infinityPagination(
      await this.orchestrator.listReports(documentId, pagination),
      pagination,
    );
    return {
      data: page.data.map((report) => this.toReportDto(report)),
      hasNextPage: page.hasNextPage,
    };
  }

  async getCurrentReport(
    documentId: string,
  ): Promise<CurrentReportResponseDto> {
    const current = await this.orchestrator.getCurrentReport(documentId);
    switch (current.status) {
      case 'validated':
        return {
          status: CurrentReportStatus.VALIDATED,
          report: this.toReportDto(current.report),
        };
      case 'skipped':
        return {
          status: CurrentReportStatus.SKIPPED,
          job: this.toJobDto(current.job),
        };
      case 'failed':
        return {
          status: CurrentReportStatus.FAILED,
          job: this.toJobDto(current.job),
        };
      case 'not-yet-validated':
        return { status: CurrentReportStatus.NOT_YET_VALIDATED };
    }
  }

  toJobDto(job: ValidationJob): ValidationJobResponseDto {
    return plainToClass(ValidationJobResponseDto, job, {
      excludeExtraneousValues: true,
    });
  }

  private toReportDto(report: ComplianceReport): ComplianceReportResponseDto {
    return plainToClass(ComplianceReportResponseDto, report, {
      excludeExtraneousValues: true,
    });
  }

  private pagination(query: ListValidationHistoryDto): IPaginationOptions {
    return { page: query.page ?? 1, limit: query.limit ?? 20 };
  }
}
