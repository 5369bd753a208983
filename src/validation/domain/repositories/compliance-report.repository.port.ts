import { NullableType } from '../../../utils/types/nullable.type';
import { IPaginationOptions } from '../../../utils/types/pagination-options';
import {
  ComplianceReport,
  NewComplianceReport,
} from '../entities/compliance-report.entity';

export abstract class ComplianceReportRepository {
  abstract create(data: NewComplianceReport): Promise<ComplianceReport>;

  abstract findLatestByDocumentId(
    documentId: string,
  ): Promise<NullableType<ComplianceReport>>;

  /**
   * Newest first; fetches `limit + 1` rows.
   */
  abstract findByDocumentId(
    documentId: string,
    pagination: IPaginationOptions,
  ): Promise<ComplianceReport[]>;
}
