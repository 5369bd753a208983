import { ComplianceReport } from '../../../../domain/entities/compliance-report.entity';
import { ComplianceReportEntity } from '../entities/compliance-report.entity';

export class ComplianceReportMapper {
  static toDomain(entity: ComplianceReportEntity): ComplianceReport {
    const domain = new ComplianceReport();
    domain.id = entity.id;
    domain.jobId = entity.jobId;
    domain.documentId = entity.documentId;
    domain.standardId = entity.standardId;
    domain.standardVersion = entity.standardVersion;
    domain.findings = entity.findings;
    domain.verdict = entity.verdict;
    domain.generatedAt = entity.generatedAt;
    return domain;
  }
}
