import { Standard } from '../../../src/standards/domain/entities/standard.entity';
import { StandardRepository } from '../../../src/standards/domain/repositories/standard.repository.port';
import { LineageConflictError } from '../../../src/utils/errors/domain-errors';
import { IPaginationOptions } from '../../../src/utils/types/pagination-options';

export class InMemoryStandardRepository extends StandardRepository {
  readonly standards = new Map<string, Standard>();

  async create(standard: Standard): Promise<Standard> {
    const head = await this.findHead(standard.lineageId);
    if (head && head.version >= standard.version) {
      throw new LineageConflictError(
        standard.predecessorId ?? standard.id,
        head.id,
      );
    }
    this.standards.set(standard.id, { ...standard });
    return { ...standard };
  }

  async findById(id: string): Promise<Standard | null> {
    const standard = this.standards.get(id);
    return standard ? { ...standard } : null;
  }

  async findHead(lineageId: string): Promise<Standard | null> {
    const lineage = await this.findLineage(lineageId);
    return lineage.length > 0 ? lineage[lineage.length - 1] : null;
  }

  async findLineage(lineageId: string): Promise<Standard[]> {
    return [...this.standards.values()]
      .filter((standard) => standard.lineageId === lineageId)
      .sort((a, b) => a.version - b.version)
      .map((standard) => ({ ...standard }));
  }

  async findPage(pagination: IPaginationOptions): Promise<Standard[]> {
    const start = (pagination.page - 1) * pagination.limit;
    return [...this.standards.values()]
      .reverse()
      .slice(start, start + pagination.limit + 1)
      .map((standard) => ({ ...standard }));
  }
}
