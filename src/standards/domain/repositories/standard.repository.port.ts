import { NullableType } from '../../../utils/types/nullable.type';
import { IPaginationOptions } from '../../../utils/types/pagination-options';
import { Standard } from '../entities/standard.entity';

export abstract class StandardRepository {
  /**
   * @throws LineageConflictError when the lineage already has this version
   */
  abstract create(standard: Standard): Promise<Standard>;

  abstract findById(id: string): Promise<NullableType<Standard>>;

  // Highest version of the lineage
  abstract findHead(lineageId: string): Promise<NullableType<Standard>>;

  abstract findLineage(lineageId: string): Promise<Standard[]>;

  /**
   * Most recently promoted first; fetches `limit + 1` rows.
   */
  abstract findPage(pagination: IPaginationOptions): Promise<Standard[]>;
}
