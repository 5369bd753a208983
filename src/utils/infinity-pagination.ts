import { InfinityPaginationResponseDto } from './dto/infinity-pagination-response.dto';
import { IPaginationOptions } from './types/pagination-options';

/**
 * Wraps a page fetched with `limit + 1` rows: the extra row only signals
 * that another page exists and is dropped from the response.
 */
export const infinityPagination = <T>(
  data: T[],
  options: IPaginationOptions,
): InfinityPaginationResponseDto<T> => {
  return {
    data: data.slice(0, options.limit),
    hasNextPage: data.length > options.limit,
  };
};
