/**
 * Offset-based page (page 0, page 1, ...).
 * `current` is zero-based, matching the `page` query parameter.
 */
export interface PagePaginatedResult<T> {
  data: T[];
  meta: {
    current: number;
    pageSize: number;
    total: number;
    totalPages: number; // Math.ceil(total / pageSize)
  };
}

export function toPagePaginatedResult<T>(
  data: T[],
  page: number,
  size: number,
  total: number,
): PagePaginatedResult<T> {
  return {
    data,
    meta: {
      current: page,
      pageSize: size,
      total,
      totalPages: Math.ceil(total / size),
    },
  };
}
