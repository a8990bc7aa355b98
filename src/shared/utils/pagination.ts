import { z } from 'zod';

export const MAX_PAGE_SIZE = 100;

/**
 * Query string fields shared by every list endpoint. List schemas extend it.
 */
export const PaginationQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).default(20),
});

export type PaginationParams = z.infer<typeof PaginationQuerySchema>;

export interface PaginationMeta {
  page: number;
  limit: number;
  total: number;
  totalPages: number;
  hasNext: boolean;
  hasPrev: boolean;
}

export interface PaginatedResult<T> {
  data: T[];
  meta: PaginationMeta;
}

/**
 * Wrap one page of rows with its metadata. Postgres counts may arrive as
 * strings or bigints depending on the driver, so the total is normalized.
 */
export function paginate<T>(
  data: T[],
  total: number | string | bigint,
  params: PaginationParams
): PaginatedResult<T> {
  const count = Number(total);
  const totalPages = Math.ceil(count / params.limit);
  return {
    data,
    meta: {
      page: params.page,
      limit: params.limit,
      total: count,
      totalPages,
      hasNext: params.page < totalPages,
      hasPrev: params.page > 1,
    },
  };
}

/**
 * Row offset for a page, for `.offset()` on a select.
 */
export function getOffset(params: PaginationParams): number {
  return (params.page - 1) * params.limit;
}
