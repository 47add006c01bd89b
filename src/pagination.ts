import type { PaginationMeta } from "./models/types";

/**
 * limit >= 1 はバリデーションで保証済み
 */
export function buildPaginationMeta(
  total: number,
  limit: number,
  offset: number
): PaginationMeta {
  return {
    total_items: total,
    offset,
    limit,
    total_pages: Math.ceil(total / limit),
  };
}
