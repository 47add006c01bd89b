import type {
  ErrorResponse,
  PaginatedResponse,
  PaginationMeta,
  PostRow,
  PostView,
  SuccessResponse,
  Tag,
} from "./models/types";

export function successResponse<T>(data: T): SuccessResponse<T> {
  return { success: true, data };
}

export function paginatedResponse<T>(
  data: T,
  meta: PaginationMeta
): PaginatedResponse<T> {
  return { success: true, data, meta };
}

export function errorResponse(message: string): ErrorResponse {
  return { success: false, error: message, data: null };
}

export function toPostView(row: PostRow, tags: Tag[]): PostView {
  return { ...row, tags };
}

/**
 * タグのない投稿も tags: [] を持つ
 */
export function assemblePostPage(
  rows: PostRow[],
  tagsByPost: Map<string, Tag[]>,
  meta: PaginationMeta
): PaginatedResponse<PostView[]> {
  return paginatedResponse(
    rows.map((row) => toPostView(row, tagsByPost.get(row.id) ?? [])),
    meta
  );
}
