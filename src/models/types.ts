export interface User {
  id: string;
  username: string;
}

export interface Tag {
  id: string;
  name: string;
  created_at: Date;
}

/**
 * posts と users を結合した1行
 */
export interface PostRow {
  id: string;
  title: string;
  body: string;
  slug: string;
  photo_url: string | null;
  view_count: number;
  like_count: number;
  published_at: Date | null;
  created_at: Date;
  updated_at: Date;
  author: User;
}

export interface PostView {
  id: string;
  title: string;
  body: string;
  slug: string;
  photo_url: string | null;
  view_count: number;
  like_count: number;
  published_at: Date | null;
  created_at: Date;
  updated_at: Date;
  author: User;
  tags: Tag[];
}

export const SORT_FIELDS = [
  "id",
  "title",
  "published_at",
  "created_at",
  "updated_at",
  "view_count",
  "like_count",
] as const;

export type SortField = (typeof SORT_FIELDS)[number];

export type SortDirection = "asc" | "desc";

export interface PageRequest {
  offset: number;
  limit: number;
  search?: string;
  orderBy?: SortField;
  sortDirection?: SortDirection;
}

export interface TagPageRequest {
  offset: number;
  limit: number;
}

export interface PaginationMeta {
  total_items: number;
  offset: number;
  limit: number;
  total_pages: number;
}

export interface SuccessResponse<T> {
  success: true;
  data: T;
}

export interface PaginatedResponse<T> extends SuccessResponse<T> {
  meta: PaginationMeta;
}

export interface ErrorResponse {
  success: false;
  error: string;
  data: null;
}

export type QueryValue = string | number | boolean | null | string[];

/**
 * パラメータ化されたクエリ。intent はログと計測に使うラベル
 */
export interface SqlQuery {
  intent: string;
  text: string;
  values: QueryValue[];
}
