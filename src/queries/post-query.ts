import { ValidationError } from "../errors";
import {
  SORT_FIELDS,
  type PageRequest,
  type QueryValue,
  type SortField,
  type SqlQuery,
} from "../models/types";
import { containsPattern } from "./pattern";

/**
 * ソート可能な項目 → カラム。ここにない値は ORDER BY に入れない
 */
const SORT_COLUMNS: Record<SortField, string> = {
  id: "p.id",
  title: "p.title",
  published_at: "p.published_at",
  created_at: "p.created_at",
  updated_at: "p.updated_at",
  view_count: "p.view_count",
  like_count: "p.like_count",
};

export const DEFAULT_ORDER_BY: SortField = "published_at";

// 一覧では本文を切り詰める
export const EXCERPT_LENGTH = 280;

export const POST_COLUMNS = `
      p.id,
      p.title,
      p.slug,
      p.photo_url,
      p.view_count,
      p.like_count,
      p.published_at,
      p.created_at,
      p.updated_at,
      u.id as author_id,
      u.username as author_username`;

export interface PostFilter {
  tag?: string;
}

export interface PostListQueries {
  page: SqlQuery;
  count: SqlQuery;
}

export function resolveSortColumn(field: string): string {
  const known = SORT_FIELDS.find((f) => f === field);
  if (known === undefined) {
    throw new ValidationError("Invalid order_by", [
      `order_by: must be one of ${SORT_FIELDS.join(", ")}`,
    ]);
  }
  return SORT_COLUMNS[known];
}

/**
 * 一覧取得クエリと件数クエリを組み立てる。
 * 2つのクエリは値の配列を共有しないので並行に実行できる
 */
export function buildPostListQuery(
  request: PageRequest,
  filter: PostFilter = {}
): PostListQueries {
  const column = resolveSortColumn(request.orderBy ?? DEFAULT_ORDER_BY);
  const direction = request.sortDirection === "asc" ? "ASC" : "DESC";

  const values: QueryValue[] = [];
  const bind = (value: QueryValue): string => {
    values.push(value);
    return `$${values.length}`;
  };

  const joins = ["INNER JOIN users u ON p.created_by = u.id"];
  const conditions = ["p.published = true"];

  if (filter.tag !== undefined) {
    joins.push(
      "INNER JOIN posts_to_tags ptt ON p.id = ptt.post_id",
      "INNER JOIN tags t ON ptt.tag_id = t.id"
    );
    conditions.push(`t.name = ${bind(filter.tag)}`);
  }

  if (request.search !== undefined) {
    const pattern = bind(containsPattern(request.search));
    conditions.push(
      `(p.title ILIKE ${pattern} ESCAPE '\\' OR p.body ILIKE ${pattern} ESCAPE '\\' OR u.username ILIKE ${pattern} ESCAPE '\\')`
    );
  }

  const from = `
    FROM posts p
    ${joins.join("\n    ")}
    WHERE ${conditions.join(" AND ")}`;
  const filterValues = [...values];

  // 同じ値の行があってもページ境界が揺れないよう p.id で順序を確定させる
  const orderBy =
    column === "p.id"
      ? `p.id ${direction}`
      : `${column} ${direction} NULLS LAST, p.id ASC`;

  const intent = filter.tag === undefined ? "posts" : "posts_by_tag";

  const page: SqlQuery = {
    intent: `${intent}.page`,
    text: `
    SELECT ${POST_COLUMNS},
      LEFT(p.body, ${EXCERPT_LENGTH}) as body${from}
    ORDER BY ${orderBy}
    LIMIT ${bind(request.limit)} OFFSET ${bind(request.offset)}
  `,
    values,
  };

  const count: SqlQuery = {
    intent: `${intent}.count`,
    text: `
    SELECT COUNT(*) as total${from}
  `,
    values: filterValues,
  };

  return { page, count };
}
