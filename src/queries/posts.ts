import type { QueryResultRow } from "pg";
import { settleAll, type QueryExecutor } from "../db";
import { NotFoundError } from "../errors";
import type { PageRequest, PaginatedResponse, PostRow, PostView } from "../models/types";
import { buildPaginationMeta } from "../pagination";
import { assemblePostPage, toPostView } from "../response";
import {
  EXCERPT_LENGTH,
  POST_COLUMNS,
  buildPostListQuery,
  type PostFilter,
} from "./post-query";
import { fetchTagsForPost, fetchTagsForPosts } from "./tags";

function toPostRow(row: QueryResultRow): PostRow {
  return {
    id: row.id,
    title: row.title,
    body: row.body,
    slug: row.slug,
    photo_url: row.photo_url,
    view_count: Number(row.view_count),
    like_count: Number(row.like_count),
    published_at: row.published_at,
    created_at: row.created_at,
    updated_at: row.updated_at,
    author: {
      id: row.author_id,
      username: row.author_username,
    },
  };
}

/**
 * 1. 一覧と件数を同じ接続で取得（両方の完了を待つ）
 * 2. ページ内の投稿IDでタグを一括取得（N+1 にしない）
 * 3. メタ情報を付けてレスポンスにまとめる
 */
export async function listPosts(
  db: QueryExecutor,
  request: PageRequest,
  filter: PostFilter = {}
): Promise<PaginatedResponse<PostView[]>> {
  const queries = buildPostListQuery(request, filter);

  const [rows, countRows] = await settleAll([
    db.query(queries.page),
    db.query(queries.count),
  ]);
  const posts = rows.map(toPostRow);
  const total = Number(countRows[0]?.total ?? 0);

  const tagsByPost = await fetchTagsForPosts(
    db,
    posts.map((p) => p.id)
  );

  return assemblePostPage(
    posts,
    tagsByPost,
    buildPaginationMeta(total, request.limit, request.offset)
  );
}

export async function listPostsByTag(
  db: QueryExecutor,
  tagName: string,
  request: PageRequest
): Promise<PaginatedResponse<PostView[]>> {
  return listPosts(db, request, { tag: tagName });
}

export async function getRandomPosts(
  db: QueryExecutor,
  limit: number
): Promise<PaginatedResponse<PostView[]>> {
  const rows = await db.query({
    intent: "posts.random",
    text: `
    SELECT ${POST_COLUMNS},
      LEFT(p.body, ${EXCERPT_LENGTH}) as body
    FROM posts p
    INNER JOIN users u ON p.created_by = u.id
    WHERE p.published = true
    ORDER BY RANDOM()
    LIMIT $1
  `,
    values: [limit],
  });
  const posts = rows.map(toPostRow);

  const tagsByPost = await fetchTagsForPosts(
    db,
    posts.map((p) => p.id)
  );

  return assemblePostPage(
    posts,
    tagsByPost,
    buildPaginationMeta(posts.length, limit, 0)
  );
}

export async function getPostByUsernameAndSlug(
  db: QueryExecutor,
  username: string,
  slug: string
): Promise<PostView> {
  const rows = await db.query({
    intent: "posts.by_username_and_slug",
    text: `
    SELECT ${POST_COLUMNS},
      p.body
    FROM posts p
    INNER JOIN users u ON p.created_by = u.id
    WHERE u.username = $1 AND p.slug = $2 AND p.published = true
  `,
    values: [username, slug],
  });

  const row = rows[0];
  if (!row) {
    throw new NotFoundError(`Post not found: ${slug} by ${username}`);
  }

  const post = toPostRow(row);
  return toPostView(post, await fetchTagsForPost(db, post.id));
}
