import type { QueryResultRow } from "pg";
import { settleAll, type QueryExecutor } from "../db";
import type { Tag, TagPageRequest } from "../models/types";

function toTag(row: QueryResultRow): Tag {
  return {
    id: row.id,
    name: row.name,
    created_at: row.created_at,
  };
}

/**
 * ページ内の投稿のタグを ANY($1) で一括取得し、投稿IDごとにまとめる。
 * 投稿数に関係なくクエリは1回（空なら0回）
 */
export async function fetchTagsForPosts(
  db: QueryExecutor,
  postIds: string[]
): Promise<Map<string, Tag[]>> {
  const tagsByPost = new Map<string, Tag[]>();
  if (postIds.length === 0) {
    return tagsByPost;
  }

  const rows = await db.query({
    intent: "tags.by_posts",
    text: `
    SELECT t.id, t.name, t.created_at, ptt.post_id
    FROM tags t
    INNER JOIN posts_to_tags ptt ON t.id = ptt.tag_id
    WHERE ptt.post_id = ANY($1::uuid[])
    ORDER BY t.name, t.id
  `,
    values: [postIds],
  });

  for (const row of rows) {
    const tags = tagsByPost.get(row.post_id);
    if (tags) {
      tags.push(toTag(row));
    } else {
      tagsByPost.set(row.post_id, [toTag(row)]);
    }
  }

  return tagsByPost;
}

export async function fetchTagsForPost(
  db: QueryExecutor,
  postId: string
): Promise<Tag[]> {
  const rows = await db.query({
    intent: "tags.by_post",
    text: `
    SELECT t.id, t.name, t.created_at
    FROM tags t
    INNER JOIN posts_to_tags ptt ON t.id = ptt.tag_id
    WHERE ptt.post_id = $1
    ORDER BY t.name
  `,
    values: [postId],
  });

  return rows.map(toTag);
}

export async function listTags(
  db: QueryExecutor,
  request: TagPageRequest
): Promise<{ tags: Tag[]; total: number }> {
  const [rows, countRows] = await settleAll([
    db.query({
      intent: "tags.page",
      text: `
    SELECT id, name, created_at
    FROM tags
    ORDER BY name
    LIMIT $1 OFFSET $2
  `,
      values: [request.limit, request.offset],
    }),
    db.query({
      intent: "tags.count",
      text: "SELECT COUNT(*) as total FROM tags",
      values: [],
    }),
  ]);

  return { tags: rows.map(toTag), total: Number(countRows[0]?.total ?? 0) };
}
