import { z } from "zod";
import { ValidationError } from "./errors";
import { SORT_FIELDS, type PageRequest, type TagPageRequest } from "./models/types";

export const MAX_OFFSET = 10_000;
export const MAX_LIMIT = 100;

const offsetField = z.coerce.number().int().min(0).max(MAX_OFFSET).default(0);
const limitField = (fallback: number) =>
  z.coerce.number().int().min(1).max(MAX_LIMIT).default(fallback);

// 空文字は検索なしとして扱う
const searchField = z
  .string()
  .trim()
  .max(200)
  .optional()
  .transform((value) => (value === "" ? undefined : value));

export const PostListQuerySchema = z.object({
  offset: offsetField,
  limit: limitField(20),
  search: searchField,
  order_by: z.enum(SORT_FIELDS).optional(),
  sort_direction: z.enum(["asc", "desc"]).optional(),
});

export const TagListQuerySchema = z.object({
  offset: offsetField,
  limit: limitField(50),
});

export const RandomPostsQuerySchema = z.object({
  limit: limitField(6),
});

export const TagNameSchema = z.string().trim().min(1).max(100);

function parseWith<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".") || "value"}: ${issue.message}`
    );
    throw new ValidationError(`Invalid request: ${issues.join("; ")}`, issues);
  }
  return parsed.data;
}

export function parsePageRequest(query: unknown): PageRequest {
  const q = parseWith(PostListQuerySchema, query);
  return {
    offset: q.offset,
    limit: q.limit,
    search: q.search,
    orderBy: q.order_by,
    sortDirection: q.sort_direction,
  };
}

export function parseTagPageRequest(query: unknown): TagPageRequest {
  return parseWith(TagListQuerySchema, query);
}

export function parseRandomLimit(query: unknown): number {
  return parseWith(RandomPostsQuerySchema, query).limit;
}

export function parseTagName(name: unknown): string {
  return parseWith(TagNameSchema, name);
}
