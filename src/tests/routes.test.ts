import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { Database } from "../db";
import { NotFoundError, StoreError, ValidationError } from "../errors";
import { errorHandler, notFoundHandler } from "../middleware/error-handler";
import type { QueryValue } from "../models/types";
import type { RouteContext } from "../routes/context";
import { health } from "../routes/health";
import { listPostsHandler, postBySlugHandler, randomPostsHandler } from "../routes/posts";
import { listTagsHandler, postsByTagHandler } from "../routes/tags";
import { FakePool, FakeResponse, makePost, makeTag, toRow } from "./helpers/fakes";

const post = makePost(1);
const postgres = makeTag("postgres");

// SQL の形でだけ振り分ける、接続レベルのスタブ
function respond(text: string, _values: QueryValue[]) {
  if (text.includes("COUNT(*)")) {
    return [{ total: "1" }];
  }
  if (text.includes("ANY($1::uuid[])")) {
    return [{ ...postgres, post_id: post.id }];
  }
  if (text.includes("FROM tags")) {
    return [{ ...postgres }];
  }
  if (text.includes("FROM posts p")) {
    return [toRow(post)];
  }
  return [];
}

function context(pool: FakePool, logQueries = false): RouteContext {
  return { database: new Database(pool, 1000, 10), logQueries };
}

describe("route handlers", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("lists posts with tags and metadata on one connection", async () => {
    const pool = new FakePool(respond);
    const res = new FakeResponse();

    await listPostsHandler(context(pool))({ query: { limit: "10" } }, res);

    expect(res.body).toEqual({
      success: true,
      data: [{ ...post, tags: [postgres] }],
      meta: { total_items: 1, offset: 0, limit: 10, total_pages: 1 },
    });
    expect(pool.acquired).toBe(1);
    expect(pool.released).toBe(1);
    expect(pool.statements).toHaveLength(3);
  });

  it("rejects a non-whitelisted order_by before touching the pool", async () => {
    const pool = new FakePool(respond);

    await expect(
      listPostsHandler(context(pool))({ query: { order_by: "drop_table" } }, new FakeResponse())
    ).rejects.toBeInstanceOf(ValidationError);
    expect(pool.acquired).toBe(0);
    expect(pool.statements).toHaveLength(0);
  });

  it("logs the query summary when enabled", async () => {
    const pool = new FakePool(respond);

    await listPostsHandler(context(pool, true))({ query: {} }, new FakeResponse());

    expect(console.log).toHaveBeenCalledTimes(1);
    expect(vi.mocked(console.log).mock.calls[0][0]).toMatch(
      /^\[api\] GET \/v1\/posts: 3 queries in /
    );
  });

  it("returns random posts", async () => {
    const res = new FakeResponse();

    await randomPostsHandler(context(new FakePool(respond)))({ query: {} }, res);

    expect(res.body).toMatchObject({
      success: true,
      meta: { total_items: 1, offset: 0, limit: 6, total_pages: 1 },
    });
  });

  it("returns a single post by username and slug", async () => {
    const res = new FakeResponse();

    await postBySlugHandler(context(new FakePool(respond)))(
      { params: { username: "alice", slug: "post-1" } },
      res
    );

    expect(res.body).toEqual({ success: true, data: { ...post, tags: [postgres] } });
  });

  it("reports a missing post as not found", async () => {
    const pool = new FakePool(() => []);

    await expect(
      postBySlugHandler(context(pool))(
        { params: { username: "alice", slug: "missing" } },
        new FakeResponse()
      )
    ).rejects.toBeInstanceOf(NotFoundError);
    expect(pool.released).toBe(1);
  });

  it("lists tags", async () => {
    const res = new FakeResponse();

    await listTagsHandler(context(new FakePool(respond)))({ query: {} }, res);

    expect(res.body).toEqual({
      success: true,
      data: [postgres],
      meta: { total_items: 1, offset: 0, limit: 50, total_pages: 1 },
    });
  });

  it("lists posts for a tag", async () => {
    const pool = new FakePool(respond);
    const res = new FakeResponse();

    await postsByTagHandler(context(pool))({ params: { name: "postgres" }, query: {} }, res);

    expect(pool.statements[0].values).toEqual(["postgres", 20, 0]);
    expect(res.body).toMatchObject({ success: true, meta: { total_items: 1 } });
  });

  it("answers the health check", () => {
    const res = new FakeResponse();
    health({}, res);
    expect(res.body).toEqual({ success: true, message: "ok" });
  });
});

describe("errorHandler", () => {
  const req = { method: "GET", route: { path: "/v1/posts" } };
  const next = vi.fn();

  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("maps validation errors to 400", () => {
    const res = new FakeResponse();

    errorHandler(new ValidationError("Invalid order_by"), req, res, next);

    expect(res.statusCode).toBe(400);
    expect(res.body).toEqual({ success: false, error: "Invalid order_by", data: null });
    expect(console.warn).toHaveBeenCalledWith(
      "[api] GET /v1/posts rejected: ValidationError (400)"
    );
  });

  it("logs store errors with their intent and answers 500", () => {
    const res = new FakeResponse();
    const cause = new Error("connection terminated");

    errorHandler(new StoreError("posts.page", { cause }), req, res, next);

    expect(res.statusCode).toBe(500);
    expect(res.body).toEqual({ success: false, error: "Query failed: posts.page", data: null });
    expect(console.error).toHaveBeenCalledWith("[api] GET /v1/posts failed (posts.page):", cause);
  });

  it("hides unexpected errors", () => {
    const res = new FakeResponse();

    errorHandler(new TypeError("x is undefined"), { method: "GET", route: undefined }, res, next);

    expect(res.statusCode).toBe(500);
    expect(res.body).toEqual({ success: false, error: "Internal server error", data: null });
    expect(vi.mocked(console.error).mock.calls[0][0]).toBe("[api] GET unmatched failed:");
  });

  it("answers unknown routes with 404", () => {
    const res = new FakeResponse();
    notFoundHandler({}, res);
    expect(res.statusCode).toBe(404);
    expect(res.body).toEqual({ success: false, error: "Not found", data: null });
  });
});
