import { Router, type Request } from "express";
import { getPostByUsernameAndSlug, getRandomPosts, listPosts } from "../queries/posts";
import { successResponse } from "../response";
import { parsePageRequest, parseRandomLimit } from "../validation";
import {
  asyncHandler,
  withDatabase,
  type JsonResponse,
  type RouteContext,
} from "./context";

// GET /v1/posts?offset=&limit=&search=&order_by=&sort_direction=
export function listPostsHandler(ctx: RouteContext) {
  return async (req: Pick<Request, "query">, res: JsonResponse) => {
    const request = parsePageRequest(req.query);
    const page = await withDatabase(ctx, "GET /v1/posts", (db) =>
      listPosts(db, request)
    );
    res.json(page);
  };
}

export function randomPostsHandler(ctx: RouteContext) {
  return async (req: Pick<Request, "query">, res: JsonResponse) => {
    const limit = parseRandomLimit(req.query);
    const page = await withDatabase(ctx, "GET /v1/posts/random", (db) =>
      getRandomPosts(db, limit)
    );
    res.json(page);
  };
}

export function postBySlugHandler(ctx: RouteContext) {
  return async (req: Pick<Request, "params">, res: JsonResponse) => {
    const { username, slug } = req.params;
    const post = await withDatabase(ctx, "GET /v1/posts/u/:username/:slug", (db) =>
      getPostByUsernameAndSlug(db, username, slug)
    );
    res.json(successResponse(post));
  };
}

export function postRoutes(ctx: RouteContext): Router {
  const router = Router();
  router.get("/v1/posts", asyncHandler(listPostsHandler(ctx)));
  router.get("/v1/posts/random", asyncHandler(randomPostsHandler(ctx)));
  router.get("/v1/posts/u/:username/:slug", asyncHandler(postBySlugHandler(ctx)));
  return router;
}
