import { Router, type Request } from "express";
import { buildPaginationMeta } from "../pagination";
import { listPostsByTag } from "../queries/posts";
import { listTags } from "../queries/tags";
import { paginatedResponse } from "../response";
import { parsePageRequest, parseTagName, parseTagPageRequest } from "../validation";
import {
  asyncHandler,
  withDatabase,
  type JsonResponse,
  type RouteContext,
} from "./context";

export function listTagsHandler(ctx: RouteContext) {
  return async (req: Pick<Request, "query">, res: JsonResponse) => {
    const request = parseTagPageRequest(req.query);
    const { tags, total } = await withDatabase(ctx, "GET /v1/tags", (db) =>
      listTags(db, request)
    );
    res.json(
      paginatedResponse(tags, buildPaginationMeta(total, request.limit, request.offset))
    );
  };
}

export function postsByTagHandler(ctx: RouteContext) {
  return async (req: Pick<Request, "query" | "params">, res: JsonResponse) => {
    const tagName = parseTagName(req.params.name);
    const request = parsePageRequest(req.query);
    const page = await withDatabase(ctx, "GET /v1/tags/:name/posts", (db) =>
      listPostsByTag(db, tagName, request)
    );
    res.json(page);
  };
}

export function tagRoutes(ctx: RouteContext): Router {
  const router = Router();
  router.get("/v1/tags", asyncHandler(listTagsHandler(ctx)));
  router.get("/v1/tags/:name/posts", asyncHandler(postsByTagHandler(ctx)));
  return router;
}
