import type { NextFunction, Request } from "express";
import { AppError, StoreError } from "../errors";
import type { ErrorResponse } from "../models/types";
import { errorResponse } from "../response";

export interface StatusResponse {
  status(code: number): { json(body: ErrorResponse): unknown };
}

// ルートのパターンだけをログに出す（パスやクエリの値は出さない）
function routeLabel(req: Pick<Request, "method" | "route">): string {
  const route: unknown = req.route;
  const path =
    typeof route === "object" && route !== null && "path" in route
      ? String(route.path)
      : "unmatched";
  return `${req.method} ${path}`;
}

export function notFoundHandler(_req: unknown, res: StatusResponse) {
  res.status(404).json(errorResponse("Not found"));
}

export function errorHandler(
  err: unknown,
  req: Pick<Request, "method" | "route">,
  res: StatusResponse,
  // Express はエラーハンドラを引数の数で判定する
  _next: NextFunction
) {
  if (err instanceof AppError) {
    if (err.status >= 500) {
      const intent = err instanceof StoreError ? err.intent : err.name;
      console.error(`[api] ${routeLabel(req)} failed (${intent}):`, err.cause ?? err);
    } else {
      console.warn(`[api] ${routeLabel(req)} rejected: ${err.name} (${err.status})`);
    }
    res.status(err.status).json(errorResponse(err.message));
    return;
  }

  console.error(`[api] ${routeLabel(req)} failed:`, err);
  res.status(500).json(errorResponse("Internal server error"));
}
