import type { NextFunction, Request, RequestHandler, Response } from "express";
import type { Database, QueryExecutor } from "../db";
import { QueryMonitor } from "../utils/performance";

export interface JsonResponse {
  json(body: unknown): unknown;
}

export interface RouteContext {
  database: Pick<Database, "withClient">;
  logQueries: boolean;
}

/**
 * Express 4 は async ハンドラの reject を拾わないので next に渡す
 */
export function asyncHandler(
  fn: (req: Request, res: Response) => Promise<void>
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res).catch(next);
  };
}

// 接続を1つ取得して fn を実行し、必要ならクエリ数をログに出す
export async function withDatabase<T>(
  ctx: RouteContext,
  label: string,
  fn: (db: QueryExecutor) => Promise<T>
): Promise<T> {
  const monitor = new QueryMonitor();
  monitor.start();

  const result = await ctx.database.withClient(fn, monitor);

  if (ctx.logQueries) {
    console.log(`[api] ${monitor.summary(label)}`);
  }
  return result;
}
