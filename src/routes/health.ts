import { Router } from "express";
import type { JsonResponse } from "./context";

export function health(_req: unknown, res: JsonResponse) {
  res.json({ success: true, message: "ok" });
}

export function healthRoutes(): Router {
  const router = Router();
  router.get("/", health);
  router.get("/v1/health", health);
  return router;
}
