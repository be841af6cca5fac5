import { Router, Request, Response, NextFunction } from "express";
import type { Localizer } from "@repo/core";
import type { CachePersistence, CacheStatsDTO } from "@repo/shared";

export function createCacheRouter(localizer: Localizer, persistence: CachePersistence): Router {
  const router = Router();

  // GET /api/cache/stats
  router.get("/stats", async (_req: Request, res: Response<CacheStatsDTO>, next: NextFunction) => {
    try {
      const stats = await localizer.getCacheStats();
      res.json({
        ...stats,
        policy: localizer.getCachePolicy(),
        persistence,
      });
    } catch (error) {
      next(error);
    }
  });

  // DELETE /api/cache
  router.delete("/", async (_req: Request, res: Response, next: NextFunction) => {
    try {
      await localizer.clearCache();
      console.log("[Cache] Cleared via API");
      res.status(204).end();
    } catch (error) {
      next(error);
    }
  });

  return router;
}
