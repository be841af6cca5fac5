import { Router, Request, Response, NextFunction } from "express";
import type { Localizer, PrepareResult } from "@repo/core";
import type { CachePersistence, PrepareResultDTO } from "@repo/shared";

export function toPrepareResultDTO(result: PrepareResult): PrepareResultDTO {
  switch (result.status) {
    case "ready":
      return { status: "ready" };
    case "downloading":
      return { status: "downloading", progress: result.progress };
    case "failed":
      return {
        status: "failed",
        error: { kind: result.error.kind, message: result.error.message },
      };
  }
}

export function createReadyRouter(
  localizer: Localizer,
  persistence: CachePersistence,
  checkPersistence: () => Promise<boolean>
): Router {
  const router = Router();

  // GET /api/ready
  router.get("/", async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const [translatorReady, persistenceOk] = await Promise.all([
        localizer.isReady(),
        checkPersistence(),
      ]);

      res.status(persistenceOk ? 200 : 503).json({
        ok: persistenceOk,
        language: localizer.getLanguage(),
        translator: {
          configured: localizer.hasTranslator(),
          ready: translatorReady,
        },
        persistence: { kind: persistence, ok: persistenceOk },
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      next(error);
    }
  });

  // POST /api/ready/prepare
  router.post("/prepare", async (_req: Request, res: Response<PrepareResultDTO>, next: NextFunction) => {
    try {
      const result = await localizer.prepare();
      res.json(toPrepareResultDTO(result));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
