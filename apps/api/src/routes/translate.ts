import { Router, Request, Response, NextFunction } from "express";
import type { Localizer } from "@repo/core";
import { TranslateBatchRequestSchema, TranslateRequestSchema } from "@repo/shared";
import type {
  TranslateBatchRequest,
  TranslateBatchResponse,
  TranslateRequest,
  TranslateResponse,
} from "@repo/shared";
import { validate } from "../middleware/validate";

export function createTranslateRouter(localizer: Localizer): Router {
  const router = Router();

  // POST /api/translate
  router.post(
    "/",
    validate(TranslateRequestSchema),
    async (
      req: Request<Record<string, string>, TranslateResponse, TranslateRequest>,
      res: Response<TranslateResponse>,
      next: NextFunction
    ) => {
      try {
        const language = localizer.getLanguage();
        const text = await localizer.translate(req.body.text, req.body.context);
        res.json({ text, language });
      } catch (error) {
        next(error);
      }
    }
  );

  // POST /api/translate/batch
  router.post(
    "/batch",
    validate(TranslateBatchRequestSchema),
    async (
      req: Request<Record<string, string>, TranslateBatchResponse, TranslateBatchRequest>,
      res: Response<TranslateBatchResponse>,
      next: NextFunction
    ) => {
      try {
        const language = localizer.getLanguage();
        const texts = await localizer.translateMany(req.body.texts, req.body.context);
        res.json({ texts, language });
      } catch (error) {
        next(error);
      }
    }
  );

  return router;
}
