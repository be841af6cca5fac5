import { Router, Request, Response, NextFunction } from "express";
import type { Localizer } from "@repo/core";
import { SetLanguageRequestSchema } from "@repo/shared";
import type { LocaleDTO, SetLanguageRequest } from "@repo/shared";
import { validate } from "../middleware/validate";

function toLocaleDTO(localizer: Localizer): LocaleDTO {
  return {
    language: localizer.getLanguage(),
    sourceLanguage: localizer.getSourceLanguage(),
    supportedLanguages: localizer.getSupportedLanguages(),
  };
}

export function createLocaleRouter(localizer: Localizer): Router {
  const router = Router();

  // GET /api/locale
  router.get("/", (_req: Request, res: Response<LocaleDTO>) => {
    res.json(toLocaleDTO(localizer));
  });

  // PUT /api/locale
  router.put(
    "/",
    validate(SetLanguageRequestSchema),
    (
      req: Request<Record<string, string>, LocaleDTO, SetLanguageRequest>,
      res: Response<LocaleDTO>,
      next: NextFunction
    ) => {
      try {
        localizer.setLanguage(req.body.language);
        res.json(toLocaleDTO(localizer));
      } catch (error) {
        next(error);
      }
    }
  );

  return router;
}
