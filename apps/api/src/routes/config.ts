import { Router, Request, Response, NextFunction } from "express";
import { config } from "../config";

const router = Router();

// GET /api/config
router.get("/", (req: Request, res: Response, next: NextFunction) => {
  try {
    res.json({
      translationProvider: config.translationProvider,
      hasGoogleApiKey: Boolean(config.googleCloudApiKey),
      sourceLanguage: config.sourceLanguage,
      supportedLanguages: config.supportedLanguages,
      cachePersistence: config.cachePersistence,
      cachePolicy: config.cachePolicy,
      protectPlaceholders: config.protectPlaceholders,
      sameLanguageMatch: config.sameLanguageMatch,
    });
  } catch (error) {
    next(error);
  }
});

export default router;
