import type { Request, Response, NextFunction } from "express";
import { ZodError } from "zod";
import { TranslationError, UnsupportedLanguageError } from "@repo/core";

function isBodyParseError(err: unknown): boolean {
  return typeof err === "object" && err !== null && "type" in err && err.type === "entity.parse.failed";
}

export function notFoundHandler(req: Request, res: Response) {
  res.status(404).json({
    error: { message: `Not found: ${req.method} ${req.path}` },
  });
}

export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  if (err instanceof ZodError) {
    return res.status(400).json({
      error: { message: "Invalid request", issues: err.issues },
    });
  }

  if (isBodyParseError(err)) {
    return res.status(400).json({
      error: { message: "Invalid JSON body" },
    });
  }

  if (err instanceof UnsupportedLanguageError) {
    return res.status(400).json({
      error: { message: err.message, kind: err.kind, languageTag: err.languageTag },
    });
  }

  if (err instanceof TranslationError) {
    console.error("[API] Translation error:", err);
    return res.status(502).json({
      error: { message: err.message, kind: err.kind },
    });
  }

  console.error("[API] Unhandled error:", err);
  res.status(500).json({
    error: { message: "Internal server error" },
  });
}
