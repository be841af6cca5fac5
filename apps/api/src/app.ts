import express from "express";
import type { Express } from "express";
import cors from "cors";
import type { Localizer } from "@repo/core";
import type { CachePersistence } from "@repo/shared";
import { errorHandler, notFoundHandler } from "./middleware/errorHandler";
import healthRouter from "./routes/health";
import configRouter from "./routes/config";
import { createTranslateRouter } from "./routes/translate";
import { createLocaleRouter } from "./routes/locale";
import { createCacheRouter } from "./routes/cache";
import { createReadyRouter } from "./routes/ready";

export interface AppDependencies {
  corsOrigin: string;
  persistence: CachePersistence;
  /** Reachability of the persistent cache tier */
  checkPersistence: () => Promise<boolean>;
}

export function createApp(localizer: Localizer, deps: AppDependencies): Express {
  const app = express();

  // Middleware
  app.use(cors({ origin: deps.corsOrigin }));
  app.use(express.json({ limit: "1mb" }));

  // Routes
  app.use("/health", healthRouter);
  app.use("/api/config", configRouter);
  app.use("/api/translate", createTranslateRouter(localizer));
  app.use("/api/locale", createLocaleRouter(localizer));
  app.use("/api/cache", createCacheRouter(localizer, deps.persistence));
  app.use("/api/ready", createReadyRouter(localizer, deps.persistence, deps.checkPersistence));

  // Error handling
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
