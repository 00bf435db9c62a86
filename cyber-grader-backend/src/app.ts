import express, { Express } from "express";
import cors from "cors";
import helmet from "helmet";
import { AppConfig } from "./config";
import { errorHandler, notFoundHandler } from "./middleware/errorHandler";
import { ContentFetcher, SheetSync } from "./services/integrations";
import { GraderStore } from "./services/store/types";
import { logger } from "./utils/logger";
import labRoutes from "./routes/labs";
import quizRoutes from "./routes/quizzes";
import examRoutes from "./routes/exams";
import dashboardRoutes from "./routes/dashboard";
import noteRoutes from "./routes/notes";
import adminRoutes from "./routes/admin";

export interface AppDeps {
  config: AppConfig;
  store: GraderStore;
  contentFetcher: ContentFetcher;
  sheetSync: SheetSync;
}

export function createApp(deps: AppDeps): Express {
  const { config, store } = deps;
  const app = express();

  if (!config.corsOrigin && config.nodeEnv !== "development") {
    logger.warn("CORS_ORIGIN is not set; cross-origin browser requests will be refused", {
      nodeEnv: config.nodeEnv,
    });
  }

  app.use(helmet());
  app.use(
    cors({
      // Any origin in development, only the configured one otherwise
      origin: config.corsOrigin ?? config.nodeEnv === "development",
      credentials: true,
    })
  );
  app.use(express.json({ limit: "1mb" }));

  // Request id for log correlation; only mutating requests are logged
  app.use((req, _res, next) => {
    const requestId = Math.random().toString(36).substring(2, 15);
    req.headers["x-request-id"] = requestId;

    if (req.method !== "GET") {
      logger.debug(`${req.method} ${req.originalUrl}`, { requestId });
    }

    next();
  });

  app.get("/health", (_req, res) => {
    res.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      persistence: store.status(),
    });
  });

  app.use(labRoutes(store));
  app.use(quizRoutes(store));
  app.use(examRoutes(store));
  app.use(dashboardRoutes(store));
  app.use(noteRoutes(config.contentRoot));
  app.use(adminRoutes(deps));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
