import cors from "cors";
import express from "express";
import helmet from "helmet";
import morgan from "morgan";
import { errorHandler, notFoundHandler } from "./middleware/errors.js";
import { createRouter } from "./router.js";
import type { Services } from "./services/index.js";

export type AppOptions = {
  corsOrigin?: string;
  logRequests?: boolean;
};

export function createApp(services: Services, options: AppOptions = {}) {
  const app = express();
  const corsOrigin = options.corsOrigin ?? "*";

  app.use(helmet());
  app.use(cors({ origin: corsOrigin === "*" ? "*" : corsOrigin.split(",") }));
  app.use(express.json({ limit: "1mb" }));
  if (options.logRequests ?? true) {
    app.use(morgan("dev"));
  }

  app.get("/health", (_req, res) => {
    res.status(200).json({ status: "ok", service: "api", timestamp: new Date().toISOString() });
  });

  app.use("/api/v1", createRouter(services));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
