import express, { type ErrorRequestHandler, type Express } from "express";
import cors from "cors";
import { registerRoutes } from "./routes";
import type { ToolConfig } from "../config/tool.config";
import { RunCancelled, ValidationFailure } from "../errors";
import { buildOrchestrator, type OrchestratorOverrides } from "../platform/pipeline";
import { ProjectNotFound } from "../platform/project-store";
import { logger } from "../utils/logger";

const errorHandler: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
  if (res.headersSent) {
    logger.error(`Response failed mid-stream: ${err instanceof Error ? err.message : String(err)}`);
    res.end();
    return;
  }

  if (err instanceof ValidationFailure) {
    res.status(400).json({ error: "Catalog validation failed", issues: err.issues });
    return;
  }
  if (err instanceof ProjectNotFound) {
    res.status(404).json({ error: err.message });
    return;
  }
  if (err instanceof RunCancelled) {
    res.status(499).json({ error: err.message });
    return;
  }

  logger.error(err instanceof Error ? (err.stack ?? err.message) : String(err));
  res.status(500).json({ error: "Internal error" });
};

export function createApp(config: ToolConfig, overrides: OrchestratorOverrides = {}): Express {
  const app = express();
  app.use(cors({ origin: true, credentials: true }));

  registerRoutes(app, buildOrchestrator(config, overrides));

  app.use(errorHandler);
  return app;
}
