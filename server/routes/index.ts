/**
 * API route registration for Express.
 * Mounts all routes under /api via a dedicated router.
 */

import express, { type Express } from "express";
import * as health from "./health.js";
import * as sweeps from "./sweeps.js";

export function registerApiRoutes(app: Express): void {
  const api = express.Router();

  api.get("/health", health.healthGet);

  // Sweeps
  api.post("/sweeps", sweeps.sweepsPost);
  api.get("/sweeps", sweeps.sweepsGet);
  api.get("/sweeps/:id", sweeps.sweepByIdGet);
  api.get("/sweeps/:id/markdown", sweeps.sweepMarkdownGet);

  app.use("/api", api);
}
