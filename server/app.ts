/**
 * Express app: JSON API only. index.ts binds it to a port.
 */

import express, { type Express } from "express";
import cors from "cors";
import { registerApiRoutes } from "./routes/index.js";

export function createApp(): Express {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: "10mb" }));
  registerApiRoutes(app);
  app.use("/api", (_req, res) => {
    res.status(404).json({ success: false, error: { code: "NOT_FOUND", message: "Unknown API route" } });
  });
  return app;
}
