import type { Request, Response } from "express";
import { getPersistenceDriver } from "../../src/lib/persistence/driver.js";

export function healthGet(_req: Request, res: Response) {
  res.json({ success: true, status: "ok", persistence: getPersistenceDriver() });
}
