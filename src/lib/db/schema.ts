/**
 * Drizzle schema for sweep persistence.
 */

import { pgTable, text, timestamp, jsonb } from "drizzle-orm/pg-core";

/** One row per finished sweep; the full FinalReport lives in jsonb. */
export const sweepReports = pgTable("sweep_reports", {
  runId: text("run_id").primaryKey(),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull(),
  status: text("status").notNull(),
  modelId: text("model_id").notNull(),
  report: jsonb("report").notNull(),
});
