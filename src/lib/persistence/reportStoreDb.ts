/**
 * DB-backed ReportStore. Used when PERSISTENCE_DRIVER=db.
 * Reports are stored as jsonb and re-validated on the way out.
 */

import { desc, eq } from "drizzle-orm";
import { getDb } from "../db/index.js";
import { sweepReports } from "../db/schema.js";
import { FinalReportSchema, SweepStatusSchema, formatIssues } from "../schemas/sweep.js";
import type { ReportStore, SweepListItem, SweepRecord } from "./reportStore.js";
import { REPORTS_CAP, toListItem } from "./reportStore.js";

type SweepRow = typeof sweepReports.$inferSelect;

function fromRow(row: SweepRow): SweepRecord | undefined {
  const report = FinalReportSchema.safeParse(row.report);
  const status = SweepStatusSchema.safeParse(row.status);
  if (!report.success || !status.success) {
    const issues = report.success ? [] : formatIssues(report.error.issues);
    console.warn(`[reportStoreDb] Skipping unreadable report ${row.runId}: ${issues.join("; ") || "bad status"}`);
    return undefined;
  }
  return {
    runId: row.runId,
    createdAtISO: row.createdAt.toISOString(),
    status: status.data,
    modelId: row.modelId,
    report: report.data,
  };
}

export class DbReportStore implements ReportStore {
  private async prune(): Promise<void> {
    const db = getDb();
    const rows = await db
      .select({ runId: sweepReports.runId })
      .from(sweepReports)
      .orderBy(desc(sweepReports.createdAt));
    for (const r of rows.slice(REPORTS_CAP)) {
      await db.delete(sweepReports).where(eq(sweepReports.runId, r.runId));
    }
  }

  async save(record: SweepRecord): Promise<void> {
    const db = getDb();
    const values = {
      runId: record.runId,
      createdAt: new Date(record.createdAtISO),
      status: record.status,
      modelId: record.modelId,
      report: record.report,
    };
    await db
      .insert(sweepReports)
      .values(values)
      .onConflictDoUpdate({
        target: sweepReports.runId,
        set: { status: values.status, modelId: values.modelId, report: values.report },
      });
    await this.prune();
  }

  async get(runId: string): Promise<SweepRecord | undefined> {
    const rows = await getDb().select().from(sweepReports).where(eq(sweepReports.runId, runId));
    return rows.length > 0 ? fromRow(rows[0]) : undefined;
  }

  async list(): Promise<SweepListItem[]> {
    const rows = await getDb().select().from(sweepReports).orderBy(desc(sweepReports.createdAt)).limit(REPORTS_CAP);
    return rows.flatMap((row) => {
      const record = fromRow(row);
      return record ? [toListItem(record)] : [];
    });
  }
}
