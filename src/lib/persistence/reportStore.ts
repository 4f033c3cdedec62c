/**
 * Sweep report sink. In-memory by default; PostgreSQL when
 * PERSISTENCE_DRIVER=db (see reportStoreDb.ts).
 */

import type { FinalReport } from "../../types.js";
import type { RunLogEvent } from "../../runLog.js";
import { getPersistenceDriver } from "./driver.js";
import { DbReportStore } from "./reportStoreDb.js";

export type SweepStatus = RunLogEvent["final"]["status"];

export interface SweepRecord {
  runId: string;
  createdAtISO: string;
  status: SweepStatus;
  modelId: string;
  report: FinalReport;
}

export interface SweepListItem {
  runId: string;
  createdAtISO: string;
  status: SweepStatus;
  modelId: string;
  overallPct: number;
  acceptedFindings: number;
}

export interface ReportStore {
  save(record: SweepRecord): Promise<void>;
  get(runId: string): Promise<SweepRecord | undefined>;
  /** Newest first. */
  list(): Promise<SweepListItem[]>;
}

export const REPORTS_CAP = 200;

export function toListItem(record: SweepRecord): SweepListItem {
  return {
    runId: record.runId,
    createdAtISO: record.createdAtISO,
    status: record.status,
    modelId: record.modelId,
    overallPct: record.report.coverage.overallPct,
    acceptedFindings: Object.values(record.report.priorities).reduce((n, tier) => n + tier.length, 0),
  };
}

export class InMemoryReportStore implements ReportStore {
  private readonly records = new Map<string, SweepRecord>();

  constructor(private readonly cap: number = REPORTS_CAP) {}

  async save(record: SweepRecord): Promise<void> {
    this.records.set(record.runId, record);
    if (this.records.size <= this.cap) return;
    const oldest = [...this.records.values()]
      .sort((a, b) => a.createdAtISO.localeCompare(b.createdAtISO))
      .slice(0, this.records.size - this.cap);
    for (const r of oldest) this.records.delete(r.runId);
  }

  async get(runId: string): Promise<SweepRecord | undefined> {
    return this.records.get(runId);
  }

  async list(): Promise<SweepListItem[]> {
    return [...this.records.values()]
      .map(toListItem)
      .sort((a, b) => b.createdAtISO.localeCompare(a.createdAtISO));
  }
}

let store: ReportStore | null = null;

export function getReportStore(): ReportStore {
  if (!store) {
    store = getPersistenceDriver() === "db" ? new DbReportStore() : new InMemoryReportStore();
  }
  return store;
}

/** Test hook: replace (or drop, with null) the process-wide store. */
export function setReportStore(next: ReportStore | null): void {
  store = next;
}
