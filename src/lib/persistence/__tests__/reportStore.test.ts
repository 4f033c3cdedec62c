import { describe, it, expect } from "vitest";
import { getPersistenceDriver } from "../driver.js";
import { InMemoryReportStore, toListItem, type SweepRecord } from "../reportStore.js";
import { FinalReportSchema } from "../../schemas/sweep.js";
import { computeInvocationStats, synthesizeReport } from "../../report/synthesizeReport.js";
import { aggregateWorkUnit } from "../../consensus/aggregateVotes.js";
import { THRESHOLDS, finding, makeRoster, makeUnit, outcomes } from "../../consensus/__tests__/fixtures.js";

function record(runId: string, createdAtISO: string): SweepRecord {
  const unit = makeUnit("U1");
  const medium = [finding("Medium", "src/a.ts", "Missing input validation")];
  const { invocations, parsed } = outcomes(unit, { quality: medium, implementation: medium, design: medium });
  const tally = aggregateWorkUnit({
    unit,
    roster: makeRoster(unit),
    invocations,
    parsed,
    thresholds: THRESHOLDS,
    similarityThreshold: 0.5,
  });
  const report = synthesizeReport({
    runId,
    generatedAtISO: createdAtISO,
    units: [tally],
    verifications: [],
    stats: computeInvocationStats(invocations, ["strict", "strict", "strict"]),
    minCoveragePct: 70,
    similarityThreshold: 0.5,
  });
  return { runId, createdAtISO, status: "ok", modelId: "mock", report };
}

describe("getPersistenceDriver", () => {
  it("defaults to file and accepts db in any case", () => {
    expect(getPersistenceDriver({})).toBe("file");
    expect(getPersistenceDriver({ PERSISTENCE_DRIVER: "DB" })).toBe("db");
    expect(getPersistenceDriver({ PERSISTENCE_DRIVER: "sqlite" })).toBe("file");
  });
});

describe("InMemoryReportStore", () => {
  it("returns saved records and lists them newest first", async () => {
    const store = new InMemoryReportStore();
    await store.save(record("a", "2026-01-01T00:00:00.000Z"));
    await store.save(record("b", "2026-01-02T00:00:00.000Z"));

    expect((await store.get("a"))?.runId).toBe("a");
    expect(await store.get("missing")).toBeUndefined();
    const list = await store.list();
    expect(list.map((i) => i.runId)).toEqual(["b", "a"]);
    expect(list[0]).toEqual({
      runId: "b",
      createdAtISO: "2026-01-02T00:00:00.000Z",
      status: "ok",
      modelId: "mock",
      overallPct: 100,
      acceptedFindings: 1,
    });
  });

  it("drops the oldest records past its cap", async () => {
    const store = new InMemoryReportStore(2);
    await store.save(record("a", "2026-01-01T00:00:00.000Z"));
    await store.save(record("b", "2026-01-02T00:00:00.000Z"));
    await store.save(record("c", "2026-01-03T00:00:00.000Z"));
    expect((await store.list()).map((i) => i.runId)).toEqual(["c", "b"]);
  });
});

describe("FinalReportSchema", () => {
  it("accepts a synthesized report after a JSON round trip", () => {
    const r = record("json", "2026-01-01T00:00:00.000Z");
    const parsed = FinalReportSchema.safeParse(JSON.parse(JSON.stringify(r.report)));
    expect(parsed.success).toBe(true);
    expect(toListItem(r).acceptedFindings).toBe(1);
  });
});
