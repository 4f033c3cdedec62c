import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { defaultPromptPayload, executeSweep, type RunSweepOptions } from "../runSweep.js";
import { ConfigurationError, CoverageCollapseError } from "../errors.js";
import type { WorkerInvoker } from "../lib/execution/dispatcher.js";
import type { Corpus, RunConfigOverrides } from "../lib/schemas/sweep.js";
import type { RunLogEvent } from "../runLog.js";

function corpus(...ids: string[]): Corpus {
  return { shards: ids.map((id) => ({ id, resourcePatterns: [`${id}/**`], estimatedSize: 10 })) };
}

const quick: RunConfigOverrides = { invocationTimeoutS: 0.05, retryBackoffS: 0, verificationDelayMs: 0 };

function options(invoker: WorkerInvoker, extra: Partial<RunSweepOptions> = {}): RunSweepOptions {
  return {
    invoker,
    checker: { check: async () => true },
    config: quick,
    baseConfig: {},
    runId: "run-test",
    now: () => new Date("2026-01-01T00:00:00.000Z"),
    logPath: null,
    ...extra,
  };
}

/** Never settles on its own; rejects with the abort reason. */
function hang(signal: AbortSignal): Promise<string> {
  return new Promise((_, reject) => {
    signal.addEventListener("abort", () => reject(signal.reason), { once: true });
  });
}

const tokenExpiry = JSON.stringify({
  findings: [{ severity: "High", location: "src/auth.ts", description: "Token expiry not checked" }],
  healthScore: 7,
});
const clean = JSON.stringify({ findings: [] });

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("executeSweep", () => {
  it("reports INCOMPLETE_ANALYSIS naming a unit whose workers all timed out", async () => {
    const invoker: WorkerInvoker = {
      invoke: (unit, _role, _payload, signal) =>
        unit.id === "U7" ? hang(signal) : Promise.resolve(unit.id === "U1" ? tokenExpiry : clean),
    };
    const { report, invocations } = await executeSweep(corpus("U1", "U2", "U7"), options(invoker));

    expect(report.coverage.units.map((u) => [u.workUnitId, u.status])).toEqual([
      ["U1", "Full"],
      ["U2", "Full"],
      ["U7", "Skipped"],
    ]);
    expect(report.warning?.code).toBe("INCOMPLETE_ANALYSIS");
    expect(report.warning?.workUnitIds).toEqual(["U7"]);
    expect(report.warning?.message).toBe(
      "Only 66.7% of work units reached minimum coverage (threshold 70%). Degraded or skipped: U7"
    );
    expect(report.stats.total).toBe(9);
    expect(report.stats.byStatus.TimedOut).toBe(3);
    expect(report.stats.retried).toBe(3);
    expect(invocations.filter((i) => i.workUnitId === "U7").map((i) => i.attemptCount)).toEqual([2, 2, 2]);

    expect(report.priorities.P2).toHaveLength(1);
    expect(report.priorities.P2[0].location).toBe("src/auth.ts");
    expect(report.coverage.units[0].healthScore).toBe(7);
  });

  it("marks undecodable output Malformed and leaves it out of the vote", async () => {
    const invoker: WorkerInvoker = {
      invoke: async (unit, role) => {
        if (unit.id !== "U1") return clean;
        if (role === "quality") return "I looked around and it seems fine.";
        if (role === "implementation") return "## High\n- `src/auth.ts` - Token expiry not checked";
        return tokenExpiry;
      },
    };
    const { report } = await executeSweep(corpus("U1", "U2"), options(invoker));

    const u1 = report.coverage.units[0];
    expect(u1.status).toBe("Partial");
    expect(u1.malformedRoles).toEqual(["quality"]);
    expect(u1.survivingRoles).toEqual(["implementation", "design"]);
    expect(u1.survivingWeight).toBeCloseTo(2.2);
    expect(report.stats.byStatus.Malformed).toBe(1);
    expect(report.stats.byParseStage).toEqual({ strict: 4, sections: 1, line_items: 0 });

    const [entry] = report.priorities.P2;
    expect(entry.unanimous).toBe(true);
    expect(entry.provenance[0].sourceRoles).toEqual(["implementation", "design"]);
  });

  it("verifies claimed mutations and escalates the ones never observed", async () => {
    const withClaims = JSON.stringify({
      findings: [],
      mutations: [{ target: "out/report.md" }, { target: "out/missing.md" }],
    });
    const invoker: WorkerInvoker = {
      invoke: async (unit, role) => (unit.id === "U1" && role === "design" ? withClaims : clean),
    };
    const { report } = await executeSweep(
      corpus("U1", "U2"),
      options(invoker, {
        checker: { check: async (target) => target === "out/report.md" },
        config: { ...quick, verificationRetries: 1 },
      })
    );

    expect(report.verifications).toEqual({ verified: 1, escalated: 1 });
    expect(report.escalations).toHaveLength(1);
    const [escalation] = report.escalations;
    expect(escalation.claim.targetResource).toBe("out/missing.md");
    expect(escalation.claim.invocation).toEqual({ workUnitId: "U1", role: "design" });
    expect(escalation.attempts).toBe(2);
    expect(escalation.evidenceTrail).toEqual([
      "out/missing.md: expected exists not observed (attempt 1)",
      "out/missing.md: expected exists not observed (attempt 2)",
    ]);
  });

  it("finishes the report when a ground-truth check never answers", async () => {
    const withClaim = JSON.stringify({ findings: [], mutations: [{ target: "out/stuck.md" }] });
    const invoker: WorkerInvoker = {
      invoke: async (unit, role) => (unit.id === "U1" && role === "quality" ? withClaim : clean),
    };
    const { report } = await executeSweep(
      corpus("U1", "U2"),
      options(invoker, {
        checker: { check: () => new Promise<boolean>(() => undefined) },
        config: { ...quick, verificationRetries: 1 },
      })
    );

    expect(report.verifications).toEqual({ verified: 0, escalated: 1 });
    expect(report.escalations[0].claim.targetResource).toBe("out/stuck.md");
    expect(report.escalations[0].attempts).toBe(2);
    expect(report.escalations[0].diagnosis).toMatch(/^Ground-truth check failed on every attempt: check timed out after/);
  });

  it("lets cancellation end a pending ground-truth check", async () => {
    const controller = new AbortController();
    const withClaim = JSON.stringify({ findings: [], mutations: [{ target: "out/stuck.md" }] });
    const invoker: WorkerInvoker = {
      invoke: async (unit, role) => (unit.id === "U1" && role === "quality" ? withClaim : clean),
    };
    setTimeout(() => controller.abort(), 20);
    const { report } = await executeSweep(
      corpus("U1", "U2"),
      options(invoker, {
        checker: { check: () => new Promise<boolean>(() => undefined) },
        signal: controller.signal,
        config: { ...quick, invocationTimeoutS: 5 },
      })
    );

    expect(report.escalations).toHaveLength(1);
    expect(report.escalations[0].diagnosis).toBe("Verification cancelled before the retry budget was spent");
  });

  it("throws CoverageCollapseError with the partial report when every worker fails", async () => {
    const invoker: WorkerInvoker = {
      invoke: async () => {
        throw new Error("backend unavailable");
      },
    };
    const err = await executeSweep(corpus("U1", "U2"), options(invoker, { config: { ...quick, retryBudget: 0 } })).catch(
      (e: unknown) => e
    );

    expect(err).toBeInstanceOf(CoverageCollapseError);
    if (!(err instanceof CoverageCollapseError)) return;
    expect(err.report.stats.byStatus.Failed).toBe(6);
    expect(err.report.coverage.units.map((u) => u.status)).toEqual(["Skipped", "Skipped"]);
    expect(err.report.coverage.overallPct).toBe(0);
  });

  it("ends in-flight invocations as Failed when the run is cancelled", async () => {
    const controller = new AbortController();
    const started: string[] = [];
    const invoker: WorkerInvoker = {
      invoke: (unit, role, _payload, signal) => {
        started.push(`${unit.id}/${role}`);
        if (started.length === 6) setTimeout(() => controller.abort(), 5);
        return hang(signal);
      },
    };
    const err = await executeSweep(
      corpus("U1", "U2"),
      options(invoker, { signal: controller.signal, config: { ...quick, invocationTimeoutS: 5 } })
    ).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(CoverageCollapseError);
    if (!(err instanceof CoverageCollapseError)) return;
    expect(err.report.stats.byStatus.Failed).toBe(6);
    expect(err.report.stats.retried).toBe(0);
    expect(started).toHaveLength(6);
  });

  it("rejects invalid configuration before any worker runs", async () => {
    const invoke = vi.fn(async () => clean);
    await expect(
      executeSweep(corpus("U1"), options({ invoke }, { config: { concurrencyLimit: 0 } }))
    ).rejects.toBeInstanceOf(ConfigurationError);
    expect(invoke).not.toHaveBeenCalled();
  });

  it("appends one run log event and passes the default prompt payload", async () => {
    const dir = await mkdtemp(join(tmpdir(), "sweep-log-"));
    const logPath = join(dir, "runs.jsonl");
    const payloads = new Map<string, string>();
    const invoker: WorkerInvoker = {
      invoke: async (unit, role, payload) => {
        payloads.set(`${unit.id}/${role}`, payload);
        return unit.id === "U1" ? tokenExpiry : clean;
      },
    };
    try {
      await executeSweep(corpus("U1", "U2"), options(invoker, { logPath, runId: "run-log" }));
      const lines = (await readFile(logPath, "utf-8")).trim().split("\n");
      expect(lines).toHaveLength(1);
      const event: RunLogEvent = JSON.parse(lines[0]);
      expect(event.runId).toBe("run-log");
      expect(event.ts).toBe("2026-01-01T00:00:00.000Z");
      expect(event.workUnits).toBe(2);
      expect(event.findings).toEqual({ accepted: 1, minority: 0, crossCutting: 0 });
      expect(event.final).toEqual({ status: "ok" });
    } finally {
      await rm(dir, { recursive: true, force: true });
    }

    expect(payloads.get("U1/quality")).toBe(
      JSON.stringify({ workUnit: { id: "U1", label: "U1", resources: ["U1/**"] }, role: "quality" })
    );
    expect(payloads.get("U2/design")).toBe(
      defaultPromptPayload(
        { id: "U2", label: "U2", resourcePatterns: ["U2/**"], estimatedSize: 10, isOversized: false },
        "design"
      )
    );
  });
});
