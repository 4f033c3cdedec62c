import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { createExecutor, createExecutorInvoker } from "../index.js";
import { mockExecutor } from "../mockExecutor.js";
import { ROLE_BRIEFS } from "../prompts.js";
import type { Executor, ExecutionRequest } from "../types.js";
import { InvocationError } from "../../errors.js";
import { parseWorkerOutput } from "../../lib/parsing/outputParser.js";
import { executeSweep } from "../../runSweep.js";
import type { WorkUnit } from "../../types.js";

const unit: WorkUnit = {
  id: "U1",
  label: "src/auth",
  resourcePatterns: ["src/auth/token.ts", "src/auth/session.ts"],
  estimatedSize: 40,
  isOversized: false,
};

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("createExecutorInvoker", () => {
  it("sends the role brief and payload and returns the output text", async () => {
    const requests: ExecutionRequest[] = [];
    const executor: Executor = {
      execute: async (req) => {
        requests.push(req);
        return { status: "ok", outputText: '{"findings":[]}' };
      },
    };
    const signal = new AbortController().signal;
    const out = await createExecutorInvoker(executor, "test-model").invoke(unit, "design", "PAYLOAD", signal);

    expect(out).toBe('{"findings":[]}');
    expect(requests).toHaveLength(1);
    expect(requests[0].role).toBe("design");
    expect(requests[0].modelId).toBe("test-model");
    expect(requests[0].resources).toEqual(["src/auth/token.ts", "src/auth/session.ts"]);
    expect(requests[0].signal).toBe(signal);
    expect(requests[0].prompt.startsWith(ROLE_BRIEFS.design)).toBe(true);
    expect(requests[0].prompt.endsWith("\n\nPAYLOAD")).toBe(true);
  });

  it("turns an executor error into an InvocationError", async () => {
    const invoker = createExecutorInvoker(mockExecutor, "mock");
    const err = await invoker.invoke(unit, "quality", "__FAIL__", new AbortController().signal).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(InvocationError);
    expect(err instanceof Error ? err.message : "").toBe("U1/quality via mock: Forced failure for testing");
  });
});

describe("mockExecutor", () => {
  it("returns strict output located at the unit's first resource", async () => {
    const invoker = createExecutorInvoker(mockExecutor, "mock");
    const raw = await invoker.invoke(unit, "design", "{}", new AbortController().signal);
    const parsed = parseWorkerOutput(raw);

    expect(parsed?.stage).toBe("strict");
    expect(parsed?.healthScore).toBe(7.5);
    expect(parsed?.findings.map((f) => [f.severity, f.location])).toEqual([
      ["Medium", "src/auth/token.ts"],
      ["Low", "src/auth/token.ts"],
    ]);
  });

  it("returns output no decoder stage accepts on __MALFORMED__", async () => {
    const invoker = createExecutorInvoker(mockExecutor, "mock");
    const raw = await invoker.invoke(unit, "quality", "__MALFORMED__", new AbortController().signal);
    expect(parseWorkerOutput(raw)).toBeNull();
  });

  it("is what createExecutor returns for unknown model ids", () => {
    expect(createExecutor("mock")).toBe(mockExecutor);
    expect(createExecutor("local-review")).toBe(mockExecutor);
  });

  it("drives a full sweep: shared finding accepted, lone design note kept as minority", async () => {
    const { report } = await executeSweep(
      {
        shards: [
          { id: "U1", resourcePatterns: ["src/auth/token.ts"], estimatedSize: 10 },
          { id: "U2", resourcePatterns: ["src/billing/invoice.ts"], estimatedSize: 10 },
        ],
      },
      { invoker: createExecutorInvoker(mockExecutor, "mock"), baseConfig: {}, logPath: null }
    );

    expect(report.priorities.P4.map((f) => f.location)).toEqual(["src/auth/token.ts", "src/billing/invoice.ts"]);
    expect(report.minority.map((m) => [m.workUnitId, m.severity, m.sourceRoles])).toEqual([
      ["U1", "Low", ["design"]],
      ["U2", "Low", ["design"]],
    ]);
    expect(report.coverage.units.map((u) => u.healthScore)).toEqual([7, 7]);
  });
});
