/**
 * Mock executor for tests and demos. Simulates latency and returns
 * deterministic strict-JSON output per role.
 * Trigger behaviors via prompt substrings:
 * - __FAIL__: always returns execution error
 * - __MALFORMED__: returns prose with no findings in any recognised shape
 */

import type { Role } from "../types.js";
import type { Executor, ExecutionRequest, ExecutionResult } from "./types.js";

interface MockFinding {
  severity: string;
  description: string;
  recommendation: string;
}

const SHARED: MockFinding = {
  severity: "Medium",
  description: "Missing input validation on exported entry point",
  recommendation: "Validate arguments at the module boundary",
};

/** Deterministic findings by role; every role also raises SHARED. */
const BY_ROLE: Record<Role, MockFinding[]> = {
  quality: [],
  implementation: [],
  design: [
    {
      severity: "Low",
      description: "Module mixes file access with domain logic",
      recommendation: "Move I/O behind an interface",
    },
  ],
  complexity: [
    {
      severity: "Medium",
      description: "Unit is large enough to hide unrelated responsibilities",
      recommendation: "Split into smaller modules",
    },
  ],
};

const HEALTH: Record<Role, number> = { quality: 7, implementation: 6.5, design: 7.5, complexity: 5 };

/** Random delay between min and max ms */
function delay(minMs: number, maxMs: number): Promise<void> {
  const ms = minMs + Math.random() * (maxMs - minMs);
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function mockOutput(role: Role, location: string): string {
  return JSON.stringify({
    findings: [SHARED, ...BY_ROLE[role]].map((f) => ({ ...f, location })),
    healthScore: HEALTH[role],
  });
}

export const mockExecutor: Executor = {
  async execute(req: ExecutionRequest): Promise<ExecutionResult> {
    const start = Date.now();
    await delay(5, 20);

    if (req.prompt.includes("__FAIL__")) {
      return {
        status: "error",
        outputText: "",
        error: "Forced failure for testing",
        latencyMs: Date.now() - start,
      };
    }

    const outputText = req.prompt.includes("__MALFORMED__")
      ? "Looked through the files; nothing stood out to me."
      : mockOutput(req.role, req.resources[0] ?? req.workUnitId);

    return {
      status: "ok",
      outputText,
      usage: {
        inputTokens: req.prompt.length,
        outputTokens: outputText.length,
      },
      latencyMs: Date.now() - start,
    };
  },
};
