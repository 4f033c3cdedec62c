/**
 * Adapts an Executor to the dispatcher's WorkerInvoker. An executor error
 * becomes an InvocationError so the dispatcher retries it like any failure.
 */

import { InvocationError } from "../errors.js";
import type { WorkerInvoker } from "../lib/execution/dispatcher.js";
import { debugLog } from "../utils/debug.js";
import { buildWorkerPrompt } from "./prompts.js";
import type { Executor } from "./types.js";

export function createExecutorInvoker(executor: Executor, modelId: string): WorkerInvoker {
  return {
    async invoke(unit, role, promptPayload, signal) {
      const result = await executor.execute({
        workUnitId: unit.id,
        role,
        resources: unit.resourcePatterns,
        modelId,
        prompt: buildWorkerPrompt(role, promptPayload),
        signal,
      });
      if (result.status === "error") {
        throw new InvocationError(`${unit.id}/${role} via ${modelId}: ${result.error ?? "executor error"}`);
      }
      debugLog(
        `[Executor] ${unit.id}/${role} ${modelId} ok in ${result.latencyMs ?? "?"}ms, ${result.usage?.outputTokens ?? "?"} output tokens`
      );
      return result.outputText;
    },
  };
}
