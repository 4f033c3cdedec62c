/**
 * Worker backend abstraction. An Executor turns one prompt into text;
 * createExecutorInvoker adapts it to the dispatcher's WorkerInvoker.
 */

import type { Role } from "../types.js";

export type ExecutionStatus = "ok" | "error";

export interface ExecutionRequest {
  workUnitId: string;
  role: Role;
  resources: readonly string[];
  modelId: string;
  prompt: string;
  signal?: AbortSignal;
}

export interface ExecutionResult {
  status: ExecutionStatus;
  outputText: string;
  error?: string;
  usage?: {
    inputTokens?: number;
    outputTokens?: number;
  };
  latencyMs?: number;
}

export interface Executor {
  execute(req: ExecutionRequest): Promise<ExecutionResult>;
}
