/**
 * Worker prompt: role brief + output contract + caller payload.
 */

import type { Role } from "../types.js";

export const ROLE_BRIEFS: Record<Role, string> = {
  quality: "You review code quality: naming, duplication, error handling and test gaps.",
  implementation: "You review implementation correctness: logic errors, edge cases, races and resource leaks.",
  design: "You review design: module boundaries, coupling, layering and API shape.",
  complexity: "You review complexity: oversized functions and modules, deep nesting and hidden state.",
};

export const OUTPUT_CONTRACT = [
  "Answer with one JSON object and nothing else:",
  '{"findings":[{"severity":"Critical|High|Medium|Low|Info","location":"path[:line]","description":"...","recommendation":"..."}],',
  ' "healthScore": 0-10,',
  ' "mutations":[{"target":"path","signal":"exists|absent|contains|modified|unmodified","pattern":"..."}]}',
  "Use an empty findings list when there is nothing to report. List mutations only for files you changed.",
].join("\n");

export function buildWorkerPrompt(role: Role, payload: string): string {
  return `${ROLE_BRIEFS[role]}\n\n${OUTPUT_CONTRACT}\n\n${payload}`;
}
