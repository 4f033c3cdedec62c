/**
 * JSONL run log. One JSON line per finished sweep.
 */

import { mkdir, appendFile } from "fs/promises";
import { dirname } from "path";

export const DEFAULT_SWEEP_LOG_PATH = "./runs/sweeps.jsonl";

export function getSweepLogPath(): string {
  const fromEnv = process.env.SWEEP_LOG_PATH?.trim();
  return fromEnv ? fromEnv : DEFAULT_SWEEP_LOG_PATH;
}

/**
 * Creates the parent directory when missing, then appends the event as one line.
 */
export async function appendJsonl(path: string, event: unknown): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await appendFile(path, JSON.stringify(event) + "\n");
}
