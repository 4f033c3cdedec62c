#!/usr/bin/env node
/**
 * Review sweep demo.
 * Usage: tsx scripts/runSweep.ts [corpus.json] [--model mock|gpt-*|claude-*] [--json] [--out report.md]
 * Ctrl-C cancels the run; in-flight workers are aborted.
 */

import { readFile, writeFile } from "fs/promises";
import { CorpusSchema, formatIssues } from "../src/lib/schemas/sweep.js";
import { DEFAULT_MODEL_ID, createExecutor, createExecutorInvoker } from "../src/executor/index.js";
import { renderMarkdown } from "../src/lib/report/renderMarkdown.js";
import { executeSweep } from "../src/runSweep.js";
import { ConfigurationError, CoverageCollapseError, errorMessage } from "../src/errors.js";
import type { FinalReport } from "../src/types.js";

const DEFAULT_CORPUS = "fixtures/demo-corpus.json";

function parseArgs(): { corpusPath: string; modelId: string; json: boolean; out: string | null } {
  const args = process.argv.slice(2);
  let corpusPath = DEFAULT_CORPUS;
  let modelId = DEFAULT_MODEL_ID;
  let json = false;
  let out: string | null = null;
  for (let i = 0; i < args.length; i++) {
    if (args[i] === "--json") json = true;
    else if (args[i] === "--model" && args[i + 1]) modelId = args[++i];
    else if (args[i] === "--out" && args[i + 1]) out = args[++i];
    else if (!args[i].startsWith("--")) corpusPath = args[i];
  }
  return { corpusPath, modelId, json, out };
}

async function emit(report: FinalReport, json: boolean, out: string | null): Promise<void> {
  const text = json ? JSON.stringify(report, null, 2) : renderMarkdown(report);
  if (out) {
    await writeFile(out, text);
    console.log(`[runSweep] report written to ${out}`);
  } else {
    console.log(text);
  }
}

async function main(): Promise<void> {
  const { corpusPath, modelId, json, out } = parseArgs();
  const parsed = CorpusSchema.safeParse(JSON.parse(await readFile(corpusPath, "utf-8")));
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid corpus in ${corpusPath}`, formatIssues(parsed.error.issues));
  }

  const controller = new AbortController();
  process.once("SIGINT", () => {
    console.warn("[runSweep] cancelling...");
    controller.abort();
  });

  try {
    const { report } = await executeSweep(parsed.data, {
      invoker: createExecutorInvoker(createExecutor(modelId), modelId),
      signal: controller.signal,
    });
    await emit(report, json, out);
  } catch (err) {
    if (!(err instanceof CoverageCollapseError)) throw err;
    await emit(err.report, json, out);
    process.exitCode = 2;
  }
}

main().catch((err) => {
  console.error(`[runSweep] ${errorMessage(err)}`);
  process.exit(1);
});
