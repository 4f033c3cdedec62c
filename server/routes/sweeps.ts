import type { Request, Response } from "express";
import { ConfigurationError, CoverageCollapseError, errorMessage } from "../../src/errors.js";
import { DEFAULT_MODEL_ID, createExecutor, createExecutorInvoker } from "../../src/executor/index.js";
import type { WorkerInvoker } from "../../src/lib/execution/dispatcher.js";
import { getReportStore, type SweepRecord } from "../../src/lib/persistence/reportStore.js";
import { renderMarkdown } from "../../src/lib/report/renderMarkdown.js";
import { SweepRequestSchema, formatIssues } from "../../src/lib/schemas/sweep.js";
import { executeSweep } from "../../src/runSweep.js";

function paramId(req: Request, name: string): string {
  const v = req.params[name];
  return Array.isArray(v) ? v[0] ?? "" : (v ?? "");
}

function sendError(res: Response, status: number, code: string, message: string, extra: Record<string, unknown> = {}) {
  return res.status(status).json({ success: false, error: { code, message }, ...extra });
}

function invokerFor(modelId: string): WorkerInvoker {
  try {
    return createExecutorInvoker(createExecutor(modelId), modelId);
  } catch (e) {
    throw new ConfigurationError(`Cannot create executor for ${modelId}: ${errorMessage(e)}`);
  }
}

export async function sweepsPost(req: Request, res: Response) {
  const parsed = SweepRequestSchema.safeParse(req.body);
  if (!parsed.success) {
    return sendError(res, 400, "VALIDATION_ERROR", "Invalid sweep request", {
      details: formatIssues(parsed.error.issues),
    });
  }
  const { corpus, config, modelId = DEFAULT_MODEL_ID } = parsed.data;
  const store = getReportStore();

  try {
    const { report } = await executeSweep(corpus, { invoker: invokerFor(modelId), config: config ?? {} });
    const record: SweepRecord = {
      runId: report.runId,
      createdAtISO: report.generatedAtISO,
      status: report.warning ? "incomplete" : "ok",
      modelId,
      report,
    };
    await store.save(record);
    res.status(201).json({ success: true, runId: report.runId, status: record.status, report });
  } catch (e) {
    if (e instanceof ConfigurationError) {
      return sendError(res, 400, e.code, e.message, { details: e.issues });
    }
    if (e instanceof CoverageCollapseError) {
      await store.save({
        runId: e.report.runId,
        createdAtISO: e.report.generatedAtISO,
        status: "coverage_collapse",
        modelId,
        report: e.report,
      });
      return sendError(res, 422, e.code, e.message, { runId: e.report.runId, report: e.report });
    }
    console.error("[sweeps] POST failed:", errorMessage(e));
    return sendError(res, 500, "INTERNAL_ERROR", errorMessage(e));
  }
}

export async function sweepsGet(_req: Request, res: Response) {
  try {
    res.json({ success: true, sweeps: await getReportStore().list() });
  } catch (e) {
    sendError(res, 500, "INTERNAL_ERROR", errorMessage(e));
  }
}

async function loadRecord(req: Request, res: Response): Promise<SweepRecord | undefined> {
  const id = paramId(req, "id");
  const record = await getReportStore().get(id);
  if (!record) sendError(res, 404, "NOT_FOUND", `Sweep ${id} not found`);
  return record;
}

export async function sweepByIdGet(req: Request, res: Response) {
  try {
    const record = await loadRecord(req, res);
    if (record) res.json({ success: true, sweep: record });
  } catch (e) {
    sendError(res, 500, "INTERNAL_ERROR", errorMessage(e));
  }
}

export async function sweepMarkdownGet(req: Request, res: Response) {
  try {
    const record = await loadRecord(req, res);
    if (record) res.type("text/markdown").send(renderMarkdown(record.report));
  } catch (e) {
    sendError(res, 500, "INTERNAL_ERROR", errorMessage(e));
  }
}
