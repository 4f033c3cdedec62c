/**
 * Worker output decoder. Three stages, first well-formed result wins:
 *   1. strict:     JSON envelope (fenced or embedded in prose), zod-validated
 *   2. sections:   "## Critical" / "### High (2)" headers followed by bullet items
 *   3. line_items: "[HIGH] path:12 - text" or "- **Medium** text" lines
 * Each stage is pure. null from every stage means the output is Malformed.
 */

// ─── src/lib/parsing/outputParser.ts ────────────────────────────────────────

import {
  WorkerFindingSchema,
  WorkerMutationSchema,
  WorkerOutputEnvelopeSchema,
} from "../schemas/sweep.js";
import type { ClaimedMutation, ExpectedSignal, ParseStage, ParsedOutput, RawFinding, Severity } from "../../types.js";
import { extractFirstJsonValue, parseWholeJson } from "./extractJson.js";

export type DecodeStage = (raw: string) => ParsedOutput | null;

export const UNSPECIFIED_LOCATION = "(unspecified)";

// ─── Severity words ──────────────────────────────────────────────────────────

const SEVERITY_WORDS: Record<string, Severity> = {
  critical: "Critical",
  blocker: "Critical",
  blocking: "Critical",
  high: "High",
  major: "High",
  important: "High",
  medium: "Medium",
  moderate: "Medium",
  warning: "Medium",
  low: "Low",
  minor: "Low",
  suggestion: "Low",
  nit: "Low",
  info: "Info",
  informational: "Info",
  note: "Info",
};

const SEVERITY_ALTERNATION = Object.keys(SEVERITY_WORDS).join("|");

export function normalizeSeverity(word: string): Severity | null {
  const key = word.trim().toLowerCase().replace(/[^a-z]/g, "");
  return SEVERITY_WORDS[key] ?? null;
}

// ─── Shared item helpers ─────────────────────────────────────────────────────

const BULLET = /^\s*(?:[-*+]|\d+[.)])\s+/;
const RECOMMENDATION_SPLIT = /\s*(?:→|->|\bfix:|\brecommendation:|\bsuggested fix:)\s*/i;
const PATH_LIKE = /^[\w@./\\-]+(?::\d+(?:-\d+)?)?$/;

/** Splits "location - description -> recommendation" item text. */
export function parseItemBody(text: string): Omit<RawFinding, "severity"> | null {
  let body = text.trim();
  if (!body) return null;

  let location = UNSPECIFIED_LOCATION;
  const ticked = body.match(/^`([^`]+)`\s*[-:—–]?\s*(.*)$/);
  const bold = body.match(/^\*\*([^*]+)\*\*\s*[-:—–]?\s*(.*)$/);
  const plain = body.match(/^(\S+)\s+[-—–]\s+(.*)$/) ?? body.match(/^(\S+?):\s+(.*)$/);
  if (ticked) {
    location = ticked[1].trim();
    body = ticked[2];
  } else if (bold && PATH_LIKE.test(bold[1].trim())) {
    location = bold[1].trim();
    body = bold[2];
  } else if (plain && PATH_LIKE.test(plain[1]) && /[/.]|:\d/.test(plain[1])) {
    location = plain[1];
    body = plain[2];
  }

  const [description, ...rest] = body.split(RECOMMENDATION_SPLIT);
  const desc = description.trim();
  if (!desc) return null;
  return { location, description: desc, recommendation: rest.join(" ").trim() };
}

const HEALTH_SCORE = /health\s*score\s*[:=]?\s*(\d+(?:\.\d+)?)\s*(?:\/\s*10)?/i;

export function extractHealthScore(raw: string): number | undefined {
  const m = raw.match(HEALTH_SCORE);
  if (!m) return undefined;
  const n = parseFloat(m[1]);
  return n >= 0 && n <= 10 ? n : undefined;
}

const MUTATION_LINE = /^\s*(?:[-*+]\s*)?(created|wrote|modified|updated|deleted|removed)\s*:\s*`?([^\s`]+)`?\s*$/i;

const MUTATION_VERBS: Record<string, ExpectedSignal> = {
  created: { kind: "exists" },
  wrote: { kind: "exists" },
  modified: { kind: "modified" },
  updated: { kind: "modified" },
  deleted: { kind: "absent" },
  removed: { kind: "absent" },
};

/** "Created: path" style side-effect claims in prose output. */
export function extractMutationLines(raw: string): ClaimedMutation[] {
  const out: ClaimedMutation[] = [];
  for (const line of raw.split(/\r?\n/)) {
    const m = line.match(MUTATION_LINE);
    if (!m) continue;
    const signal = MUTATION_VERBS[m[1].toLowerCase()];
    if (signal) out.push({ targetResource: m[2], expectedSignal: signal });
  }
  return out;
}

// ─── Stage 1: strict ─────────────────────────────────────────────────────────

function toRawFinding(item: unknown): RawFinding[] {
  const r = WorkerFindingSchema.safeParse(item);
  if (!r.success) return [];
  const severity = normalizeSeverity(r.data.severity);
  if (!severity) return [];
  return [
    {
      severity,
      location: r.data.location.trim(),
      description: r.data.description.trim(),
      recommendation: r.data.recommendation?.trim() ?? "",
    },
  ];
}

function toClaimedMutation(item: unknown): ClaimedMutation[] {
  const r = WorkerMutationSchema.safeParse(item);
  if (!r.success) return [];
  const kind = r.data.signal ?? "exists";
  if (kind === "contains") {
    return r.data.pattern ? [{ targetResource: r.data.target, expectedSignal: { kind, pattern: r.data.pattern } }] : [];
  }
  return [{ targetResource: r.data.target, expectedSignal: { kind } }];
}

function isWholeEnvelope(raw: string): boolean {
  const whole = parseWholeJson(raw);
  return typeof whole === "object" && whole !== null && !Array.isArray(whole) && "findings" in whole;
}

/**
 * An empty findings list is a valid "nothing found" answer only when the
 * whole output is a `{findings: [...]}` object. A stray `[]` in prose falls
 * through to the later stages. A non-empty list where no item survives
 * validation is never valid.
 */
export const decodeStrict: DecodeStage = (raw) => {
  const value = extractFirstJsonValue(raw);
  if (value === undefined || value === null) return null;
  const envelope = Array.isArray(value) ? { findings: value } : value;
  const r = WorkerOutputEnvelopeSchema.safeParse(envelope);
  if (!r.success) return null;

  const findings = r.data.findings.flatMap(toRawFinding);
  if (r.data.findings.length > 0 && findings.length === 0) return null;
  if (findings.length === 0 && !isWholeEnvelope(raw)) return null;

  const mutations = (r.data.mutations ?? r.data.claimed_side_effects ?? []).flatMap(toClaimedMutation);
  const healthScore = r.data.healthScore ?? r.data.health_score;
  return {
    stage: "strict",
    findings,
    mutations,
    ...(healthScore !== undefined ? { healthScore } : {}),
  };
};

// ─── Stage 2: section headers ────────────────────────────────────────────────

const SECTION_HEADER = new RegExp(
  `^\\s*#{1,6}\\s*[^\\w\\s]*\\s*(${SEVERITY_ALTERNATION})\\b\\s*(?:severity|priority|issues?|findings?)?\\s*(?:\\(\\d+\\))?\\s*:?\\s*$`,
  "i"
);
const ANY_HEADER = /^\s*#{1,6}\s/;

export const decodeSections: DecodeStage = (raw) => {
  const findings: RawFinding[] = [];
  let current: Severity | null = null;

  for (const line of raw.split(/\r?\n/)) {
    const header = line.match(SECTION_HEADER);
    if (header) {
      current = normalizeSeverity(header[1]);
      continue;
    }
    if (ANY_HEADER.test(line)) {
      current = null;
      continue;
    }
    if (!current || !BULLET.test(line)) continue;
    const item = parseItemBody(line.replace(BULLET, ""));
    if (item) findings.push({ severity: current, ...item });
  }

  if (findings.length === 0) return null;
  return finishHeuristic("sections", findings, raw);
};

// ─── Stage 3: line items ─────────────────────────────────────────────────────

const LINE_ITEM_PATTERNS: RegExp[] = [
  new RegExp(`^\\s*(?:[-*+]\\s*)?\\[(${SEVERITY_ALTERNATION})\\]\\s*[:\\-—–]?\\s*(.+)$`, "i"),
  new RegExp(`^\\s*(?:[-*+]\\s*)?\\*\\*(${SEVERITY_ALTERNATION})\\*\\*\\s*[:\\-—–]?\\s*(.+)$`, "i"),
  new RegExp(`^\\s*(?:[-*+]\\s*)?(${SEVERITY_ALTERNATION})\\s*:\\s*(.+)$`, "i"),
];

export const decodeLineItems: DecodeStage = (raw) => {
  const findings: RawFinding[] = [];
  for (const line of raw.split(/\r?\n/)) {
    for (const pattern of LINE_ITEM_PATTERNS) {
      const m = line.match(pattern);
      if (!m) continue;
      const severity = normalizeSeverity(m[1]);
      const item = parseItemBody(m[2]);
      if (severity && item) findings.push({ severity, ...item });
      break;
    }
  }
  if (findings.length === 0) return null;
  return finishHeuristic("line_items", findings, raw);
};

function finishHeuristic(stage: ParseStage, findings: RawFinding[], raw: string): ParsedOutput {
  const healthScore = extractHealthScore(raw);
  return {
    stage,
    findings,
    mutations: extractMutationLines(raw),
    ...(healthScore !== undefined ? { healthScore } : {}),
  };
}

// ─── Cascade ─────────────────────────────────────────────────────────────────

export const DECODE_CASCADE: ReadonlyArray<DecodeStage> = [decodeStrict, decodeSections, decodeLineItems];

export function parseWorkerOutput(raw: string, stages: ReadonlyArray<DecodeStage> = DECODE_CASCADE): ParsedOutput | null {
  if (!raw.trim()) return null;
  for (const stage of stages) {
    const result = stage(raw);
    if (result) return result;
  }
  return null;
}
