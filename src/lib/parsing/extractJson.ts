/**
 * Lenient JSON extraction from free-form worker output: strips markdown
 * fences, then scans for the first balanced {} / [] value that parses.
 */

const MAX_CANDIDATES = 50;

export function stripMarkdownFences(text: string): string {
  const s = text.trim();
  const fence = /^```[a-zA-Z]*\s*\n?([\s\S]*?)\n?```\s*$/;
  const m = s.match(fence);
  if (m) return m[1].trim();
  const open = s.indexOf("```");
  if (open >= 0) {
    const after = s.slice(open + 3).replace(/^[a-zA-Z]*\s*\n/, "");
    const close = after.indexOf("```");
    return (close >= 0 ? after.slice(0, close) : after).trim();
  }
  return s;
}

/**
 * Returns the end index (exclusive) of the balanced value starting at `start`,
 * or -1 when the text ends first. Tracks {} and [] nesting plus string mode
 * with backslash escapes.
 */
export function scanBalanced(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escape = false;
  for (let i = start; i < text.length; i++) {
    const c = text[i];
    if (escape) {
      escape = false;
      continue;
    }
    if (inString) {
      if (c === "\\") escape = true;
      else if (c === '"') inString = false;
      continue;
    }
    if (c === '"') inString = true;
    else if (c === "{" || c === "[") depth++;
    else if (c === "}" || c === "]") {
      depth--;
      if (depth === 0) return i + 1;
      if (depth < 0) return -1;
    }
  }
  return -1;
}

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/** First JSON object or array embedded in `text`, or undefined when there is none. */
export function extractFirstJsonValue(text: string): unknown {
  const stripped = stripMarkdownFences(text);
  const first = stripped[0];
  if (first === "{" || first === "[") {
    const whole = tryParse(stripped);
    if (whole.ok) return whole.value;
  }

  let candidates = 0;
  for (let i = 0; i < stripped.length && candidates < MAX_CANDIDATES; i++) {
    const c = stripped[i];
    if (c !== "{" && c !== "[") continue;
    candidates++;
    const end = scanBalanced(stripped, i);
    if (end < 0) continue;
    const parsed = tryParse(stripped.slice(i, end));
    if (parsed.ok) return parsed.value;
  }
  return undefined;
}

/** The whole output as one JSON value once fences are stripped, else undefined. */
export function parseWholeJson(text: string): unknown {
  const parsed = tryParse(stripMarkdownFences(text));
  return parsed.ok ? parsed.value : undefined;
}
