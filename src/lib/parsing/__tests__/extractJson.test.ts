import { describe, it, expect } from "vitest";
import { extractFirstJsonValue, scanBalanced, stripMarkdownFences } from "../extractJson.js";

describe("stripMarkdownFences", () => {
  it("unwraps a fully fenced block", () => {
    expect(stripMarkdownFences('```json\n{"a":1}\n```')).toBe('{"a":1}');
  });

  it("pulls the fenced block out of surrounding prose", () => {
    expect(stripMarkdownFences('Here you go:\n```json\n{"a":1}\n```\nThanks')).toBe('{"a":1}');
  });
});

describe("scanBalanced", () => {
  it("ignores braces inside strings", () => {
    const text = '{"a":"}{"} tail';
    expect(scanBalanced(text, 0)).toBe(10);
  });

  it("returns -1 for an unterminated value", () => {
    expect(scanBalanced('{"a": [1, 2', 0)).toBe(-1);
  });
});

describe("extractFirstJsonValue", () => {
  it("parses a bare object", () => {
    expect(extractFirstJsonValue('{"findings":[]}')).toEqual({ findings: [] });
  });

  it("skips bracketed prose that is not JSON", () => {
    expect(extractFirstJsonValue('[HIGH] see below {"ok":true}')).toEqual({ ok: true });
  });

  it("returns undefined when nothing parses", () => {
    expect(extractFirstJsonValue("no json here")).toBeUndefined();
  });
});
