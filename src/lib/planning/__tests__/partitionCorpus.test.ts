import { describe, it, expect } from "vitest";
import { partitionCorpus, directoryPrefix, median } from "../partitionCorpus.js";
import { ConfigurationError } from "../../../errors.js";
import { CorpusSchema } from "../../schemas/sweep.js";

describe("partitionCorpus", () => {
  it("keeps explicit shards in declaration order", () => {
    const units = partitionCorpus({
      shards: [
        { id: "u2", resourcePatterns: ["b/**"], estimatedSize: 5 },
        { id: "u1", label: "Alpha", resourcePatterns: ["a/**"], estimatedSize: 7 },
      ],
    });
    expect(units.map((u) => u.id)).toEqual(["u2", "u1"]);
    expect(units[0].label).toBe("u2");
    expect(units[1].label).toBe("Alpha");
  });

  it("flags units larger than twice the median as oversized", () => {
    const units = partitionCorpus({
      shards: [
        { id: "a", resourcePatterns: ["a"], estimatedSize: 10 },
        { id: "b", resourcePatterns: ["b"], estimatedSize: 10 },
        { id: "c", resourcePatterns: ["c"], estimatedSize: 20 },
        { id: "d", resourcePatterns: ["d"], estimatedSize: 100 },
      ],
    });
    // median = 15, cutoff = 30
    expect(units.map((u) => u.isOversized)).toEqual([false, false, false, true]);
  });

  it("honours a custom oversize multiplier", () => {
    const units = partitionCorpus(
      {
        shards: [
          { id: "a", resourcePatterns: ["a"], estimatedSize: 10 },
          { id: "b", resourcePatterns: ["b"], estimatedSize: 14 },
          { id: "c", resourcePatterns: ["c"], estimatedSize: 16 },
        ],
      },
      { oversizeMultiplier: 1.5 }
    );
    // median = 14, cutoff = 21
    expect(units.every((u) => !u.isOversized)).toBe(true);
  });

  it("groups raw resources by directory prefix in lexical order", () => {
    const units = partitionCorpus({
      resources: [
        { path: "src/server/app.ts", size: 30 },
        { path: "./lib/util.ts", size: 10 },
        { path: "src/client/view.ts", size: 20 },
        { path: "README.md", size: 5 },
      ],
    });
    expect(units.map((u) => u.id)).toEqual([".", "lib", "src"]);
    expect(units[0].label).toBe("(root)");
    expect(units[2].resourcePatterns).toEqual(["src/client/view.ts", "src/server/app.ts"]);
    expect(units[2].estimatedSize).toBe(50);
  });

  it("groups deeper when groupDepth is raised", () => {
    const units = partitionCorpus({
      groupDepth: 2,
      resources: [
        { path: "src/server/app.ts", size: 30 },
        { path: "src/client/view.ts", size: 20 },
      ],
    });
    expect(units.map((u) => u.id)).toEqual(["src/client", "src/server"]);
  });

  it("rejects an empty corpus", () => {
    expect(() => partitionCorpus({ shards: [] })).toThrow(ConfigurationError);
    expect(() => partitionCorpus({ resources: [] })).toThrow(/Corpus is empty/);
  });

  it("rejects non-positive sizes", () => {
    expect(() =>
      partitionCorpus({ shards: [{ id: "a", resourcePatterns: ["a"], estimatedSize: 0 }] })
    ).toThrow(/estimatedSize must be a positive integer/);
    expect(() => partitionCorpus({ resources: [{ path: "a/b.ts", size: -1 }] })).toThrow(ConfigurationError);
  });

  it("rejects fractional sizes", () => {
    expect(() =>
      partitionCorpus({ shards: [{ id: "a", resourcePatterns: ["a"], estimatedSize: 2.5 }] })
    ).toThrow("Work unit a: estimatedSize must be a positive integer (got 2.5)");
    expect(() => partitionCorpus({ resources: [{ path: "a/b.ts", size: 0.5 }] })).toThrow(
      "Resource a/b.ts: size must be a positive integer (got 0.5)"
    );
    expect(CorpusSchema.safeParse({ shards: [{ id: "a", resourcePatterns: ["a"], estimatedSize: 2.5 }] }).success).toBe(
      false
    );
    expect(CorpusSchema.safeParse({ resources: [{ path: "a/b.ts", size: 0.5 }] }).success).toBe(false);
    expect(CorpusSchema.safeParse({ resources: [{ path: "a/b.ts", size: 3 }] }).success).toBe(true);
  });

  it("rejects duplicate ids", () => {
    expect(() =>
      partitionCorpus({
        shards: [
          { id: "a", resourcePatterns: ["a"], estimatedSize: 1 },
          { id: "a", resourcePatterns: ["b"], estimatedSize: 1 },
        ],
      })
    ).toThrow(/Duplicate work unit id: a/);
  });

  it("returns frozen units", () => {
    const [unit] = partitionCorpus({ shards: [{ id: "a", resourcePatterns: ["a"], estimatedSize: 1 }] });
    expect(Object.isFrozen(unit)).toBe(true);
  });
});

describe("helpers", () => {
  it("median handles odd and even counts", () => {
    expect(median([3, 1, 2])).toBe(2);
    expect(median([4, 1, 3, 2])).toBe(2.5);
  });

  it("directoryPrefix truncates to depth", () => {
    expect(directoryPrefix("a/b/c/d.ts", 2)).toBe("a/b");
    expect(directoryPrefix("a\\b\\c.ts", 1)).toBe("a");
    expect(directoryPrefix("top.ts", 1)).toBe(".");
  });
});
