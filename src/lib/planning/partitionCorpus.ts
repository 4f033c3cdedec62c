/**
 * WorkUnit partitioner. Splits a corpus into ordered, immutable shards.
 *
 * Two input shapes:
 *   - explicit shards: kept in declaration order
 *   - raw resources: grouped by directory prefix (groupDepth segments), lexical order
 *
 * A unit is oversized when its size exceeds oversizeMultiplier × median size.
 */

// ─── src/lib/planning/partitionCorpus.ts ────────────────────────────────────

import { ConfigurationError } from "../../errors.js";
import type { Corpus, ResourceInput, ShardInput } from "../schemas/sweep.js";
import type { WorkUnit } from "../../types.js";

export const DEFAULT_OVERSIZE_MULTIPLIER = 2;
export const DEFAULT_GROUP_DEPTH = 1;

export interface PartitionOptions {
  oversizeMultiplier?: number;
}

type Draft = Omit<WorkUnit, "isOversized">;

// ─── Helpers ─────────────────────────────────────────────────────────────────

export function median(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

function normalizePath(p: string): string {
  return p.replace(/\\/g, "/").replace(/^\.\//, "").replace(/\/+/g, "/");
}

/** Directory prefix of `path`, truncated to `depth` segments. Root-level files map to ".". */
export function directoryPrefix(path: string, depth: number): string {
  const segments = normalizePath(path).split("/").filter(Boolean);
  const dirs = segments.slice(0, -1).slice(0, depth);
  return dirs.length > 0 ? dirs.join("/") : ".";
}

function fromShards(shards: ShardInput[]): Draft[] {
  const seen = new Set<string>();
  return shards.map((s) => {
    if (seen.has(s.id)) throw new ConfigurationError(`Duplicate work unit id: ${s.id}`);
    seen.add(s.id);
    if (!Number.isInteger(s.estimatedSize) || s.estimatedSize <= 0) {
      throw new ConfigurationError(`Work unit ${s.id}: estimatedSize must be a positive integer (got ${s.estimatedSize})`);
    }
    return {
      id: s.id,
      label: s.label ?? s.id,
      resourcePatterns: [...s.resourcePatterns],
      estimatedSize: s.estimatedSize,
    };
  });
}

function fromResources(resources: ResourceInput[], depth: number): Draft[] {
  const groups = new Map<string, { paths: string[]; size: number }>();
  const seenPaths = new Set<string>();
  for (const r of resources) {
    const path = normalizePath(r.path);
    if (!Number.isInteger(r.size) || r.size <= 0) {
      throw new ConfigurationError(`Resource ${path}: size must be a positive integer (got ${r.size})`);
    }
    if (seenPaths.has(path)) throw new ConfigurationError(`Duplicate resource: ${path}`);
    seenPaths.add(path);
    const prefix = directoryPrefix(path, depth);
    const group = groups.get(prefix) ?? { paths: [], size: 0 };
    group.paths.push(path);
    group.size += r.size;
    groups.set(prefix, group);
  }
  return [...groups.keys()]
    .sort()
    .map((prefix) => {
      const g = groups.get(prefix) ?? { paths: [], size: 0 };
      return {
        id: prefix,
        label: prefix === "." ? "(root)" : prefix,
        resourcePatterns: [...g.paths].sort(),
        estimatedSize: g.size,
      };
    });
}

// ─── Main ────────────────────────────────────────────────────────────────────

export function partitionCorpus(corpus: Corpus, options: PartitionOptions = {}): WorkUnit[] {
  const multiplier = options.oversizeMultiplier ?? DEFAULT_OVERSIZE_MULTIPLIER;
  if (!(multiplier >= 1)) {
    throw new ConfigurationError(`oversizeMultiplier must be >= 1 (got ${multiplier})`);
  }

  const drafts =
    "shards" in corpus
      ? fromShards(corpus.shards)
      : fromResources(corpus.resources, corpus.groupDepth ?? DEFAULT_GROUP_DEPTH);

  if (drafts.length === 0) throw new ConfigurationError("Corpus is empty: no work units to dispatch");

  const cutoff = multiplier * median(drafts.map((d) => d.estimatedSize));
  return drafts.map((d) => Object.freeze({ ...d, isOversized: d.estimatedSize > cutoff }));
}
