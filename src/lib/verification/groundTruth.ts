/**
 * Ground-truth checkers: re-read the authoritative store for a claimed
 * mutation. Every check is read-only and idempotent.
 *
 *   FileSignalChecker  exists | absent | contains   (file system)
 *   GitStatusChecker   modified | unmodified        (git working tree)
 *   CompositeChecker   routes by signal kind
 */

// ─── src/lib/verification/groundTruth.ts ────────────────────────────────────

import { spawn } from "child_process";
import { readFile, stat } from "fs/promises";
import { isAbsolute, relative, resolve } from "path";
import type { ExpectedSignal } from "../../types.js";
import { isAllowedCommand } from "./commandAllowlist.js";

export interface GroundTruthChecker {
  check(targetResource: string, expectedSignal: ExpectedSignal): Promise<boolean>;
}

export type SignalKind = ExpectedSignal["kind"];

const GIT_TIMEOUT_MS = 10_000;

function resolveInside(root: string, target: string): string {
  const full = resolve(root, target);
  const rel = relative(root, full);
  if (rel.startsWith("..") || isAbsolute(rel)) {
    throw new Error(`Target escapes the checked root: ${target}`);
  }
  return full;
}

function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}

// ─── File system ─────────────────────────────────────────────────────────────

export class FileSignalChecker implements GroundTruthChecker {
  constructor(private readonly root: string = process.cwd()) {}

  async check(targetResource: string, expectedSignal: ExpectedSignal): Promise<boolean> {
    const path = resolveInside(this.root, targetResource);
    switch (expectedSignal.kind) {
      case "exists":
        return this.exists(path);
      case "absent":
        return !(await this.exists(path));
      case "contains": {
        if (!(await this.exists(path))) return false;
        const content = await readFile(path, "utf-8");
        return content.includes(expectedSignal.pattern);
      }
      default:
        throw new Error(`[FileSignalChecker] Unsupported signal: ${expectedSignal.kind}`);
    }
  }

  private async exists(path: string): Promise<boolean> {
    try {
      await stat(path);
      return true;
    } catch (err) {
      if (isNotFound(err)) return false;
      throw err;
    }
  }
}

// ─── Git status ──────────────────────────────────────────────────────────────

export interface GitRunResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export type GitRunner = (args: string[], cwd: string) => Promise<GitRunResult>;

export const runGit: GitRunner = (args, cwd) =>
  new Promise((resolvePromise, reject) => {
    if (!isAllowedCommand("git", args)) {
      reject(new Error(`Command not allowed: git ${args.join(" ")}`));
      return;
    }
    const proc = spawn("git", args, { cwd, stdio: ["ignore", "pipe", "pipe"] });
    let stdout = "";
    let stderr = "";
    proc.stdout.on("data", (d) => {
      stdout += String(d);
    });
    proc.stderr.on("data", (d) => {
      stderr += String(d);
    });
    const timer = setTimeout(() => {
      proc.kill("SIGTERM");
      reject(new Error(`git ${args[0]} timed out after ${GIT_TIMEOUT_MS}ms`));
    }, GIT_TIMEOUT_MS);
    proc.on("close", (code) => {
      clearTimeout(timer);
      resolvePromise({ exitCode: code ?? -1, stdout, stderr });
    });
    proc.on("error", (err) => {
      clearTimeout(timer);
      reject(err);
    });
  });

export interface PorcelainEntry {
  status: string;
  path: string;
}

function unquote(path: string): string {
  return path.length >= 2 && path.startsWith('"') && path.endsWith('"') ? path.slice(1, -1) : path;
}

/** Parses `git status --porcelain=v1` output. Renames report the new path. */
export function parsePorcelain(output: string): PorcelainEntry[] {
  return output
    .split(/\r?\n/)
    .filter((line) => line.length > 3)
    .map((line) => {
      const status = line.slice(0, 2).trim();
      const rest = line.slice(3);
      const arrow = rest.indexOf(" -> ");
      return { status, path: unquote(arrow >= 0 ? rest.slice(arrow + 4) : rest) };
    });
}

export class GitStatusChecker implements GroundTruthChecker {
  constructor(
    private readonly repoDir: string = process.cwd(),
    private readonly run: GitRunner = runGit
  ) {}

  async check(targetResource: string, expectedSignal: ExpectedSignal): Promise<boolean> {
    if (expectedSignal.kind !== "modified" && expectedSignal.kind !== "unmodified") {
      throw new Error(`[GitStatusChecker] Unsupported signal: ${expectedSignal.kind}`);
    }
    resolveInside(this.repoDir, targetResource);
    const args = ["status", "--porcelain=v1", "--untracked-files=all", "--", targetResource];
    const result = await this.run(args, this.repoDir);
    if (result.exitCode !== 0) {
      throw new Error(`git status exited ${result.exitCode}: ${result.stderr.trim()}`);
    }
    const changed = parsePorcelain(result.stdout).length > 0;
    return expectedSignal.kind === "modified" ? changed : !changed;
  }
}

// ─── Routing ─────────────────────────────────────────────────────────────────

export class CompositeChecker implements GroundTruthChecker {
  constructor(private readonly routes: Partial<Record<SignalKind, GroundTruthChecker>>) {}

  check(targetResource: string, expectedSignal: ExpectedSignal): Promise<boolean> {
    const checker = this.routes[expectedSignal.kind];
    if (!checker) {
      return Promise.reject(new Error(`No ground-truth checker for signal: ${expectedSignal.kind}`));
    }
    return checker.check(targetResource, expectedSignal);
  }
}

/** File checks for presence and content, git status for change signals. */
export function createDefaultChecker(root: string = process.cwd()): GroundTruthChecker {
  const files = new FileSignalChecker(root);
  const git = new GitStatusChecker(root);
  return new CompositeChecker({
    exists: files,
    absent: files,
    contains: files,
    modified: git,
    unmodified: git,
  });
}
