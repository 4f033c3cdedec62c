/**
 * Allowlist for ground-truth shell reads. Only read-only git status queries,
 * ending in a single pathspec after "--".
 */

// ─── src/lib/verification/commandAllowlist.ts ───────────────────────────────

const ALLOWED: Array<{ command: string; argsPrefix: string[] }> = [
  { command: "git", argsPrefix: ["status", "--porcelain=v1", "--untracked-files=all", "--"] },
];

export function isAllowedCommand(command: string, args: string[]): boolean {
  const cmd = String(command).trim().toLowerCase();
  const normalizedArgs = args.map((a) => String(a).trim());
  for (const a of ALLOWED) {
    if (a.command.toLowerCase() !== cmd) continue;
    if (normalizedArgs.length !== a.argsPrefix.length + 1) continue;
    if (!a.argsPrefix.every((v, i) => v === normalizedArgs[i])) continue;
    const pathspec = normalizedArgs[a.argsPrefix.length];
    if (pathspec.length > 0 && !pathspec.startsWith("-")) return true;
  }
  return false;
}
