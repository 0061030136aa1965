import { runCaptured } from "../platform/process-exec";

export const MAX_DIFF_CHARS = 10000;
export const TRUNCATION_MARKER = "\n... (truncated)";

export type StagedDiffResult =
  | { ok: true; diff: string }
  | { ok: false; reason: "git_failed" | "empty"; details: string };

export type CommitResult = { ok: true } | { ok: false; details: string };

/**
 * Cuts the diff at a raw character count. The cut may land mid-line.
 */
export function truncateDiff(diff: string, limit = MAX_DIFF_CHARS): string {
  if (diff.length <= limit) {
    return diff;
  }
  return `${diff.slice(0, limit)}${TRUNCATION_MARKER}`;
}

export function collectStagedDiff(): StagedDiffResult {
  const result = runCaptured("git", ["diff", "--cached"]);
  if (!result.ok) {
    return { ok: false, reason: "git_failed", details: result.error ?? "git diff failed" };
  }
  if (result.stdout.length === 0) {
    return { ok: false, reason: "empty", details: "No staged changes." };
  }
  return { ok: true, diff: truncateDiff(result.stdout) };
}

export function commitWithMessage(message: string): CommitResult {
  const result = runCaptured("git", ["commit", "-m", message], { stdio: "inherit" });
  if (!result.ok) {
    return { ok: false, details: result.error ?? "git commit failed" };
  }
  return { ok: true };
}
