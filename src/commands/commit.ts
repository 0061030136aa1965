import { getFlags } from "../context/flags";
import { CommandError } from "../errors";
import { collectStagedDiff, commitWithMessage } from "../git";
import { buildCommitPrompt } from "../prompts/commit";
import { closePrompt, confirm } from "../ui/prompt";
import { requestResponse } from "./ai-request";

export type CommitOutcome = "confirmed" | "cancelled" | "dry_run";

function generateMessage(model?: string): string {
  const staged = collectStagedDiff();
  if (!staged.ok) {
    if (staged.reason === "empty") {
      throw new CommandError("QAI-1102", staged.details);
    }
    throw new CommandError("QAI-1101", `git diff failed: ${staged.details}`);
  }
  console.log("Generating commit message...");
  return requestResponse(buildCommitPrompt(staged.diff), model, "AI request failed").trim();
}

export async function runCommit(): Promise<CommitOutcome> {
  const flags = getFlags();
  const message = generateMessage(flags.model);

  console.log("");
  console.log("Suggested commit message:");
  console.log(message);
  if (flags.dryRun) {
    return "dry_run";
  }

  console.log("");
  const accepted = await confirm("Use this message? [Y/n]: ");
  closePrompt();
  if (!accepted) {
    console.log("Commit cancelled.");
    return "cancelled";
  }

  const committed = commitWithMessage(message);
  if (!committed.ok) {
    throw new CommandError("QAI-1103", `git commit failed: ${committed.details}`);
  }
  return "confirmed";
}
