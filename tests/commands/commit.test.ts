import { beforeEach, describe, expect, it, vi } from "vitest";
import { runCommit } from "../../src/commands/commit";
import { resetFlags, setFlags } from "../../src/context/flags";
import { CommandError } from "../../src/errors";
import { collectStagedDiff, commitWithMessage } from "../../src/git";
import { askAI } from "../../src/providers";
import { closePrompt, confirm } from "../../src/ui/prompt";

vi.mock("../../src/git");
vi.mock("../../src/providers");
vi.mock("../../src/ui/prompt");

describe("runCommit", () => {
  let printed: string[];

  beforeEach(() => {
    vi.resetAllMocks();
    resetFlags();
    printed = [];
    vi.spyOn(console, "log").mockImplementation((line?: unknown) => {
      printed.push(String(line));
    });
    vi.mocked(collectStagedDiff).mockReturnValue({ ok: true, diff: "+added line" });
    vi.mocked(askAI).mockReturnValue({ ok: true, response: "feat: add line", provider: "claude" });
    vi.mocked(commitWithMessage).mockReturnValue({ ok: true });
  });

  it("fails without calling a provider when nothing is staged", async () => {
    vi.mocked(collectStagedDiff).mockReturnValue({ ok: false, reason: "empty", details: "No staged changes." });
    await expect(runCommit()).rejects.toMatchObject({ code: "QAI-1102", message: "No staged changes." });
    expect(askAI).not.toHaveBeenCalled();
  });

  it("wraps a failing git diff", async () => {
    vi.mocked(collectStagedDiff).mockReturnValue({ ok: false, reason: "git_failed", details: "exit status 128" });
    const error = await runCommit().catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(CommandError);
    expect(error).toMatchObject({ code: "QAI-1101", message: "git diff failed: exit status 128" });
  });

  it("sends the templated diff and the model to the provider", async () => {
    setFlags({ model: "sonnet" });
    vi.mocked(confirm).mockResolvedValue(true);
    await runCommit();
    const [prompt, model] = vi.mocked(askAI).mock.calls[0];
    expect(prompt).toContain("Diff:\n+added line\n\nRespond with ONLY the commit message, no explanations.");
    expect(model).toBe("sonnet");
  });

  it("commits the message once confirmed", async () => {
    vi.mocked(confirm).mockResolvedValue(true);
    await expect(runCommit()).resolves.toBe("confirmed");
    expect(confirm).toHaveBeenCalledWith("Use this message? [Y/n]: ");
    expect(commitWithMessage).toHaveBeenCalledWith("feat: add line");
    expect(printed).toEqual(["Generating commit message...", "", "Suggested commit message:", "feat: add line", ""]);
  });

  it("releases the terminal before git commit runs", async () => {
    vi.mocked(confirm).mockResolvedValue(true);
    await runCommit();
    expect(closePrompt).toHaveBeenCalledTimes(1);
    const [closedAt] = vi.mocked(closePrompt).mock.invocationCallOrder;
    const [committedAt] = vi.mocked(commitWithMessage).mock.invocationCallOrder;
    expect(closedAt).toBeLessThan(committedAt);
  });

  it("cancels without committing when declined", async () => {
    vi.mocked(confirm).mockResolvedValue(false);
    await expect(runCommit()).resolves.toBe("cancelled");
    expect(commitWithMessage).not.toHaveBeenCalled();
    expect(printed[printed.length - 1]).toBe("Commit cancelled.");
  });

  it("prints the message and stops on a dry run", async () => {
    setFlags({ dryRun: true });
    await expect(runCommit()).resolves.toBe("dry_run");
    expect(confirm).not.toHaveBeenCalled();
    expect(commitWithMessage).not.toHaveBeenCalled();
    expect(printed).toEqual(["Generating commit message...", "", "Suggested commit message:", "feat: add line"]);
  });

  it("reports provider failures as AI request failures", async () => {
    vi.mocked(askAI).mockReturnValue({ ok: false, reason: "provider_failed", details: "claude failed: exit status 1" });
    await expect(runCommit()).rejects.toMatchObject({
      code: "QAI-1302",
      message: "AI request failed: claude failed: exit status 1"
    });
  });

  it("reports a missing provider", async () => {
    vi.mocked(askAI).mockReturnValue({
      ok: false,
      reason: "unavailable",
      details: "No AI provider available (install claude or codex CLI)."
    });
    await expect(runCommit()).rejects.toMatchObject({ code: "QAI-1301" });
    expect(commitWithMessage).not.toHaveBeenCalled();
  });

  it("surfaces a failing git commit", async () => {
    vi.mocked(confirm).mockResolvedValue(true);
    vi.mocked(commitWithMessage).mockReturnValue({ ok: false, details: "exit status 1" });
    await expect(runCommit()).rejects.toMatchObject({ code: "QAI-1103", message: "git commit failed: exit status 1" });
  });
});
