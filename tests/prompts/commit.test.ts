import { describe, expect, it } from "vitest";
import { buildCommitPrompt } from "../../src/prompts/commit";

describe("buildCommitPrompt", () => {
  it("wraps the diff in the commit instruction", () => {
    const diff = "diff --git a/readme.md b/readme.md\n+hello";
    expect(buildCommitPrompt(diff)).toBe(
      [
        "Generate a concise git commit message for the following diff.",
        "Use conventional commit format (feat:, fix:, docs:, refactor:, etc.).",
        "Keep the message under 72 characters for the subject line.",
        "Include a brief body if needed.",
        "",
        "Diff:",
        "diff --git a/readme.md b/readme.md",
        "+hello",
        "",
        "Respond with ONLY the commit message, no explanations."
      ].join("\n")
    );
  });

  it("does not expand placeholders that appear inside the diff", () => {
    const prompt = buildCommitPrompt("+const t = '{{diff}}';");
    expect(prompt).toContain("Diff:\n+const t = '{{diff}}';\n\nRespond");
  });
});
