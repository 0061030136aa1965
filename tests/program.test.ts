import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { CommanderError } from "commander";
import { runAsk } from "../src/commands/ask";
import { getFlags, resetFlags } from "../src/context/flags";
import { CommandError } from "../src/errors";
import { buildProgram } from "../src/program";

vi.mock("../src/commands/ask");

function testProgram(output: string[]) {
  return buildProgram((program) => {
    program.exitOverride();
    program.configureOutput({
      writeOut: (text) => output.push(text),
      writeErr: (text) => output.push(text)
    });
  });
}

describe("program", () => {
  let dir: string;
  let previousConfig: string | undefined;

  beforeEach(() => {
    vi.resetAllMocks();
    resetFlags();
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "quill-program-"));
    previousConfig = process.env.QUILL_CONFIG_PATH;
    process.env.QUILL_CONFIG_PATH = path.join(dir, "config.yml");
  });

  afterEach(() => {
    if (previousConfig === undefined) {
      delete process.env.QUILL_CONFIG_PATH;
    } else {
      process.env.QUILL_CONFIG_PATH = previousConfig;
    }
    fs.rmSync(dir, { recursive: true, force: true });
    process.exitCode = undefined;
  });

  it("prints the package version", async () => {
    const output: string[] = [];
    await expect(testProgram(output).parseAsync(["node", "quill", "--version"])).rejects.toBeInstanceOf(
      CommanderError
    );
    expect(output).toEqual(["0.1.0\n"]);
  });

  it("rejects an unknown output format before running the command", async () => {
    const output: string[] = [];
    await expect(
      testProgram(output).parseAsync(["node", "quill", "ask", "--output", "xml", "hi"])
    ).rejects.toMatchObject({ code: "commander.invalidArgument" });
    expect(runAsk).not.toHaveBeenCalled();
  });

  it("applies the model and output flags before asking", async () => {
    await testProgram([]).parseAsync(["node", "quill", "ask", "--model", "sonnet", "-o", "JSON", "what", "now"]);
    expect(runAsk).toHaveBeenCalledWith(["what", "now"]);
    expect(getFlags()).toEqual({ dryRun: false, model: "sonnet", output: "json" });
  });

  it("falls back to configured defaults", async () => {
    fs.writeFileSync(process.env.QUILL_CONFIG_PATH ?? "", "ai:\n  model: haiku\noutput:\n  format: json\n");
    await testProgram([]).parseAsync(["node", "quill", "ask", "hello"]);
    expect(getFlags()).toEqual({ dryRun: false, model: "haiku", output: "json" });
  });

  it("prints coded errors and sets a failing exit code", async () => {
    const errors: string[] = [];
    vi.spyOn(console, "error").mockImplementation((line?: unknown) => {
      errors.push(String(line));
    });
    vi.mocked(runAsk).mockImplementation(() => {
      throw new CommandError("QAI-1201", "No question provided.");
    });
    await testProgram([]).parseAsync(["node", "quill", "ask"]);
    expect(errors).toEqual(["[QAI-1201] No question provided."]);
    expect(process.exitCode).toBe(1);
  });
});
