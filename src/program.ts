import fs from "fs";
import path from "path";
import { Command, InvalidArgumentError } from "commander";
import { runAsk } from "./commands/ask";
import { runCommit } from "./commands/commit";
import { runConfigInit, runConfigSet, runConfigShow } from "./commands/config";
import { runProviders } from "./commands/providers";
import { loadConfig } from "./config";
import { setFlags } from "./context/flags";
import { reportError } from "./errors";
import { getRepoRoot } from "./paths";
import { OUTPUT_FORMATS, parseOutputFormat } from "./ui/output";
import type { OutputFormat } from "./ui/output";
import { closePrompt } from "./ui/prompt";

type ModelOptions = { model?: string };
type OutputOptions = ModelOptions & { output?: OutputFormat };

function getVersion(): string {
  try {
    const pkgPath = path.join(getRepoRoot(), "package.json");
    const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, "utf-8"));
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      return pkg.version;
    }
    return "0.0.0";
  } catch {
    return "0.0.0";
  }
}

function outputFormatOption(value: string): OutputFormat {
  const format = parseOutputFormat(value);
  if (!format) {
    throw new InvalidArgumentError(`Invalid output format '${value}'. Use one of: ${OUTPUT_FORMATS.join(", ")}.`);
  }
  return format;
}

function applyFlags(options: OutputOptions & { dryRun?: boolean }): void {
  const config = loadConfig();
  setFlags({
    model: options.model ?? config.ai.model,
    output: options.output ?? config.output.format,
    dryRun: Boolean(options.dryRun)
  });
}

async function guarded(action: () => unknown): Promise<void> {
  try {
    await action();
  } catch (error) {
    reportError(error);
    process.exitCode = 1;
  }
}

export function buildProgram(configure?: (program: Command) => void): Command {
  const program = new Command();
  configure?.(program);

  program
    .name("quill")
    .description("AI-powered development tools: commit messages and quick answers from your installed AI CLI")
    .version(getVersion());

  program.hook("postAction", () => {
    closePrompt();
  });

  program
    .command("commit")
    .description("Generate a commit message from staged changes and commit it after confirmation")
    .option("--model <name>", "AI model to use")
    .option("--dry-run", "Show message without committing")
    .action((options: ModelOptions & { dryRun?: boolean }) =>
      guarded(async () => {
        applyFlags(options);
        await runCommit();
      })
    );

  program
    .command("ask")
    .description("Ask an AI model a question; reads stdin when no question is given")
    .argument("[question...]", "Question text")
    .option("--model <name>", "AI model to use")
    .option("-o, --output <format>", `Output format: ${OUTPUT_FORMATS.join("|")}`, outputFormatOption)
    .action((question: string[], options: OutputOptions) =>
      guarded(async () => {
        applyFlags(options);
        await runAsk(question);
      })
    );

  program
    .command("providers")
    .description("Show which AI CLIs are installed and which one will be used")
    .option("-o, --output <format>", `Output format: ${OUTPUT_FORMATS.join("|")}`, outputFormatOption)
    .action((options: OutputOptions) =>
      guarded(() => {
        applyFlags(options);
        runProviders();
      })
    );

  const configCmd = program.command("config").description("Configuration commands");
  configCmd
    .command("show")
    .description("Show effective config and config file path")
    .action(() => guarded(() => runConfigShow()));
  configCmd
    .command("init")
    .description("Create config file with defaults if missing")
    .action(() => guarded(() => runConfigInit()));
  configCmd
    .command("set")
    .description("Set config value by key")
    .argument("<key>", "Key: ai.model | output.format")
    .argument("<value>", "Value for key")
    .action((key: string, value: string) => guarded(() => runConfigSet(key, value)));

  return program;
}
