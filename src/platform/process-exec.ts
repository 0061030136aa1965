import fs from "fs";
import path from "path";
import { spawnSync } from "child_process";
import type { SpawnSyncOptionsWithStringEncoding, SpawnSyncReturns, StdioOptions } from "child_process";

// Staged diffs of lockfiles or generated code easily exceed Node's 1 MiB default.
export const MAX_OUTPUT_BYTES = 64 * 1024 * 1024;

type RunSyncArgs = {
  env?: NodeJS.ProcessEnv;
  stdio?: StdioOptions;
  maxBuffer?: number;
};

export type CommandOutcome = {
  ok: boolean;
  stdout: string;
  error?: string;
};

function shouldUseWindowsShell(command: string): boolean {
  if (process.platform !== "win32") {
    return false;
  }
  const normalized = command.toLowerCase();
  return normalized.endsWith(".cmd") || normalized.endsWith(".bat");
}

/**
 * Quotes one argument for cmd.exe. Node joins shell arguments with plain spaces,
 * so every token has to arrive already quoted.
 */
export function quoteWindowsArg(value: string): string {
  return `"${value.replace(/"/g, "\"\"")}"`;
}

function runCommandSync(command: string, args: string[], options: RunSyncArgs): SpawnSyncReturns<string> {
  const shell = shouldUseWindowsShell(command);
  const spawnOptions: SpawnSyncOptionsWithStringEncoding = {
    env: options.env,
    shell,
    encoding: "utf-8",
    stdio: options.stdio,
    maxBuffer: options.maxBuffer ?? MAX_OUTPUT_BYTES,
    windowsHide: process.platform === "win32"
  };
  if (shell) {
    return spawnSync(quoteWindowsArg(command), args.map(quoteWindowsArg), spawnOptions);
  }
  return spawnSync(command, args, spawnOptions);
}

export function describeFailure(result: SpawnSyncReturns<string>, fallback: string): string {
  if (result.error) {
    return result.error.message;
  }
  if (result.signal) {
    return `terminated by ${result.signal}`;
  }
  if (result.status === null) {
    return fallback;
  }
  const stderr = String(result.stderr || "").trim();
  const status = `exit status ${result.status}`;
  return stderr ? `${status}: ${stderr}` : status;
}

export function runCaptured(command: string, args: string[], options: RunSyncArgs = {}): CommandOutcome {
  const result = runCommandSync(command, args, options);
  if (result.error || result.signal || result.status !== 0) {
    return { ok: false, stdout: String(result.stdout || ""), error: describeFailure(result, `${command} failed`) };
  }
  return { ok: true, stdout: String(result.stdout || "") };
}

function executableExtensions(binary: string): string[] {
  if (process.platform !== "win32") {
    return [""];
  }
  const raw = process.env.PATHEXT?.trim() || ".EXE;.CMD;.BAT;.COM";
  const extensions = raw.split(";").filter((ext) => ext.length > 0);
  const lower = binary.toLowerCase();
  // Windows only runs files whose extension is listed in PATHEXT.
  return extensions.some((ext) => lower.endsWith(ext.toLowerCase())) ? ["", ...extensions] : extensions;
}

function isExecutableFile(file: string): boolean {
  try {
    if (!fs.statSync(file).isFile()) {
      return false;
    }
    if (process.platform !== "win32") {
      fs.accessSync(file, fs.constants.X_OK);
    }
    return true;
  } catch {
    return false;
  }
}

/**
 * Resolves a bare binary name against the PATH entries without spawning anything.
 * Returns the absolute path of the first match, or null.
 */
export function lookPath(binary: string, searchPath: string = process.env.PATH ?? ""): string | null {
  if (binary.includes("/") || binary.includes("\\")) {
    return isExecutableFile(binary) ? path.resolve(binary) : null;
  }
  const dirs = searchPath.split(path.delimiter).filter((dir) => dir.length > 0);
  for (const dir of dirs) {
    for (const ext of executableExtensions(binary)) {
      const candidate = path.join(dir, `${binary}${ext}`);
      if (isExecutableFile(candidate)) {
        return candidate;
      }
    }
  }
  return null;
}
