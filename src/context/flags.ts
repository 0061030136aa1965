import type { OutputFormat } from "../ui/output";

export type RuntimeFlags = {
  dryRun: boolean;
  model?: string;
  output: OutputFormat;
};

const flags: RuntimeFlags = {
  dryRun: false,
  model: undefined,
  output: "table"
};

export function setFlags(next: Partial<RuntimeFlags>): void {
  if ("dryRun" in next) {
    flags.dryRun = Boolean(next.dryRun);
  }
  if ("model" in next) {
    const clean = typeof next.model === "string" ? next.model.trim() : "";
    flags.model = clean.length > 0 ? clean : undefined;
  }
  if ("output" in next && next.output) {
    flags.output = next.output;
  }
}

export function resetFlags(): void {
  flags.dryRun = false;
  flags.model = undefined;
  flags.output = "table";
}

export function getFlags(): RuntimeFlags {
  return { ...flags };
}
