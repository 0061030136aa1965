import { lookPath, runCaptured } from "../platform/process-exec";
import type { AIProvider, ProviderId, ProviderResult } from "./types";

type ProviderDescriptor = {
  id: ProviderId;
  label: string;
  binary: string;
  subcommand: string;
};

function modelArgs(model?: string): string[] {
  const clean = model?.trim();
  return clean ? ["--model", clean] : [];
}

export function defineProvider(descriptor: ProviderDescriptor): AIProvider {
  const buildArgs = (prompt: string, model?: string): string[] => [descriptor.subcommand, ...modelArgs(model), prompt];
  const exec = (command: string, prompt: string, model?: string): ProviderResult => {
    const result = runCaptured(command, buildArgs(prompt, model), {
      env: { ...process.env, NO_COLOR: "1" }
    });
    if (!result.ok) {
      return { ok: false, output: result.stdout, error: `${descriptor.binary} failed: ${result.error ?? "unknown error"}` };
    }
    return { ok: true, output: result.stdout.trim() };
  };
  return {
    id: descriptor.id,
    label: descriptor.label,
    binary: descriptor.binary,
    locate: () => lookPath(descriptor.binary),
    buildArgs,
    exec
  };
}
