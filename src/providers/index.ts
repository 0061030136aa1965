import { claudeProvider } from "./claude";
import { codexProvider } from "./codex";
import type { AIProvider, ProviderId } from "./types";

const PROVIDERS: Record<ProviderId, AIProvider> = {
  claude: claudeProvider,
  codex: codexProvider
};

const AUTO_ORDER: ProviderId[] = ["claude", "codex"];

export function listProviders(): AIProvider[] {
  return AUTO_ORDER.map((id) => PROVIDERS[id]);
}

export function unavailableMessage(): string {
  const names = listProviders().map((provider) => provider.binary);
  return `No AI provider available (install ${names.join(" or ")} CLI).`;
}

export type ProviderResolution =
  | { ok: true; provider: AIProvider; path: string }
  | { ok: false; details: string };

export function resolveProvider(): ProviderResolution {
  for (const provider of listProviders()) {
    const found = provider.locate();
    if (found) {
      return { ok: true, provider, path: found };
    }
  }
  return { ok: false, details: unavailableMessage() };
}

export type AskResult =
  | { ok: true; response: string; provider: ProviderId }
  | { ok: false; reason: "empty_prompt" | "unavailable" | "provider_failed"; details: string };

/**
 * Sends the prompt to the first provider found on PATH, running the resolved file
 * so a Windows `.cmd` shim goes through the shell.
 * A failing provider is reported as is; the next one is never tried.
 */
export function askAI(prompt: string, model?: string): AskResult {
  if (!prompt.trim()) {
    return { ok: false, reason: "empty_prompt", details: "Prompt is required." };
  }
  const resolution = resolveProvider();
  if (!resolution.ok) {
    return { ok: false, reason: "unavailable", details: resolution.details };
  }
  const result = resolution.provider.exec(resolution.path, prompt, model);
  if (!result.ok) {
    return { ok: false, reason: "provider_failed", details: result.error ?? `${resolution.provider.binary} failed` };
  }
  return { ok: true, response: result.output, provider: resolution.provider.id };
}
