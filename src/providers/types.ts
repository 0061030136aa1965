export type ProviderId = "claude" | "codex";

export type ProviderResult = {
  ok: boolean;
  output: string;
  error?: string;
};

export type AIProvider = {
  id: ProviderId;
  label: string;
  binary: string;
  locate: () => string | null;
  buildArgs: (prompt: string, model?: string) => string[];
  exec: (command: string, prompt: string, model?: string) => ProviderResult;
};
