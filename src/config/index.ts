import fs from "fs";
import os from "os";
import path from "path";
import { parseOutputFormat } from "../ui/output";
import type { OutputFormat } from "../ui/output";
import { validateJson } from "../validation/validate";

export type QuillConfig = {
  ai: {
    model: string;
  };
  output: {
    format: OutputFormat;
  };
};

type RawConfig = {
  ai?: { model?: string };
  output?: { format?: string };
};

export const CONFIG_KEYS = ["ai.model", "output.format"] as const;
export type ConfigKey = (typeof CONFIG_KEYS)[number];

const CONFIG_SCHEMA = "config.schema.json";

export function configPath(): string {
  const override = process.env.QUILL_CONFIG_PATH?.trim();
  if (override) {
    return path.resolve(override);
  }
  const root = process.env.APPDATA
    ? path.join(process.env.APPDATA, "quill-ai")
    : path.join(os.homedir(), ".config", "quill-ai");
  return path.join(root, "config.yml");
}

export function defaultConfig(): QuillConfig {
  return {
    ai: {
      model: ""
    },
    output: {
      format: "table"
    }
  };
}

export function parseSimpleYaml(raw: string): RawConfig {
  const result: RawConfig = {};
  let section = "";
  const lines = raw.split(/\r?\n/);
  for (const line of lines) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) {
      continue;
    }
    const sectionMatch = /^([a-zA-Z_][a-zA-Z0-9_-]*):\s*$/.exec(trimmed);
    if (sectionMatch) {
      section = sectionMatch[1];
      continue;
    }
    const valueMatch = /^([a-zA-Z_][a-zA-Z0-9_-]*):\s*(.*?)\s*$/.exec(trimmed);
    if (!valueMatch || !section) {
      continue;
    }
    const key = valueMatch[1];
    const value = valueMatch[2].replace(/^["']|["']$/g, "");
    if (section === "ai" && key === "model") {
      result.ai = { model: value };
    } else if (section === "output" && key === "format") {
      result.output = { format: value.trim().toLowerCase() };
    }
  }
  return result;
}

function renderYaml(config: QuillConfig): string {
  return [
    "# quill-ai configuration",
    "# ai.model is passed as --model to the provider; leave empty for its default",
    "ai:",
    `  model: "${config.ai.model}"`,
    "output:",
    `  format: ${config.output.format}`,
    ""
  ].join("\n");
}

export function mergeConfig(base: QuillConfig, input: RawConfig): QuillConfig {
  const { issues } = validateJson(CONFIG_SCHEMA, input);
  const rejected = new Set(issues.map((issue) => issue.path));
  const model = rejected.has("/ai/model") ? undefined : input.ai?.model;
  const format = rejected.has("/output/format") ? null : parseOutputFormat(input.output?.format);
  return {
    ai: {
      model: typeof model === "string" ? model.trim() : base.ai.model
    },
    output: {
      format: format ?? base.output.format
    }
  };
}

export function loadConfig(): QuillConfig {
  const defaults = defaultConfig();
  const file = configPath();
  if (!fs.existsSync(file)) {
    return defaults;
  }
  let raw: string;
  try {
    raw = fs.readFileSync(file, "utf-8");
  } catch {
    return defaults;
  }
  return mergeConfig(defaults, parseSimpleYaml(raw));
}

export function saveConfig(config: QuillConfig): string {
  const file = configPath();
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, renderYaml(config), "utf-8");
  return file;
}

export function ensureConfig(): QuillConfig {
  const existing = loadConfig();
  if (!fs.existsSync(configPath())) {
    saveConfig(existing);
  }
  return existing;
}

export function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some((candidate) => candidate === key);
}

export type ConfigUpdate =
  | { ok: true; config: QuillConfig }
  | { ok: false; reason: "invalid_key" | "invalid_value"; details: string };

export function updateConfigValue(key: string, value: string): ConfigUpdate {
  const normalized = key.trim().toLowerCase();
  if (!isConfigKey(normalized)) {
    return { ok: false, reason: "invalid_key", details: `Invalid config key '${key}'. Use ${CONFIG_KEYS.join(", ")}.` };
  }
  const current = loadConfig();
  const candidate: RawConfig =
    normalized === "ai.model" ? { ai: { model: value.trim() } } : { output: { format: value.trim().toLowerCase() } };
  const check = validateJson(CONFIG_SCHEMA, candidate);
  if (!check.valid) {
    const details = check.issues.map((issue) => issue.message).join("; ");
    return { ok: false, reason: "invalid_value", details: `Invalid value for ${normalized}: ${details}` };
  }
  const next = mergeConfig(current, {
    ai: { model: candidate.ai?.model ?? current.ai.model },
    output: { format: candidate.output?.format ?? current.output.format }
  });
  saveConfig(next);
  return { ok: true, config: next };
}
