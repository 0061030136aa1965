import { configPath, ensureConfig, loadConfig, updateConfigValue } from "../config";
import { CommandError } from "../errors";

export function runConfigShow(): void {
  console.log(`Config file: ${configPath()}`);
  console.log(JSON.stringify(loadConfig(), null, 2));
}

export function runConfigInit(): void {
  const config = ensureConfig();
  console.log(`Config ready: ${configPath()}`);
  console.log(`Default output format: ${config.output.format}`);
}

export function runConfigSet(key: string, value: string): void {
  const updated = updateConfigValue(key, value);
  if (!updated.ok) {
    throw new CommandError(updated.reason === "invalid_key" ? "QAI-1501" : "QAI-1502", updated.details);
  }
  console.log(`Config updated: ${configPath()}`);
  console.log(JSON.stringify(updated.config, null, 2));
}
