import { CommandError } from "../errors";
import { askAI } from "../providers";

export function requestResponse(prompt: string, model?: string, context?: string): string {
  const result = askAI(prompt, model);
  if (result.ok) {
    return result.response;
  }
  const details = context ? `${context}: ${result.details}` : result.details;
  if (result.reason === "empty_prompt") {
    throw new CommandError("QAI-1202", details);
  }
  if (result.reason === "unavailable") {
    throw new CommandError("QAI-1301", details);
  }
  throw new CommandError("QAI-1302", details);
}
