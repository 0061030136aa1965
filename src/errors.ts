export type ErrorCode =
  | "QAI-1101"
  | "QAI-1102"
  | "QAI-1103"
  | "QAI-1201"
  | "QAI-1202"
  | "QAI-1301"
  | "QAI-1302"
  | "QAI-1401"
  | "QAI-1501"
  | "QAI-1502"
  | "QAI-1999";

export class CommandError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = "CommandError";
    this.code = code;
  }
}

export function formatError(code: string, message: string): string {
  return `[${code}] ${message}`;
}

export function printError(code: string, message: string): void {
  console.error(formatError(code, message));
}

export function reportError(error: unknown): void {
  if (error instanceof CommandError) {
    printError(error.code, error.message);
    return;
  }
  const message = error instanceof Error ? error.message : String(error);
  printError("QAI-1999", message);
}
