export function splitInputLines(raw: string): string[] {
  if (raw.length === 0) {
    return [];
  }
  const lines = raw.split("\n").map((line) => (line.endsWith("\r") ? line.slice(0, -1) : line));
  if (raw.endsWith("\n")) {
    lines.pop();
  }
  return lines;
}

/**
 * Positional words win; stdin lines are only consulted when no words were given.
 * Returns null when nothing but whitespace is left.
 */
export async function deriveQuestion(
  args: string[],
  readStdinLines: () => Promise<string[]>
): Promise<string | null> {
  const question = args.length > 0 ? args.join(" ") : (await readStdinLines()).join("\n");
  if (!question.trim()) {
    return null;
  }
  return question;
}
