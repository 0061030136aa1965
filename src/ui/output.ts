export type OutputFormat = "table" | "json";

export const OUTPUT_FORMATS: OutputFormat[] = ["table", "json"];

export function parseOutputFormat(input?: string): OutputFormat | null {
  const raw = (input ?? "").trim().toLowerCase();
  if (raw === "table" || raw === "json") {
    return raw;
  }
  return null;
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

export function renderRows(rows: string[][]): string {
  const widths: number[] = [];
  for (const row of rows) {
    row.forEach((cell, index) => {
      widths[index] = Math.max(widths[index] ?? 0, cell.length);
    });
  }
  return rows
    .map((row) =>
      row
        .map((cell, index) => (index === row.length - 1 ? cell : cell.padEnd(widths[index])))
        .join("  ")
    )
    .join("\n");
}
