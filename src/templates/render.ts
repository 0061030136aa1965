import fs from "fs";
import path from "path";
import { getRepoRoot } from "../paths";

export function loadTemplate(name: string): string {
  const filePath = path.join(getRepoRoot(), "templates", `${name}.md`);
  if (!fs.existsSync(filePath)) {
    throw new Error(`Template not found: ${name}.md`);
  }
  return fs.readFileSync(filePath, "utf-8").replace(/\r?\n$/, "");
}

export function renderTemplate(template: string, data: Record<string, string>): string {
  let output = template;
  for (const [key, value] of Object.entries(data)) {
    const token = `{{${key}}}`;
    output = output.split(token).join(value);
  }
  return output;
}
