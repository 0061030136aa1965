import { loadTemplate, renderTemplate } from "../templates/render";

export function buildCommitPrompt(diff: string): string {
  return renderTemplate(loadTemplate("commit-message"), { diff });
}
