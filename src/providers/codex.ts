import { defineProvider } from "./shared";

export const codexProvider = defineProvider({
  id: "codex",
  label: "Codex",
  binary: "codex",
  subcommand: "ask"
});
