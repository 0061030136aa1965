import { defineProvider } from "./shared";

export const claudeProvider = defineProvider({
  id: "claude",
  label: "Claude",
  binary: "claude",
  subcommand: "--print"
});
