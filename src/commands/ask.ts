import { getFlags } from "../context/flags";
import { CommandError } from "../errors";
import { deriveQuestion, splitInputLines } from "../prompts/question";
import { printJson } from "../ui/output";
import { readStdin } from "../ui/prompt";
import { requestResponse } from "./ai-request";

export type AskResponse = {
  question: string;
  response: string;
};

async function readStdinLines(): Promise<string[]> {
  return splitInputLines(await readStdin());
}

export async function runAsk(args: string[]): Promise<AskResponse> {
  const flags = getFlags();
  const question = await deriveQuestion(args, readStdinLines);
  if (question === null) {
    throw new CommandError("QAI-1201", "No question provided.");
  }

  const response = requestResponse(question, flags.model);
  if (flags.output === "json") {
    printJson({ question, response });
  } else {
    console.log(response);
  }
  return { question, response };
}
