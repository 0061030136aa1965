import readline from "readline";

/**
 * Line-at-a-time answers from a non-TTY stdin. Waits for each line to arrive;
 * only the end of the stream yields an empty answer.
 */
export class PipedAnswers {
  private readonly lines: string[] = [];
  private readonly waiting: Array<(line: string) => void> = [];
  private readonly reader: readline.Interface;
  private ended = false;

  constructor(input: NodeJS.ReadableStream) {
    this.reader = readline.createInterface({ input, terminal: false });
    this.reader.on("line", (line) => {
      const resolve = this.waiting.shift();
      if (resolve) {
        resolve(line);
      } else {
        this.lines.push(line);
      }
    });
    this.reader.on("close", () => {
      this.ended = true;
      for (const resolve of this.waiting.splice(0)) {
        resolve("");
      }
    });
  }

  next(): Promise<string> {
    const line = this.lines.shift();
    if (line !== undefined) {
      return Promise.resolve(line);
    }
    if (this.ended) {
      return Promise.resolve("");
    }
    return new Promise((resolve) => {
      this.waiting.push(resolve);
    });
  }

  close(): void {
    this.reader.close();
  }
}

let piped: PipedAnswers | null = null;
let rl: readline.Interface | null = null;

function getPipedAnswers(): PipedAnswers {
  if (!piped) {
    piped = new PipedAnswers(process.stdin);
  }
  return piped;
}

function getInterface(): readline.Interface {
  if (rl) {
    return rl;
  }
  rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout
  });
  return rl;
}

/**
 * Releases stdin. Closing the TTY interface also leaves raw mode, so Ctrl-C
 * reaches whatever child runs next as SIGINT.
 */
export function closePrompt(): void {
  piped?.close();
  if (!rl) {
    return;
  }
  rl.close();
  rl = null;
}

process.on("exit", () => closePrompt());

export function readStdin(input: NodeJS.ReadableStream = process.stdin): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: string[] = [];
    input.setEncoding("utf-8");
    input.on("data", (chunk) => {
      chunks.push(String(chunk));
    });
    input.once("end", () => resolve(chunks.join("")));
    input.once("error", reject);
  });
}

export async function ask(question: string): Promise<string> {
  if (!process.stdin.isTTY) {
    process.stdout.write(question);
    const answer = await getPipedAnswers().next();
    process.stdout.write("\n");
    return answer.trim();
  }
  return new Promise((resolve) => {
    const prompt = getInterface();
    const onClose = (): void => resolve("");
    prompt.once("close", onClose);
    prompt.once("SIGINT", () => {
      prompt.off("close", onClose);
      // Re-raise so Ctrl-C ends the process instead of counting as an empty answer.
      process.kill(process.pid, "SIGINT");
    });
    prompt.question(question, (answer) => {
      prompt.off("close", onClose);
      resolve(answer.trim());
    });
  });
}

export function isAffirmative(answer: string): boolean {
  const normalized = answer.trim().toLowerCase();
  return normalized === "" || normalized === "y" || normalized === "yes";
}

export async function confirm(question: string): Promise<boolean> {
  const response = await ask(question);
  return isAffirmative(response);
}
