// src/cli/prompt.ts

import readline from "readline";

export interface PromptStreams {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

/**
 * Line-based question/answer helper over one readline interface.
 *
 * Lines that arrive before a question is asked are queued, so piped
 * input is answered in order. Once input ends every question resolves
 * to undefined.
 */
export class Prompter {
  private readonly rl: readline.Interface;
  private readonly queued: string[] = [];
  private waiting: ((line: string | undefined) => void) | undefined;
  private ended = false;

  constructor(
    private readonly streams: PromptStreams = {
      input: process.stdin,
      output: process.stdout,
    },
  ) {
    this.rl = readline.createInterface({ input: streams.input, terminal: false });
    this.rl.on("line", (line) => {
      const waiting = this.waiting;
      if (waiting) {
        this.waiting = undefined;
        waiting(line);
      } else {
        this.queued.push(line);
      }
    });
    this.rl.on("close", () => {
      this.ended = true;
      const waiting = this.waiting;
      this.waiting = undefined;
      waiting?.(undefined);
    });
  }

  /**
   * Ask a question; an empty answer yields `defaultValue` (or "").
   */
  async ask(question: string, defaultValue?: string): Promise<string | undefined> {
    const hint = defaultValue ? ` [${defaultValue}]` : "";
    this.streams.output.write(`${question}${hint} `);
    const line = await this.nextLine();
    if (line === undefined) return undefined;
    const answer = line.trim();
    return answer === "" ? (defaultValue ?? "") : answer;
  }

  async confirm(question: string): Promise<boolean> {
    const answer = await this.ask(`${question} [y/N]`);
    const val = answer?.toLowerCase();
    return val === "y" || val === "yes";
  }

  close(): void {
    this.rl.close();
  }

  private nextLine(): Promise<string | undefined> {
    const line = this.queued.shift();
    if (line !== undefined) return Promise.resolve(line);
    if (this.ended) return Promise.resolve(undefined);
    return new Promise((resolve) => {
      this.waiting = resolve;
    });
  }
}

/**
 * One-off yes/no question on stdin/stdout.
 */
export async function askYesNo(question: string): Promise<boolean> {
  const prompter = new Prompter();
  try {
    return await prompter.confirm(question);
  } finally {
    prompter.close();
  }
}
