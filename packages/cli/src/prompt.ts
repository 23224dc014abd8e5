import * as readline from "node:readline";

export interface Prompter {
  /** Resolves with the operator's line, or undefined once input has ended. */
  ask(question: string): Promise<string | undefined>;
  close(): void;
}

/**
 * Line-oriented prompter over a readline interface.
 *
 * Lines are queued as they arrive, so answers piped in one chunk are handed
 * out one per `ask` in order.
 */
export class ReadlinePrompter implements Prompter {
  private rl?: readline.Interface;
  private ended = false;
  private readonly lines: string[] = [];
  private waiting?: (answer: string | undefined) => void;

  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {}

  private open() {
    if (!this.rl) {
      this.rl = readline.createInterface({ input: this.input, output: this.output });
      this.rl.on("line", (line) => {
        const waiting = this.waiting;
        if (waiting) {
          this.waiting = undefined;
          waiting(line);
        } else {
          this.lines.push(line);
        }
      });
      this.rl.on("close", () => {
        this.ended = true;
        this.waiting?.(undefined);
        this.waiting = undefined;
      });
    }
    return this.rl;
  }

  ask(question: string) {
    const rl = this.open();
    if (this.lines.length > 0) {
      this.output.write(question);
      return Promise.resolve(this.lines.shift());
    }
    if (this.ended) {
      return Promise.resolve(undefined);
    }
    rl.setPrompt(question);
    rl.prompt();
    return new Promise<string | undefined>((resolve) => {
      this.waiting = resolve;
    });
  }

  close() {
    if (!this.ended) {
      this.rl?.close();
    }
  }
}

export async function askRequired(prompter: Prompter, question: string) {
  for (;;) {
    const answer = await prompter.ask(question);
    if (answer === undefined) {
      return undefined;
    }
    if (answer.trim()) {
      return answer.trim();
    }
  }
}

export async function askWithDefault(prompter: Prompter, question: string, fallback: string) {
  const answer = await prompter.ask(question);
  return answer?.trim() || fallback;
}

/** Only an explicit `y` or `Y` counts as consent. */
export async function confirm(prompter: Prompter, question: string) {
  const answer = await prompter.ask(question);
  return /^[Yy]$/.test(answer?.trim() ?? "");
}
