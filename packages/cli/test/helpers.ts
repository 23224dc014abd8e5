import type { EnvStore } from "../src/env-store.js";
import type { HttpGetOptions, HttpResponse, HttpTransport } from "../src/http.js";
import type { Logger } from "../src/log.js";
import type { Prompter } from "../src/prompt.js";
import type { BinaryLocator, CommandResult, CommandRunner } from "../src/system.js";

export class ScriptedPrompter implements Prompter {
  readonly questions: string[] = [];

  constructor(private readonly answers: Array<string | undefined> = []) {}

  async ask(question: string) {
    this.questions.push(question);
    return this.answers.shift();
  }

  close() {}
}

export class MemoryLogger implements Logger {
  readonly lines: string[] = [];

  log(message: string) {
    this.lines.push(message);
  }
}

export class FakeTransport implements HttpTransport {
  readonly calls: Array<{ url: string; options?: HttpGetOptions }> = [];

  constructor(private readonly routes: Record<string, HttpResponse | Error>) {}

  async get(url: string, options?: HttpGetOptions) {
    this.calls.push({ url, options });
    const route = this.routes[url];
    if (route === undefined) {
      return { status: 404, body: Buffer.alloc(0) };
    }
    if (route instanceof Error) {
      throw route;
    }
    return route;
  }
}

export function ok(body: string): HttpResponse {
  return { status: 200, body: Buffer.from(body) };
}

export class FakeLocator implements BinaryLocator {
  readonly lookups: string[] = [];

  constructor(private readonly installed: string[]) {}

  exists(binary: string) {
    this.lookups.push(binary);
    return this.installed.includes(binary);
  }
}

export class FakeRunner implements CommandRunner {
  readonly calls: Array<{ command: string; args: string[] }> = [];

  constructor(private readonly respond: (command: string, args: string[]) => Partial<CommandResult> = () => ({})) {}

  run(command: string, args: string[]): CommandResult {
    this.calls.push({ command, args });
    return { exitCode: 0, stdout: "", stderr: "", ...this.respond(command, args) };
  }
}

export class MemoryEnvStore implements EnvStore {
  readonly target = "memory";
  readonly reads: string[] = [];
  readonly writes: Array<{ name: string; value: string }> = [];
  private readonly values: Map<string, string>;

  constructor(initial: Record<string, string> = {}) {
    this.values = new Map(Object.entries(initial));
  }

  read(name: string) {
    this.reads.push(name);
    return this.values.get(name);
  }

  write(name: string, value: string) {
    this.writes.push({ name, value });
    this.values.set(name, value);
  }
}
