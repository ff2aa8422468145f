import { Chalk, type ChalkInstance } from "chalk";
import type { OutputFormatter, TextSink } from "./types.js";

export interface FormatterOptions {
  color?: boolean;
  stdout?: TextSink;
  stderr?: TextSink;
}

export class HumanFormatter implements OutputFormatter {
  readonly style: ChalkInstance;
  private readonly stdout: TextSink;
  private readonly stderr: TextSink;

  constructor(options: FormatterOptions = {}) {
    // Level 0 disables styling; otherwise let chalk detect the terminal
    this.style = options.color === false ? new Chalk({ level: 0 }) : new Chalk();
    this.stdout = options.stdout ?? process.stdout;
    this.stderr = options.stderr ?? process.stderr;
  }

  info(line: string): void {
    this.stdout.write(`${line}\n`);
  }

  error(message: string): void {
    this.stderr.write(`${this.style.red(message)}\n`);
  }
}

export function createFormatter(color: boolean): OutputFormatter {
  return new HumanFormatter({ color });
}
