import type { Logger } from "./types.js";

/**
 * Logger for the command-line tools. Everything goes to stderr so stdout
 * stays free for piping; `log` lines are debug output and only appear when
 * `verbose` is set.
 */
export class ConsoleLogger implements Logger {
  #write: (line: string) => void;
  #verbose: boolean;

  constructor(options?: { verbose?: boolean; write?: (line: string) => void }) {
    this.#write = options?.write ?? ((line) => process.stderr.write(`${line}\n`));
    this.#verbose = options?.verbose ?? false;
  }

  log(message: string) {
    if (this.#verbose) this.#write(message);
  }

  info(message: string) {
    this.#write(message);
  }

  warn(message: string) {
    this.#write(`[warn] ${message}`);
  }

  error(message: string) {
    this.#write(`[error] ${message}`);
  }
}
