import { format } from "util";

import chalk from "chalk";

export type LogLevel = "quiet" | "normal" | "verbose";

export type LogStreams = {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
};

/**
 * Results go to stdout; errors and diagnostics go to stderr so that the
 * converted value can be piped on its own.
 */
export class Logger {
  private readonly level: LogLevel;
  private readonly streams: LogStreams;

  constructor(level: LogLevel = "normal", streams: LogStreams = process) {
    this.level = level;
    this.streams = streams;
  }

  error(message: string, ...args: unknown[]): void {
    this.streams.stderr.write(`${format(chalk.red(message), ...args)}\n`);
  }

  // Results are printed even when quiet; quiet only silences diagnostics.
  info(message: string, ...args: unknown[]): void {
    this.streams.stdout.write(`${format(message, ...args)}\n`);
  }

  verbose(message: string, ...args: unknown[]): void {
    if (this.level === "verbose") {
      this.streams.stderr.write(`${format(chalk.gray(message), ...args)}\n`);
    }
  }
}
