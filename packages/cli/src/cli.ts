import { DateParseError, InvalidTimestampError } from "@unixtime/core";
import { Command, CommanderError } from "commander";

import { convertCommand, type ConvertOptions } from "./commands/convert";
import { loadConfig } from "./config/loader";
import type { Config } from "./config/schemas";
import { Logger } from "./utils/logger";
import {
  findUnknownFlag,
  hasHelpFlag,
  normalizeFlags,
} from "./utils/normalize-flags";

export type RunParameters = {
  argv: string[];
  env: NodeJS.ProcessEnv;
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
};

const HELP_EPILOGUE = `
A timestamp is the number of seconds elapsed since 1 Jan 1970 UTC and can
have fractional seconds. A date/time can be written in most common formats,
including relative ones like "tomorrow 5pm". The special words 'now' (current
date and time) and 'today' (current date at 00:00 hours) are also accepted.
With no timestamp or date, prints the current date and UNIX timestamp.

Environment:
  UNIXTIME_TIMEZONE   IANA time zone used instead of the system one
  UNIXTIME_LOG_LEVEL  quiet, normal or verbose (default: normal)
`;

export async function run(params: RunParameters): Promise<number> {
  let config: Config;
  try {
    config = loadConfig(params.env);
  } catch (err) {
    params.stderr.write(
      `Error: ${err instanceof Error ? err.message : String(err)}\n`,
    );
    return 1;
  }

  const logger = new Logger(config.logLevel, params);

  let exitCode = 0;

  const program = new Command();

  program
    .name("timestamp")
    .usage("[-h] [-m] [-u] [-i] [timestamp | date/time...]")
    .description("Converts a calendar date to or from a UNIX timestamp")
    .argument("[input...]", "UNIX timestamp or calendar date/time")
    .option("-m, --milis", "Include milliseconds in output date or timestamp")
    .option(
      "-u, --utc",
      "Interpret input or show output as UTC instead of local time",
    )
    .option(
      "-i, --iso",
      "Display output date in ISO format instead of 'human' format",
    )
    .helpOption("-h, --help", "Show this help message and exit")
    .addHelpText("after", HELP_EPILOGUE)
    .showHelpAfterError(config.logLevel !== "quiet")
    .configureOutput({
      writeOut: (str) => params.stdout.write(str),
      writeErr: (str) => params.stderr.write(str),
      outputError: (str, write) => write(str),
    })
    // Keep commander from calling process.exit so callers get the code back
    .exitOverride((err) => {
      exitCode = err.exitCode ?? 1;
      throw err;
    })
    .action((input: string[], options: ConvertOptions) => {
      try {
        convertCommand(
          input,
          { ...options, timezone: config.timezone },
          logger,
        );
      } catch (err) {
        if (
          err instanceof DateParseError ||
          err instanceof InvalidTimestampError
        ) {
          // Reported like a usage error, with the help text after it
          program.error(err.message);
        }
        throw err;
      }
    });

  const argv = normalizeFlags(params.argv);

  try {
    // Help wins over every other token, including unknown ones
    if (hasHelpFlag(argv)) {
      await program.parseAsync(["--help"], { from: "user" });
    } else {
      const unknownFlag = findUnknownFlag(argv);
      if (unknownFlag !== undefined) {
        program.error(`error: unknown option '${unknownFlag}'`, {
          code: "commander.unknownOption",
        });
      }
      await program.parseAsync(argv, { from: "user" });
    }
  } catch (err) {
    if (err instanceof CommanderError) {
      // exitCode is already set by exitOverride
    } else {
      logger.error(
        `Error: ${err instanceof Error ? err.message : String(err)}`,
      );
      exitCode = 1;
    }
  }

  return exitCode;
}
