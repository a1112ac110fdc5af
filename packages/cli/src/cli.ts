/**
 * @tally/cli: command line program.
 *
 * `tally <input>` replays a transactions CSV and writes the account
 * table to stdout. Logs go to stderr.
 */

import chalk from "chalk";
import { Command, CommanderError } from "commander";
import type { Logger } from "pino";
import { ConfigSchema, loadConfig } from "./config.js";
import { renderAccountsCsv } from "./export.js";
import { createLogger } from "./logger.js";
import { replayFile } from "./replay.js";

export const VERSION = "0.1.0";

export interface CliIo {
  /** Receives the rendered account table and commander's own output. */
  readonly stdout: (chunk: string) => void;
  readonly stderr: (chunk: string) => void;
  readonly env: Record<string, string | undefined>;
  /** Overrides the logger built from config. */
  readonly logger?: Logger | undefined;
}

export function createProgram(io: CliIo): Command {
  const program = new Command();

  program
    .name("tally")
    .description("Replay a transactions CSV into per-client account balances")
    .version(VERSION)
    .argument("<input>", "path to the transactions CSV file")
    .configureOutput({ writeOut: io.stdout, writeErr: io.stderr })
    .action(async (input: string) => {
      const config = loadConfig(io.env);
      const logger = io.logger ?? createLogger(config);
      logger.debug({ input, decimals: config.AMOUNT_DECIMALS }, "replaying");

      const { ledger } = await replayFile(input, { decimals: config.AMOUNT_DECIMALS, logger });
      io.stdout(renderAccountsCsv(ledger.snapshot()));
    });

  return program;
}

/**
 * Logger for the fatal path. Falls back to default settings when the
 * environment itself is what failed to validate.
 */
function fatalLogger(io: CliIo): Logger {
  if (io.logger !== undefined) {
    return io.logger;
  }
  const parsed = ConfigSchema.safeParse(io.env);
  return createLogger(parsed.success ? parsed.data : ConfigSchema.parse({}));
}

/**
 * Run the program and return the process exit code.
 * Setup failures are logged at fatal and summarized on stderr.
 */
export async function runCli(argv: readonly string[], io: CliIo): Promise<number> {
  const program = createProgram(io).exitOverride();

  try {
    await program.parseAsync([...argv]);
    return 0;
  } catch (err: unknown) {
    // Usage errors, --help and --version: commander has already written its output.
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    const message = err instanceof Error ? err.message : String(err);
    fatalLogger(io).fatal({ err }, "replay aborted");
    io.stderr(`${chalk.red.bold("tally: fatal:")} ${message}\n`);
    return 1;
  }
}
