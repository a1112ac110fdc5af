/**
 * @tally/cli: adapters around the ledger engine.
 *
 * Configuration, logging, CSV ingestion, record → command conversion,
 * CSV export and the replay driver. `main.ts` is the executable.
 */

export { ConfigSchema, loadConfig } from "./config.js";
export type { AppConfig } from "./config.js";

export { createLogger } from "./logger.js";

export {
  TransactionRecordSchema,
  IngestError,
  parseHeader,
  parseRecordLine,
  readRecords,
  openLines,
} from "./ingest.js";
export type { TransactionRecord, RecordHeader, RecordParse, IngestEvent } from "./ingest.js";

export { toCommand } from "./commands.js";
export type { CommandError, CommandErrorCode, CommandResult } from "./commands.js";

export { ACCOUNT_COLUMNS, renderAccountsCsv } from "./export.js";

export { replay, replayFile } from "./replay.js";
export type {
  ReplaySummary,
  ReplayOptions,
  ReplayFileOptions,
  ReplayFileResult,
} from "./replay.js";

export { createProgram, runCli, VERSION } from "./cli.js";
export type { CliIo } from "./cli.js";
