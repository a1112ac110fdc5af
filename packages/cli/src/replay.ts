/**
 * @tally/cli: replay driver.
 *
 * Feeds ingested records through conversion and into the ledger, strictly
 * in input order. Nothing a single record does can stop the run:
 * - malformed lines are logged at debug and counted as dropped
 * - records that fail conversion are logged at warn and counted as invalid
 * - commands the ledger rejects are logged at warn and counted as rejected
 */

import type { Logger } from "pino";
import { Ledger, describeFailure } from "@tally/ledger";
import { toCommand } from "./commands.js";
import { openLines, readRecords } from "./ingest.js";
import type { IngestEvent } from "./ingest.js";

export interface ReplaySummary {
  /** Lines that parsed into a record. */
  readonly records: number;
  readonly applied: number;
  readonly rejected: number;
  readonly invalid: number;
  readonly dropped: number;
}

export interface ReplayOptions {
  readonly ledger: Ledger;
  readonly logger: Logger;
}

export async function replay(
  events: AsyncIterable<IngestEvent> | Iterable<IngestEvent>,
  options: ReplayOptions,
): Promise<ReplaySummary> {
  const { ledger, logger } = options;
  let records = 0;
  let applied = 0;
  let rejected = 0;
  let invalid = 0;
  let dropped = 0;

  for await (const event of events) {
    if (event.kind === "dropped") {
      dropped++;
      logger.debug({ line: event.line, reason: event.reason }, "dropped malformed record");
      continue;
    }

    records++;
    const converted = toCommand(event.record, ledger.decimals);
    if (!converted.ok) {
      invalid++;
      logger.warn(
        { line: event.line, code: converted.error.code },
        `unable to parse transaction: ${converted.error.message}`,
      );
      continue;
    }

    const result = ledger.apply(converted.command);
    if (result.ok) {
      applied++;
    } else {
      rejected++;
      logger.warn(
        { line: event.line, ...result.failure },
        `unable to process transaction: ${describeFailure(result.failure)}`,
      );
    }
  }

  const summary: ReplaySummary = { records, applied, rejected, invalid, dropped };
  logger.info({ ...summary, accounts: ledger.accountCount }, "replay complete");
  return summary;
}

export interface ReplayFileOptions {
  readonly decimals: number;
  readonly logger: Logger;
}

export interface ReplayFileResult {
  readonly ledger: Ledger;
  readonly summary: ReplaySummary;
}

/**
 * Replay a CSV file into a fresh ledger.
 *
 * @throws if the file cannot be opened or its header is unusable
 */
export async function replayFile(path: string, options: ReplayFileOptions): Promise<ReplayFileResult> {
  const ledger = new Ledger({ decimals: options.decimals });
  const summary = await replay(readRecords(openLines(path)), { ledger, logger: options.logger });
  return { ledger, summary };
}
