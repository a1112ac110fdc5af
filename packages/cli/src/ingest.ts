/**
 * @tally/cli: transaction CSV ingestion.
 *
 * Reads `type, client, tx, amount` rows one line at a time.
 * Columns are located by header name, every field is trimmed, and
 * `type` is case-insensitive. A row that does not validate is
 * reported as dropped; it never reaches the ledger.
 */

import { open } from "node:fs/promises";
import { z } from "zod";
import type { ZodError } from "zod";
import { MAX_CLIENT_ID, MAX_TRANSACTION_ID } from "@tally/types";

// =============================================================================
// Record Schema
// =============================================================================

const COMMAND_TYPES = ["deposit", "withdrawal", "dispute", "resolve", "chargeback"] as const;

function unsignedInteger(max: number) {
  return z
    .string()
    .regex(/^\d+$/, "Expected an unsigned integer")
    .transform(Number)
    .pipe(z.number().int().max(max));
}

export const TransactionRecordSchema = z.object({
  type: z.string().trim().toLowerCase().pipe(z.enum(COMMAND_TYPES)),
  client: unsignedInteger(MAX_CLIENT_ID),
  tx: unsignedInteger(MAX_TRANSACTION_ID),
  amount: z
    .string()
    .regex(/^-?\d+(\.\d+)?$/, "Expected a decimal amount")
    .optional(),
});

export type TransactionRecord = z.infer<typeof TransactionRecordSchema>;

// =============================================================================
// Header
// =============================================================================

/** Column position of each known field. `amount` may be absent. */
export interface RecordHeader {
  readonly type: number;
  readonly client: number;
  readonly tx: number;
  readonly amount?: number | undefined;
}

export class IngestError extends Error {
  public readonly code: "MISSING_COLUMN";

  constructor(code: IngestError["code"], message: string) {
    super(message);
    this.name = "IngestError";
    this.code = code;
  }
}

function splitFields(line: string): string[] {
  return line.split(",").map((field) => field.trim());
}

/**
 * Locate the known columns in a header line.
 *
 * @throws {IngestError} if type, client or tx is missing
 */
export function parseHeader(line: string): RecordHeader {
  const names = splitFields(line.replace(/^\uFEFF/, "")).map((name) => name.toLowerCase());
  const position = (name: string): number | undefined => {
    const index = names.indexOf(name);
    return index === -1 ? undefined : index;
  };

  const type = position("type");
  const client = position("client");
  const tx = position("tx");
  if (type === undefined || client === undefined || tx === undefined) {
    throw new IngestError(
      "MISSING_COLUMN",
      `Header must name type, client and tx columns, got: "${line.trim()}"`,
    );
  }

  return { type, client, tx, amount: position("amount") };
}

// =============================================================================
// Rows
// =============================================================================

export type RecordParse =
  | { readonly ok: true; readonly record: TransactionRecord }
  | { readonly ok: false; readonly reason: string };

function formatZodErrors(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    .join("; ");
}

/**
 * Validate one data line against the header.
 * Missing trailing fields and empty fields count as absent.
 */
export function parseRecordLine(line: string, header: RecordHeader): RecordParse {
  const fields = splitFields(line);
  const field = (index: number | undefined): string | undefined => {
    if (index === undefined) return undefined;
    const value = fields[index];
    return value === undefined || value === "" ? undefined : value;
  };

  const result = TransactionRecordSchema.safeParse({
    type: field(header.type),
    client: field(header.client),
    tx: field(header.tx),
    amount: field(header.amount),
  });

  if (!result.success) {
    return { ok: false, reason: formatZodErrors(result.error) };
  }
  return { ok: true, record: result.data };
}

// =============================================================================
// Streams
// =============================================================================

/**
 * One ingested data line. `line` is the 1-based line number in the input.
 */
export type IngestEvent =
  | { readonly kind: "record"; readonly line: number; readonly record: TransactionRecord }
  | { readonly kind: "dropped"; readonly line: number; readonly reason: string };

/**
 * Turn raw lines into records. Blank lines are skipped; the first
 * non-blank line is the header. An empty input yields nothing.
 *
 * @throws {IngestError} if the header lacks a required column
 */
export async function* readRecords(
  lines: AsyncIterable<string> | Iterable<string>,
): AsyncGenerator<IngestEvent> {
  let header: RecordHeader | undefined;
  let lineNumber = 0;

  for await (const line of lines) {
    lineNumber++;
    if (line.trim() === "") {
      continue;
    }
    if (header === undefined) {
      header = parseHeader(line);
      continue;
    }

    const parsed = parseRecordLine(line, header);
    yield parsed.ok
      ? { kind: "record", line: lineNumber, record: parsed.record }
      : { kind: "dropped", line: lineNumber, reason: parsed.reason };
  }
}

/**
 * Stream the lines of a file.
 * Opening happens before the first line, so a missing or unreadable
 * file rejects on the first iteration.
 */
export async function* openLines(path: string): AsyncGenerator<string> {
  const handle = await open(path, "r");
  try {
    for await (const line of handle.readLines()) {
      yield line;
    }
  } finally {
    await handle.close();
  }
}
