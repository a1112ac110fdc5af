/**
 * @tally/cli: account table export.
 */

import type { AccountSnapshotRow } from "@tally/ledger";

export const ACCOUNT_COLUMNS = ["client", "available", "held", "total", "locked"] as const;

/**
 * Render snapshot rows as CSV, header first, one line per account.
 */
export function renderAccountsCsv(rows: readonly AccountSnapshotRow[]): string {
  const lines = [ACCOUNT_COLUMNS.join(",")];
  for (const row of rows) {
    lines.push(
      [String(row.client), row.available, row.held, row.total, String(row.locked)].join(","),
    );
  }
  return `${lines.join("\n")}\n`;
}
