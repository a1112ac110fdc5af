/**
 * @tally/ledger: snapshot extraction.
 *
 * Turns account views into reporting rows.
 *
 * Rules:
 * - Rows are ordered by ascending client id, whatever the creation order
 * - Rounding (half to even) happens here and nowhere else
 * - total is rounded from the unrounded sum, not summed from rounded parts
 */

import type { AccountSnapshotRow, ClientAccount } from "./types.js";
import { roundMoney } from "./money-math.js";

/** Fractional digits shown in reports. */
export const DISPLAY_DECIMALS = 4;

export function extractSnapshot(
  accounts: readonly ClientAccount[],
  displayDecimals: number = DISPLAY_DECIMALS,
): readonly AccountSnapshotRow[] {
  return [...accounts]
    .sort((a, b) => a.clientId - b.clientId)
    .map((account) => ({
      client: account.clientId,
      available: roundMoney(account.available, displayDecimals).amount,
      held: roundMoney(account.held, displayDecimals).amount,
      total: roundMoney(account.total, displayDecimals).amount,
      locked: account.frozen,
    }));
}
