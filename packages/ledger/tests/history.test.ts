/**
 * Tests for TransactionHistory: insert-once records and the status lifecycle.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { TransactionHistory } from "../src/history.js";
import { LedgerError } from "../src/types.js";
import type { RecordedTransaction } from "../src/types.js";

const DEPOSIT: RecordedTransaction = {
  id: 1,
  kind: "deposit",
  clientId: 1,
  amount: { amount: "10.0000", decimals: 4 },
};

describe("TransactionHistory", () => {
  let history: TransactionHistory;

  beforeEach(() => {
    history = new TransactionHistory();
    history.record(DEPOSIT);
  });

  it("records a transaction with status normal", () => {
    expect(history.has(1)).toBe(true);
    expect(history.count).toBe(1);
    expect(history.get(1)).toEqual({ transaction: DEPOSIT, status: "normal" });
  });

  it("returns undefined for unknown ids", () => {
    expect(history.get(2)).toBeUndefined();
  });

  it("rejects a second insert under the same id", () => {
    expect(() => history.record({ ...DEPOSIT, kind: "withdrawal" })).toThrow(LedgerError);
    expect(history.get(1)?.transaction.kind).toBe("deposit");
  });

  it("walks normal → disputed → normal", () => {
    history.transition(1, "disputed");
    expect(history.get(1)?.status).toBe("disputed");
    history.transition(1, "normal");
    expect(history.get(1)?.status).toBe("normal");
  });

  it("walks normal → disputed → charged_back", () => {
    history.transition(1, "disputed");
    history.transition(1, "charged_back");
    expect(history.get(1)?.status).toBe("charged_back");
  });

  it("refuses to skip the dispute", () => {
    expect(() => history.transition(1, "charged_back")).toThrow(/cannot move from "normal" to "charged_back"/);
  });

  it("never leaves charged_back", () => {
    history.transition(1, "disputed");
    history.transition(1, "charged_back");
    expect(() => history.transition(1, "disputed")).toThrow(LedgerError);
    expect(() => history.transition(1, "normal")).toThrow(LedgerError);
  });

  it("throws for unknown ids", () => {
    try {
      history.transition(99, "disputed");
      expect.unreachable("transition should throw");
    } catch (err) {
      expect(err).toBeInstanceOf(LedgerError);
      expect((err as LedgerError).code).toBe("UNKNOWN_TRANSACTION");
    }
  });
});
