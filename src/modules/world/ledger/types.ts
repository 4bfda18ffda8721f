/**
 * Ledger Types.
 *
 * Purpose: receipts returned by balance movements.
 */
import type { CitizenId } from "@/db/types";

/** One applied balance change. */
export interface LedgerMovement {
  readonly citizenId: CitizenId;
  /** Positive for credits, negative for debits. */
  readonly delta: number;
  readonly balanceBefore: number;
  readonly balanceAfter: number;
}

export interface TransferReceipt {
  readonly fromId: CitizenId;
  readonly toId: CitizenId;
  readonly amount: number;
  readonly fromBalance: number;
  readonly toBalance: number;
}
