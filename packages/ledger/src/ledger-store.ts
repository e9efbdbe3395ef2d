/**
 * @payledger/ledger — Ledger store.
 *
 * Owns every AccountLedger, keyed by client ID. Ledgers are created
 * lazily the first time a client is seen and are never removed.
 *
 * Rules:
 * - One ledger per client ID
 * - New ledgers start at available = 0, held = 0, unlocked
 * - Passed explicitly to engines; there is no process-wide store
 */

import type { ClientId, ClientSnapshot } from "@payledger/types";
import { AccountLedger } from "./account-ledger.js";

/**
 * Append-only registry of account ledgers.
 */
export class LedgerStore {
  private readonly _ledgers: Map<ClientId, AccountLedger> = new Map();

  /**
   * Get the ledger for a client, creating an empty one on first sight.
   */
  getOrCreate(clientId: ClientId): AccountLedger {
    let ledger = this._ledgers.get(clientId);
    if (ledger === undefined) {
      ledger = new AccountLedger(clientId);
      this._ledgers.set(clientId, ledger);
    }
    return ledger;
  }

  /**
   * Get a ledger by client ID.
   * Returns undefined if the client has not been seen.
   */
  get(clientId: ClientId): AccountLedger | undefined {
    return this._ledgers.get(clientId);
  }

  has(clientId: ClientId): boolean {
    return this._ledgers.has(clientId);
  }

  /**
   * Number of clients seen so far.
   */
  get size(): number {
    return this._ledgers.size;
  }

  /**
   * All known client IDs in ascending order.
   */
  clientIds(): readonly ClientId[] {
    return [...this._ledgers.keys()].sort((a, b) => a - b);
  }

  /**
   * Snapshot every ledger, ordered by ascending client ID.
   */
  snapshots(): readonly ClientSnapshot[] {
    return [...this._ledgers.values()]
      .sort((a, b) => a.clientId - b.clientId)
      .map((ledger) => ledger.snapshot());
  }
}
