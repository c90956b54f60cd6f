/**
 * Tracks which pull requests have already been published in this process.
 */

import { PullRequestKey, formatPullRequestKey } from "../review/types";

type LedgerState = "reserved" | "committed";

/**
 * In-memory publication ledger. One instance is owned by the host process
 * and passed to every publish call.
 *
 * `tryReserve` checks and records in a single synchronous step, so two
 * concurrent publishes of the same pull request cannot both proceed.
 */
export class PublicationLedger {
  private readonly entries = new Map<string, LedgerState>();

  tryReserve(key: PullRequestKey): boolean {
    const id = formatPullRequestKey(key);
    if (this.entries.has(id)) {
      return false;
    }
    this.entries.set(id, "reserved");
    return true;
  }

  commit(key: PullRequestKey): void {
    this.entries.set(formatPullRequestKey(key), "committed");
  }

  release(key: PullRequestKey): void {
    const id = formatPullRequestKey(key);
    if (this.entries.get(id) === "reserved") {
      this.entries.delete(id);
    }
  }

  has(key: PullRequestKey): boolean {
    return this.entries.get(formatPullRequestKey(key)) === "committed";
  }

  isPending(key: PullRequestKey): boolean {
    return this.entries.get(formatPullRequestKey(key)) === "reserved";
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
