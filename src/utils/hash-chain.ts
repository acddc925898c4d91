/**
 * Ballot Workflow -- SHA-256 Hash Chain
 *
 * Generic append-only chain of entries, each linked to its predecessor by
 * hash.  Editing, removing or inserting any entry after the fact breaks
 * every following link, which `verify()` reports.
 *
 * @module utils/hash-chain
 * @license AGPL-3.0-or-later
 */

import { createHash } from "crypto";

// ============================================================
// Types
// ============================================================

/** A single entry in the chain */
export interface ChainEntry<T> {
  /** Sequential index (0 = genesis) */
  index: number;
  /** Hash of the previous entry (all zeros for genesis) */
  previousHash: string;
  /** Hash of this entry's index, link, timestamp and payload */
  hash: string;
  /** ISO 8601 timestamp */
  timestamp: string;
  data: T;
}

export interface HashChainVerification {
  isValid: boolean;
  entriesChecked: number;
  /** Index of the first corrupted entry (-1 if all valid) */
  firstInvalidIndex: number;
  error?: string;
}

// ============================================================
// Hashing
// ============================================================

export const GENESIS_PREVIOUS_HASH = "0".repeat(64);

/** Hex-encoded SHA-256 digest of a string. */
export function sha256(data: string): string {
  return createHash("sha256").update(data).digest("hex");
}

/**
 * Hash of an entry over `index | previousHash | timestamp | JSON(data)`.
 */
export function computeEntryHash<T>(
  index: number,
  previousHash: string,
  timestamp: string,
  data: T
): string {
  return sha256(`${index}|${previousHash}|${timestamp}|${JSON.stringify(data)}`);
}

// ============================================================
// HashChain
// ============================================================

/**
 * @typeParam T - The payload type stored in each entry
 *
 * @example
 * ```ts
 * const chain = new HashChain<{ note: string }>({ note: "opened" });
 * chain.append({ note: "first" });
 * chain.verify().isValid; // true
 * ```
 */
export class HashChain<T> {
  private entries: ChainEntry<T>[] = [];

  constructor(genesisData: T) {
    this.push(GENESIS_PREVIOUS_HASH, genesisData);
  }

  append(data: T): ChainEntry<T> {
    return this.push(this.getLatest().hash, data);
  }

  /**
   * Recomputes every hash and link from genesis onwards.
   */
  verify(): HashChainVerification {
    const fail = (index: number, error: string): HashChainVerification => ({
      isValid: false,
      entriesChecked: index + 1,
      firstInvalidIndex: index,
      error,
    });

    if (this.entries[0].previousHash !== GENESIS_PREVIOUS_HASH) {
      return fail(0, "Genesis entry has invalid previous hash");
    }

    for (let i = 0; i < this.entries.length; i++) {
      const entry = this.entries[i];

      if (entry.index !== i) {
        return fail(i, `Entry ${i} has wrong index: expected ${i}, got ${entry.index}`);
      }

      const expected = computeEntryHash(
        entry.index,
        entry.previousHash,
        entry.timestamp,
        entry.data
      );
      if (entry.hash !== expected) {
        return fail(i, `Entry ${i} hash mismatch`);
      }

      if (i > 0 && entry.previousHash !== this.entries[i - 1].hash) {
        return fail(i, `Entry ${i} previousHash does not match entry ${i - 1} hash`);
      }
    }

    return {
      isValid: true,
      entriesChecked: this.entries.length,
      firstInvalidIndex: -1,
    };
  }

  getLatest(): ChainEntry<T> {
    return this.entries[this.entries.length - 1];
  }

  getEntry(index: number): ChainEntry<T> | undefined {
    return this.entries[index];
  }

  /** Shallow copy of the entry list (entries themselves are shared). */
  getAll(): ChainEntry<T>[] {
    return [...this.entries];
  }

  /** Number of entries, genesis included. */
  get length(): number {
    return this.entries.length;
  }

  private push(previousHash: string, data: T): ChainEntry<T> {
    const index = this.entries.length;
    const timestamp = new Date().toISOString();
    // Snapshot so later changes to the caller's object cannot alter the entry
    const snapshot = structuredClone(data);
    const entry: ChainEntry<T> = {
      index,
      previousHash,
      hash: computeEntryHash(index, previousHash, timestamp, snapshot),
      timestamp,
      data: snapshot,
    };
    this.entries.push(entry);
    return entry;
  }
}
