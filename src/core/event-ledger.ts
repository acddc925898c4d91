/**
 * Ballot Workflow -- Event Ledger
 *
 * Tamper-evident record of everything that happened in a campaign.  The
 * ledger subscribes to the event bus and appends each domain event to a
 * SHA-256 hash chain, so an auditor can replay the campaign (votes are
 * public by design) and check that no entry was altered.
 *
 * @module event-ledger
 * @license AGPL-3.0-or-later
 */

import { HashChain, type ChainEntry, type HashChainVerification } from "../utils/hash-chain";
import type { CampaignEvent, CampaignEventBus } from "./events";

/** First entry of every ledger. */
export interface LedgerGenesis {
  type: "ledger:opened";
  administrator: string;
}

export type LedgerRecord = LedgerGenesis | CampaignEvent;

export type LedgerEntry = ChainEntry<LedgerRecord>;

export interface LedgerStats {
  /** Entries including genesis */
  totalEntries: number;
  /** Domain events recorded (entries minus genesis) */
  totalEvents: number;
  genesisHash: string;
  latestHash: string;
  openedAt: string;
  latestTimestamp: string;
}

export class EventLedger {
  private chain: HashChain<LedgerRecord>;
  private detach: (() => void) | null = null;

  constructor(administrator: string) {
    this.chain = new HashChain<LedgerRecord>({
      type: "ledger:opened",
      administrator,
    });
  }

  /**
   * Starts recording every event published on `bus`.  A ledger records
   * from at most one bus; attaching again moves it.
   */
  attach(bus: CampaignEventBus): void {
    this.detach?.();
    this.detach = bus.subscribeAll((event) => {
      this.record(event);
    });
  }

  /** Stops recording. */
  close(): void {
    this.detach?.();
    this.detach = null;
  }

  record(event: CampaignEvent): LedgerEntry {
    return this.chain.append(event);
  }

  entries(): LedgerEntry[] {
    return this.chain.getAll();
  }

  /** Entries whose index is at least `from` (genesis is index 0). */
  entriesSince(from: number): LedgerEntry[] {
    return this.chain.getAll().filter((entry) => entry.index >= from);
  }

  verify(): HashChainVerification {
    return this.chain.verify();
  }

  stats(): LedgerStats {
    const entries = this.chain.getAll();
    const genesis = entries[0];
    const latest = entries[entries.length - 1];
    return {
      totalEntries: entries.length,
      totalEvents: entries.length - 1,
      genesisHash: genesis.hash,
      latestHash: latest.hash,
      openedAt: genesis.timestamp,
      latestTimestamp: latest.timestamp,
    };
  }
}
