/**
 * Ballot Workflow -- Voter Registry
 *
 * Tracks which identities may vote and whether they already did.
 *
 * Identities are enumerated in registration order and never leave the
 * enumeration: a campaign reset only clears their flags.  An identity
 * that was never registered has no record at all, which keeps "never
 * seen" apart from "registered in an earlier generation".
 *
 * @module voter-registry
 * @license AGPL-3.0-or-later
 */

import type { Voter } from "../types";
import { preconditionFailed } from "./errors";

export class VoterRegistry {
  /** Registration order; each identity appears at most once */
  private identities: string[] = [];

  /** Voter records keyed by identity */
  private voters: Map<string, Voter> = new Map();

  /**
   * Marks an identity as an eligible voter.
   *
   * @throws CampaignError `ALREADY_REGISTERED` if the identity is
   *   registered in the current generation
   */
  register(identity: string): void {
    const existing = this.voters.get(identity);
    if (existing?.isRegistered) {
      throw preconditionFailed(
        "ALREADY_REGISTERED",
        `Voter ${identity} is already registered`
      );
    }

    if (existing) {
      // Known from an earlier generation: already enumerated
      existing.isRegistered = true;
      return;
    }

    this.identities.push(identity);
    this.voters.set(identity, {
      isRegistered: true,
      hasVoted: false,
      votedProposalId: 0,
    });
  }

  /** Every identity ever registered, in registration order. */
  list(): string[] {
    return [...this.identities];
  }

  /** Returns a copy of the voter record, or undefined if never registered. */
  get(identity: string): Voter | undefined {
    const voter = this.voters.get(identity);
    return voter ? { ...voter } : undefined;
  }

  isRegistered(identity: string): boolean {
    return this.voters.get(identity)?.isRegistered ?? false;
  }

  /**
   * @throws CampaignError `NOT_REGISTERED` if the identity was never registered
   */
  hasVoted(identity: string): boolean {
    return this.require(identity).hasVoted;
  }

  /**
   * @throws CampaignError `NOT_REGISTERED` if the identity was never registered
   */
  votedProposalId(identity: string): number {
    return this.require(identity).votedProposalId;
  }

  /**
   * Records a ballot for a voter.  Eligibility (registration) is the
   * caller's concern; this only enforces one vote per voter.
   *
   * @throws CampaignError `NOT_REGISTERED` or `ALREADY_VOTED`
   */
  recordVote(identity: string, proposalId: number): void {
    const voter = this.require(identity);
    if (voter.hasVoted) {
      throw preconditionFailed(
        "ALREADY_VOTED",
        `Voter ${identity} has already voted`
      );
    }
    voter.hasVoted = true;
    voter.votedProposalId = proposalId;
  }

  /** Number of identities registered in the current generation. */
  registeredCount(): number {
    let count = 0;
    for (const voter of this.voters.values()) {
      if (voter.isRegistered) count++;
    }
    return count;
  }

  /** Number of registered voters who have cast a ballot. */
  votedCount(): number {
    let count = 0;
    for (const voter of this.voters.values()) {
      if (voter.isRegistered && voter.hasVoted) count++;
    }
    return count;
  }

  /**
   * Clears every voter's flags.  The enumeration itself is kept, so
   * `list()` still returns the identities of earlier generations.
   */
  resetAll(): void {
    for (const voter of this.voters.values()) {
      voter.isRegistered = false;
      voter.hasVoted = false;
      voter.votedProposalId = 0;
    }
  }

  private require(identity: string): Voter {
    const voter = this.voters.get(identity);
    if (!voter) {
      throw preconditionFailed(
        "NOT_REGISTERED",
        `Identity ${identity} is not a registered voter`
      );
    }
    return voter;
  }
}
