/**
 * Ballot Workflow -- Proposal Registry
 *
 * Ordered list of the proposals of the current generation.  A proposal is
 * identified by its index; descriptions are unique (exact match).
 *
 * @module proposal-registry
 * @license AGPL-3.0-or-later
 */

import type { Proposal } from "../types";
import { preconditionFailed } from "./errors";

export class ProposalRegistry {
  private proposals: Proposal[] = [];

  /**
   * Appends a proposal with no votes.
   *
   * @returns The new proposal's id (its index)
   * @throws CampaignError `DUPLICATE_PROPOSAL`
   */
  submit(description: string): number {
    if (this.has(description)) {
      throw preconditionFailed(
        "DUPLICATE_PROPOSAL",
        `A proposal with description "${description}" already exists`
      );
    }
    this.proposals.push({ description, voteCount: 0 });
    return this.proposals.length - 1;
  }

  /**
   * @throws CampaignError `INVALID_PROPOSAL_ID`
   */
  incrementVote(proposalId: number): void {
    const proposal = this.proposals[this.checkId(proposalId)];
    proposal.voteCount++;
  }

  /** Whether `proposalId` names a proposal of the current generation. */
  isValidId(proposalId: number): boolean {
    return (
      Number.isInteger(proposalId) &&
      proposalId >= 0 &&
      proposalId < this.proposals.length
    );
  }

  has(description: string): boolean {
    return this.proposals.some((p) => p.description === description);
  }

  get(proposalId: number): Proposal | undefined {
    if (!this.isValidId(proposalId)) return undefined;
    return { ...this.proposals[proposalId] };
  }

  /** Returns copies of all proposals, in id order. */
  list(): Proposal[] {
    return this.proposals.map((p) => ({ ...p }));
  }

  count(): number {
    return this.proposals.length;
  }

  clear(): void {
    this.proposals = [];
  }

  private checkId(proposalId: number): number {
    if (!this.isValidId(proposalId)) {
      throw preconditionFailed(
        "INVALID_PROPOSAL_ID",
        this.proposals.length === 0
          ? "There are no proposals to vote for"
          : `Proposal id must be an integer between 0 and ${this.proposals.length - 1}`
      );
    }
    return proposalId;
  }
}
