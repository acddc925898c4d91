/**
 * Ballot Workflow -- Tally Engine
 *
 * Picks the winning proposal from final vote counts.  A winner is
 * declared only when exactly one proposal holds the maximum count and
 * that maximum is positive; a tie or an empty ballot box yields no winner.
 *
 * @module tally
 * @license AGPL-3.0-or-later
 */

import type { NoWinnerReason, Proposal, TallyResult } from "../types";

export class TallyEngine {
  private elected = false;
  private winningId: number | null = null;
  private result: TallyResult | null = null;

  /**
   * Counts the votes and stores the outcome, replacing any earlier one.
   *
   * Single pass in index order: tracks the maximum and every index that
   * reaches it.
   */
  run(proposals: readonly Proposal[]): TallyResult {
    let maxVotes = 0;
    let leaders: number[] = [];

    proposals.forEach((proposal, index) => {
      if (proposal.voteCount > maxVotes) {
        maxVotes = proposal.voteCount;
        leaders = [index];
      } else if (proposal.voteCount === maxVotes && maxVotes > 0) {
        leaders.push(index);
      }
    });

    let result: TallyResult;
    if (maxVotes === 0) {
      result = { kind: "no-winner", reason: "NO_VOTES", tiedProposalIds: [] };
    } else if (leaders.length > 1) {
      result = { kind: "no-winner", reason: "TIE", tiedProposalIds: leaders };
    } else {
      result = { kind: "winner", proposalId: leaders[0], voteCount: maxVotes };
    }

    this.elected = result.kind === "winner";
    this.winningId = result.kind === "winner" ? result.proposalId : null;
    this.result = result;
    return copyResult(result);
  }

  get winnerElected(): boolean {
    return this.elected;
  }

  /** The elected proposal id; null whenever `winnerElected` is false. */
  get winningProposalId(): number | null {
    return this.winningId;
  }

  /** Outcome of the latest run, or null if no tally ran yet. */
  lastResult(): TallyResult | null {
    return this.result ? copyResult(this.result) : null;
  }
}

function copyResult(result: TallyResult): TallyResult {
  return result.kind === "winner"
    ? { ...result }
    : { ...result, tiedProposalIds: [...result.tiedProposalIds] };
}

/** Human-readable explanation of a no-winner outcome. */
export function describeNoWinner(reason: NoWinnerReason): string {
  return reason === "NO_VOTES"
    ? "no proposal received any vote"
    : "tie among two or more proposals";
}
