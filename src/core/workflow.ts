/**
 * Ballot Workflow -- Workflow State Machine
 *
 * Owns the current campaign phase.  Phases advance one step at a time
 * along a single line:
 *
 *   RegisteringVoters
 *     -> ProposalsRegistrationStarted
 *     -> ProposalsRegistrationEnded
 *     -> VotingSessionStarted
 *     -> VotingSessionEnded
 *     -> VotesTallied
 *
 * and any phase except the first may go back to `RegisteringVoters`
 * (reset).  Domain guards (non-empty registries and so on) are checked by
 * the controller before a transition is requested; this class only knows
 * about edges.
 *
 * @module workflow
 * @license AGPL-3.0-or-later
 */

import {
  WORKFLOW_STATUSES,
  type TransitionRecord,
  type WorkflowStatus,
} from "../types";
import { CampaignError } from "./errors";

export const INITIAL_STATUS: WorkflowStatus = "RegisteringVoters";

/** Called once per successful transition. */
export type TransitionListener = (record: TransitionRecord) => void;

/** Position of a phase in the workflow order. */
export function phaseRank(status: WorkflowStatus): number {
  return WORKFLOW_STATUSES.indexOf(status);
}

/** The forward successor of `status`, or undefined for `VotesTallied`. */
export function nextStatus(status: WorkflowStatus): WorkflowStatus | undefined {
  return WORKFLOW_STATUSES[phaseRank(status) + 1];
}

export class WorkflowStateMachine {
  private status: WorkflowStatus = INITIAL_STATUS;
  private records: TransitionRecord[] = [];

  constructor(private readonly onTransition?: TransitionListener) {}

  current(): WorkflowStatus {
    return this.status;
  }

  next(): WorkflowStatus | undefined {
    return nextStatus(this.status);
  }

  /** Whether `target` is reachable from the current phase in one edge. */
  canAdvanceTo(target: WorkflowStatus): boolean {
    if (target === INITIAL_STATUS) {
      return this.status !== INITIAL_STATUS;
    }
    return nextStatus(this.status) === target;
  }

  /**
   * Moves to `target` and notifies the transition listener.
   *
   * @throws CampaignError `INVALID_TRANSITION` if no edge leads there
   */
  advanceTo(target: WorkflowStatus): TransitionRecord {
    if (!this.canAdvanceTo(target)) {
      throw new CampaignError(
        `Cannot move from ${this.status} to ${target}`,
        "INVALID_TRANSITION"
      );
    }

    const record: TransitionRecord = {
      previous: this.status,
      next: target,
      at: new Date().toISOString(),
    };
    this.status = target;
    this.records.push(record);
    this.onTransition?.(record);
    return record;
  }

  /** Every transition performed so far, oldest first. */
  history(): TransitionRecord[] {
    return [...this.records];
  }
}
