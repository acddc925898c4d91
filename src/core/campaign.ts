/**
 * Ballot Workflow -- Campaign Controller
 *
 * The single entry point of the campaign core.  Every operation takes the
 * caller's identity and runs the same pipeline:
 *
 *   1. Guards from `GUARD_TABLE` (authority, phase, domain checks)
 *   2. Registry mutation or phase transition
 *   3. Derived effects (tally after counting, registry reset before reset)
 *   4. Domain events on the bus
 *
 * All checks run before the first mutation, so a rejected call leaves the
 * campaign exactly as it was.  Every method is synchronous and runs to
 * completion; callers that share a controller across requests get
 * single-writer semantics for free on Node's event loop.
 *
 * @module campaign
 * @license AGPL-3.0-or-later
 */

import type {
  CampaignStatus,
  IndexedProposal,
  TallyResult,
  TransitionRecord,
  VoterChoice,
  VoterStatus,
  WinnerDetails,
  WorkflowStatus,
} from "../types";
import type { AccessControl } from "./access-control";
import { CampaignError, preconditionFailed } from "./errors";
import { CampaignEventBus } from "./events";
import {
  GUARD_TABLE,
  enforceGuards,
  type CampaignState,
  type Guard,
} from "./guards";
import { ProposalRegistry } from "./proposal-registry";
import { TallyEngine, describeNoWinner } from "./tally";
import { VoterRegistry } from "./voter-registry";
import { INITIAL_STATUS, WorkflowStateMachine } from "./workflow";

export interface CampaignControllerOptions {
  access: AccessControl;
  /** Bus to publish domain events on (a private one is created otherwise) */
  events?: CampaignEventBus;
}

/**
 * @example
 * ```ts
 * const campaign = new CampaignController({
 *   access: new SingleAdministrator("admin"),
 * });
 *
 * campaign.addVoter("admin", "alice");
 * campaign.openProposalsRegistration("admin");
 * campaign.addNewProposal("alice", "Build a library");
 * campaign.closeProposalsRegistration("admin");
 * campaign.openVotingSession("admin");
 * campaign.vote("alice", 0);
 * campaign.closeVotingSession("admin");
 * campaign.startCounting("admin");
 *
 * campaign.winnerDetails(); // { proposalId: 0, description: "Build a library", voteCount: 1 }
 * ```
 */
export class CampaignController {
  readonly events: CampaignEventBus;
  private readonly access: AccessControl;
  private readonly state: CampaignState;

  constructor(options: CampaignControllerOptions) {
    this.access = options.access;
    this.events = options.events ?? new CampaignEventBus();

    const workflow = new WorkflowStateMachine((record) => {
      this.events.publish({
        type: "phase:changed",
        previous: record.previous,
        next: record.next,
      });
    });

    this.state = {
      voters: new VoterRegistry(),
      proposals: new ProposalRegistry(),
      workflow,
      tally: new TallyEngine(),
      generation: 0,
    };
  }

  // --------------------------------------------------------
  // Voter registration
  // --------------------------------------------------------

  addVoter(caller: string, identity: string): void {
    this.guard(caller, GUARD_TABLE.addVoter(identity));
    this.state.voters.register(identity);
    this.events.publish({ type: "voter:registered", identity });
  }

  openProposalsRegistration(caller: string): TransitionRecord {
    this.guard(caller, GUARD_TABLE.openProposalsRegistration());
    return this.state.workflow.advanceTo("ProposalsRegistrationStarted");
  }

  // --------------------------------------------------------
  // Proposals
  // --------------------------------------------------------

  /**
   * Submits a proposal on behalf of a registered voter.
   *
   * @returns The id of the new proposal
   */
  addNewProposal(caller: string, description: string): number {
    this.guard(caller, GUARD_TABLE.addNewProposal(description));
    const proposalId = this.state.proposals.submit(description);
    this.events.publish({
      type: "proposal:registered",
      proposalId,
      description,
      author: caller,
    });
    return proposalId;
  }

  closeProposalsRegistration(caller: string): TransitionRecord {
    this.guard(caller, GUARD_TABLE.closeProposalsRegistration());
    return this.state.workflow.advanceTo("ProposalsRegistrationEnded");
  }

  // --------------------------------------------------------
  // Voting
  // --------------------------------------------------------

  openVotingSession(caller: string): TransitionRecord {
    this.guard(caller, GUARD_TABLE.openVotingSession());
    return this.state.workflow.advanceTo("VotingSessionStarted");
  }

  vote(caller: string, proposalId: number): void {
    this.guard(caller, GUARD_TABLE.vote(proposalId));
    this.state.voters.recordVote(caller, proposalId);
    this.state.proposals.incrementVote(proposalId);
    this.events.publish({ type: "vote:cast", voter: caller, proposalId });
  }

  closeVotingSession(caller: string): TransitionRecord {
    this.guard(caller, GUARD_TABLE.closeVotingSession());
    return this.state.workflow.advanceTo("VotingSessionEnded");
  }

  // --------------------------------------------------------
  // Tally & reset
  // --------------------------------------------------------

  /**
   * Closes the campaign and counts the votes.
   */
  startCounting(caller: string): TallyResult {
    this.guard(caller, GUARD_TABLE.startCounting());
    this.state.workflow.advanceTo("VotesTallied");

    const proposals = this.state.proposals.list();
    const result = this.state.tally.run(proposals);

    if (result.kind === "winner") {
      this.events.publish({
        type: "tally:winner",
        proposalId: result.proposalId,
        description: proposals[result.proposalId].description,
        voteCount: result.voteCount,
      });
    } else {
      this.events.publish({
        type: "tally:no-winner",
        reason: result.reason,
        tiedProposalIds: [...result.tiedProposalIds],
      });
    }
    return result;
  }

  /**
   * Starts a new generation: voter flags are cleared (identities stay
   * enumerated), proposals are dropped, and the phase returns to
   * `RegisteringVoters`.
   */
  resetCampaign(caller: string): TransitionRecord {
    this.guard(caller, GUARD_TABLE.resetCampaign());

    this.state.voters.resetAll();
    this.state.proposals.clear();
    this.state.generation++;
    const record = this.state.workflow.advanceTo(INITIAL_STATUS);

    this.events.publish({
      type: "campaign:reset",
      generation: this.state.generation,
    });
    return record;
  }

  // --------------------------------------------------------
  // Queries
  // --------------------------------------------------------

  currentPhase(): WorkflowStatus {
    return this.state.workflow.current();
  }

  status(): CampaignStatus {
    return {
      phase: this.state.workflow.current(),
      generation: this.state.generation,
      administrator: this.access.administrator(),
      registeredVoters: this.state.voters.registeredCount(),
      proposals: this.state.proposals.count(),
      votesCast: this.state.voters.votedCount(),
    };
  }

  /** Every identity ever registered, including earlier generations. */
  listVoters(): string[] {
    return this.state.voters.list();
  }

  listProposals(): IndexedProposal[] {
    return this.state.proposals
      .list()
      .map((proposal, proposalId) => ({ proposalId, ...proposal }));
  }

  /**
   * @throws CampaignError `NOT_REGISTERED` for an identity never registered
   */
  voterStatus(identity: string): VoterStatus {
    const voter = this.state.voters.get(identity);
    if (!voter) {
      throw preconditionFailed(
        "NOT_REGISTERED",
        `Identity ${identity} is not a registered voter`
      );
    }
    return {
      identity,
      isRegistered: voter.isRegistered,
      hasVoted: voter.hasVoted,
      votedProposalId: voter.hasVoted ? voter.votedProposalId : null,
    };
  }

  /**
   * Reveals what a voter voted for, once voting has closed.
   */
  getVoterChoice(caller: string, identity: string): VoterChoice {
    this.guard(caller, GUARD_TABLE.getVoterChoice(identity));
    const proposalId = this.state.voters.votedProposalId(identity);
    const proposal = this.state.proposals.get(proposalId);
    if (!proposal) {
      throw preconditionFailed(
        "INVALID_PROPOSAL_ID",
        `Proposal ${proposalId} no longer exists`
      );
    }
    return { identity, proposalId, description: proposal.description };
  }

  /**
   * @throws CampaignError `INVALID_TRANSITION` before votes are tallied
   */
  tallyOutcome(): TallyResult {
    this.guard(null, GUARD_TABLE.tallyOutcome());
    const result = this.state.tally.lastResult();
    if (!result) {
      throw new CampaignError("Votes have not been tallied yet", "INVALID_TRANSITION");
    }
    return result;
  }

  /**
   * @throws CampaignError `NO_WINNER_AVAILABLE`
   */
  winner(): number {
    if (this.state.workflow.current() !== "VotesTallied") {
      throw new CampaignError("Votes have not been tallied yet", "NO_WINNER_AVAILABLE");
    }

    const { tally } = this.state;
    const winningId = tally.winningProposalId;
    if (!tally.winnerElected || winningId === null) {
      const last = tally.lastResult();
      const reason =
        last?.kind === "no-winner" ? describeNoWinner(last.reason) : "no winner elected";
      throw new CampaignError(`No winner: ${reason}`, "NO_WINNER_AVAILABLE");
    }
    return winningId;
  }

  /**
   * @throws CampaignError `NO_WINNER_AVAILABLE`
   */
  winnerDetails(): WinnerDetails {
    const proposalId = this.winner();
    const proposal = this.state.proposals.get(proposalId);
    if (!proposal) {
      throw new CampaignError(`Proposal ${proposalId} no longer exists`, "NO_WINNER_AVAILABLE");
    }
    return { proposalId, ...proposal };
  }

  /** Workflow transitions since the controller was created. */
  transitions(): TransitionRecord[] {
    return this.state.workflow.history();
  }

  private guard(caller: string | null, guards: Guard[]): void {
    enforceGuards(guards, { caller, state: this.state, access: this.access });
  }
}

/**
 * Creates a controller for the given administrator capability.
 */
export function createCampaign(
  access: AccessControl,
  events?: CampaignEventBus
): CampaignController {
  return new CampaignController({ access, events });
}
