/**
 * Ballot Workflow -- Guards
 *
 * Pure predicates over (caller, campaign state, access control).  Each
 * operation of the controller is protected by a list of guards taken from
 * `GUARD_TABLE`, evaluated in order; the first failure is thrown and
 * nothing is mutated.  Order within a list is: caller authority, phase,
 * domain preconditions.
 *
 * @module guards
 * @license AGPL-3.0-or-later
 */

import type { WorkflowStatus } from "../types";
import type { AccessControl } from "./access-control";
import { CampaignError, preconditionFailed } from "./errors";
import type { ProposalRegistry } from "./proposal-registry";
import type { TallyEngine } from "./tally";
import type { VoterRegistry } from "./voter-registry";
import { phaseRank, type WorkflowStateMachine } from "./workflow";

// ============================================================
// Types
// ============================================================

/** Everything the controller owns, as one unit of state. */
export interface CampaignState {
  voters: VoterRegistry;
  proposals: ProposalRegistry;
  workflow: WorkflowStateMachine;
  tally: TallyEngine;
  /** Incremented on every reset */
  generation: number;
}

export interface GuardContext {
  /** null for read-only queries that nobody in particular issues */
  caller: string | null;
  state: Readonly<CampaignState>;
  access: AccessControl;
}

export type GuardResult =
  | { guardName: string; passed: true }
  | { guardName: string; passed: false; error: CampaignError };

export type Guard = (ctx: GuardContext) => GuardResult;

function pass(guardName: string): GuardResult {
  return { guardName, passed: true };
}

function fail(guardName: string, error: CampaignError): GuardResult {
  return { guardName, passed: false, error };
}

// ============================================================
// Caller
// ============================================================

export const callerIsAdministrator: Guard = ({ caller, access }) =>
  caller !== null && access.isAdministrator(caller)
    ? pass("callerIsAdministrator")
    : fail(
        "callerIsAdministrator",
        new CampaignError(
          "Only the administrator can perform this action",
          "UNAUTHORIZED"
        )
      );

/** Caller is registered in this generation and has not voted yet. */
export const callerIsEligibleVoter: Guard = ({ caller, state }) => {
  if (caller === null) {
    return fail(
      "callerIsEligibleVoter",
      preconditionFailed("NOT_REGISTERED", "A registered voter must make this call")
    );
  }
  if (!state.voters.isRegistered(caller)) {
    return fail(
      "callerIsEligibleVoter",
      preconditionFailed("NOT_REGISTERED", `Identity ${caller} is not a registered voter`)
    );
  }
  if (state.voters.hasVoted(caller)) {
    return fail(
      "callerIsEligibleVoter",
      preconditionFailed("ALREADY_VOTED", `Voter ${caller} has already voted`)
    );
  }
  return pass("callerIsEligibleVoter");
};

// ============================================================
// Phase
// ============================================================

export function inPhase(required: WorkflowStatus): Guard {
  return ({ state }) => {
    const current = state.workflow.current();
    return current === required
      ? pass("inPhase")
      : fail(
          "inPhase",
          new CampaignError(
            `Action requires phase ${required}; current phase is ${current}`,
            "INVALID_TRANSITION"
          )
        );
  };
}

export function notInPhase(excluded: WorkflowStatus): Guard {
  return ({ state }) =>
    state.workflow.current() !== excluded
      ? pass("notInPhase")
      : fail(
          "notInPhase",
          new CampaignError(
            `Action is not allowed during phase ${excluded}`,
            "INVALID_TRANSITION"
          )
        );
}

export function phaseAtLeast(minimum: WorkflowStatus): Guard {
  return ({ state }) => {
    const current = state.workflow.current();
    return phaseRank(current) >= phaseRank(minimum)
      ? pass("phaseAtLeast")
      : fail(
          "phaseAtLeast",
          new CampaignError(
            `Action requires phase ${minimum} or later; current phase is ${current}`,
            "INVALID_TRANSITION"
          )
        );
  };
}

// ============================================================
// Registries
// ============================================================

export const hasRegisteredVoters: Guard = ({ state }) =>
  state.voters.registeredCount() > 0
    ? pass("hasRegisteredVoters")
    : fail(
        "hasRegisteredVoters",
        preconditionFailed("NO_VOTERS", "At least one voter must be registered")
      );

export const hasProposals: Guard = ({ state }) =>
  state.proposals.count() > 0
    ? pass("hasProposals")
    : fail(
        "hasProposals",
        preconditionFailed("NO_PROPOSALS", "At least one proposal must be registered")
      );

export function identityNotEmpty(identity: string): Guard {
  return () =>
    identity.trim() !== ""
      ? pass("identityNotEmpty")
      : fail(
          "identityNotEmpty",
          preconditionFailed("EMPTY_IDENTITY", "Voter identity must not be empty")
        );
}

export function identityNotRegistered(identity: string): Guard {
  return ({ state }) =>
    !state.voters.isRegistered(identity)
      ? pass("identityNotRegistered")
      : fail(
          "identityNotRegistered",
          preconditionFailed("ALREADY_REGISTERED", `Voter ${identity} is already registered`)
        );
}

export function descriptionNotEmpty(description: string): Guard {
  return () =>
    description.trim() !== ""
      ? pass("descriptionNotEmpty")
      : fail(
          "descriptionNotEmpty",
          preconditionFailed("EMPTY_DESCRIPTION", "Proposal description must not be empty")
        );
}

export function descriptionIsNew(description: string): Guard {
  return ({ state }) =>
    !state.proposals.has(description)
      ? pass("descriptionIsNew")
      : fail(
          "descriptionIsNew",
          preconditionFailed(
            "DUPLICATE_PROPOSAL",
            `A proposal with description "${description}" already exists`
          )
        );
}

export function proposalExists(proposalId: number): Guard {
  return ({ state }) =>
    state.proposals.isValidId(proposalId)
      ? pass("proposalExists")
      : fail(
          "proposalExists",
          preconditionFailed("INVALID_PROPOSAL_ID", `Proposal ${proposalId} does not exist`)
        );
}

/** Target is registered in this generation and has cast a ballot. */
export function targetHasVoted(identity: string): Guard {
  return ({ state }) => {
    if (!state.voters.isRegistered(identity)) {
      return fail(
        "targetHasVoted",
        preconditionFailed("NOT_REGISTERED", `Identity ${identity} is not a registered voter`)
      );
    }
    return state.voters.hasVoted(identity)
      ? pass("targetHasVoted")
      : fail(
          "targetHasVoted",
          preconditionFailed("NOT_VOTED", `Voter ${identity} has not voted`)
        );
  };
}

// ============================================================
// Guard table
// ============================================================

/**
 * The guards protecting each controller operation.
 */
export const GUARD_TABLE = {
  addVoter: (identity: string): Guard[] => [
    callerIsAdministrator,
    inPhase("RegisteringVoters"),
    identityNotEmpty(identity),
    identityNotRegistered(identity),
  ],
  openProposalsRegistration: (): Guard[] => [
    callerIsAdministrator,
    inPhase("RegisteringVoters"),
    hasRegisteredVoters,
  ],
  addNewProposal: (description: string): Guard[] => [
    inPhase("ProposalsRegistrationStarted"),
    callerIsEligibleVoter,
    descriptionNotEmpty(description),
    descriptionIsNew(description),
  ],
  closeProposalsRegistration: (): Guard[] => [
    callerIsAdministrator,
    inPhase("ProposalsRegistrationStarted"),
    hasProposals,
  ],
  openVotingSession: (): Guard[] => [
    callerIsAdministrator,
    inPhase("ProposalsRegistrationEnded"),
  ],
  vote: (proposalId: number): Guard[] => [
    inPhase("VotingSessionStarted"),
    callerIsEligibleVoter,
    proposalExists(proposalId),
  ],
  closeVotingSession: (): Guard[] => [
    callerIsAdministrator,
    inPhase("VotingSessionStarted"),
  ],
  startCounting: (): Guard[] => [
    callerIsAdministrator,
    inPhase("VotingSessionEnded"),
  ],
  resetCampaign: (): Guard[] => [
    callerIsAdministrator,
    notInPhase("RegisteringVoters"),
  ],
  getVoterChoice: (identity: string): Guard[] => [
    phaseAtLeast("VotingSessionEnded"),
    targetHasVoted(identity),
  ],
  tallyOutcome: (): Guard[] => [inPhase("VotesTallied")],
};

export type GuardedOperation = keyof typeof GUARD_TABLE;

/**
 * Evaluates `guards` in order, stopping at the first failure.
 */
export function evaluateGuards(guards: Guard[], ctx: GuardContext): GuardResult[] {
  const results: GuardResult[] = [];
  for (const guard of guards) {
    const result = guard(ctx);
    results.push(result);
    if (!result.passed) break;
  }
  return results;
}

/**
 * @throws CampaignError of the first failing guard
 */
export function enforceGuards(guards: Guard[], ctx: GuardContext): void {
  for (const result of evaluateGuards(guards, ctx)) {
    if (!result.passed) throw result.error;
  }
}
