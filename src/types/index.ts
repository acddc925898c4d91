/**
 * Ballot Workflow -- Core Type Definitions
 *
 * Shared interfaces for the campaign core and the HTTP layer.  The core
 * modules import their record shapes from here so that the API serialises
 * exactly what the core stores.
 *
 * @module types
 * @license AGPL-3.0-or-later
 */

// ============================================================
// Workflow
// ============================================================

/**
 * The six campaign phases, in the only order the workflow may traverse
 * them.  The position of a phase in this array is its rank.
 */
export const WORKFLOW_STATUSES = [
  "RegisteringVoters",
  "ProposalsRegistrationStarted",
  "ProposalsRegistrationEnded",
  "VotingSessionStarted",
  "VotingSessionEnded",
  "VotesTallied",
] as const;

export type WorkflowStatus = (typeof WORKFLOW_STATUSES)[number];

/** A single phase change, as emitted by the workflow state machine. */
export interface TransitionRecord {
  previous: WorkflowStatus;
  next: WorkflowStatus;
  /** ISO 8601 */
  at: string;
}

// ============================================================
// Voters
// ============================================================

/**
 * Stored state of a voter.  Only identities that were registered at least
 * once have a record; everyone else is absent from the registry.
 */
export interface Voter {
  isRegistered: boolean;
  hasVoted: boolean;
  /** Meaningful only while `hasVoted` is true (0 otherwise) */
  votedProposalId: number;
}

/** Public view of a voter returned by status queries. */
export interface VoterStatus {
  identity: string;
  isRegistered: boolean;
  hasVoted: boolean;
  votedProposalId: number | null;
}

/** Result of `getVoterChoice`. */
export interface VoterChoice {
  identity: string;
  proposalId: number;
  description: string;
}

// ============================================================
// Proposals
// ============================================================

export interface Proposal {
  description: string;
  voteCount: number;
}

/** A proposal together with its index in the current generation. */
export interface IndexedProposal extends Proposal {
  proposalId: number;
}

// ============================================================
// Tally
// ============================================================

export type NoWinnerReason = "NO_VOTES" | "TIE";

export interface WinnerResult {
  kind: "winner";
  proposalId: number;
  voteCount: number;
}

export interface NoWinnerResult {
  kind: "no-winner";
  reason: NoWinnerReason;
  /** Indices sharing the maximum count (empty when nobody voted) */
  tiedProposalIds: number[];
}

export type TallyResult = WinnerResult | NoWinnerResult;

/** Details of an elected proposal. */
export type WinnerDetails = IndexedProposal;

// ============================================================
// Campaign
// ============================================================

/** Snapshot returned by `CampaignController.status()`. */
export interface CampaignStatus {
  phase: WorkflowStatus;
  /** Incremented by every reset, 0 for the first campaign */
  generation: number;
  administrator: string;
  registeredVoters: number;
  proposals: number;
  votesCast: number;
}

// ============================================================
// Configuration
// ============================================================

export interface RateLimitSettings {
  /** Maximum state-changing requests per IP per minute */
  writePerMinute: number;
  /** Maximum read requests per IP per minute */
  readPerMinute: number;
}

/**
 * Runtime configuration for the HTTP server.
 */
export interface CampaignServerConfig {
  port: number;
  /** Identity of the single campaign administrator */
  administrator: string;
  corsOrigins: string[];
  rateLimits: RateLimitSettings;
}

/**
 * Defaults for local development.  The administrator has no default: it
 * must always be configured explicitly.
 */
export const DEFAULT_CONFIG: Omit<CampaignServerConfig, "administrator"> = {
  port: 3001,
  corsOrigins: ["http://localhost:3000", "http://localhost:3001"],
  rateLimits: {
    writePerMinute: 30,
    readPerMinute: 100,
  },
};
