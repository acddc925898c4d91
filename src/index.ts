/**
 * Ballot Workflow
 *
 * Single-administrator election campaign: a guarded phase workflow,
 * voter and proposal registries, public voting and a tie-aware tally.
 *
 * @packageDocumentation
 * @license AGPL-3.0-or-later
 */

// ============================================================
// Campaign controller (main entry point)
// ============================================================

export { CampaignController, createCampaign } from "./core/campaign";
export type { CampaignControllerOptions } from "./core/campaign";

export { SingleAdministrator } from "./core/access-control";
export type { AccessControl } from "./core/access-control";

export { CampaignError, preconditionFailed } from "./core/errors";
export type { CampaignErrorCode, PreconditionReason } from "./core/errors";

// ============================================================
// Building blocks
// ============================================================

export { VoterRegistry } from "./core/voter-registry";
export { ProposalRegistry } from "./core/proposal-registry";

export {
  WorkflowStateMachine,
  INITIAL_STATUS,
  nextStatus,
  phaseRank,
} from "./core/workflow";
export type { TransitionListener } from "./core/workflow";

export { TallyEngine, describeNoWinner } from "./core/tally";

export {
  GUARD_TABLE,
  evaluateGuards,
  enforceGuards,
} from "./core/guards";
export type {
  CampaignState,
  Guard,
  GuardContext,
  GuardResult,
  GuardedOperation,
} from "./core/guards";

// ============================================================
// Events & ledger
// ============================================================

export { CampaignEventBus, isEventOfType } from "./core/events";
export type {
  CampaignEvent,
  CampaignEventType,
  CampaignEventHandler,
  EventOfType,
} from "./core/events";

export { EventLedger } from "./core/event-ledger";
export type {
  LedgerEntry,
  LedgerGenesis,
  LedgerRecord,
  LedgerStats,
} from "./core/event-ledger";

export { HashChain, sha256, computeEntryHash } from "./utils/hash-chain";
export type { ChainEntry, HashChainVerification } from "./utils/hash-chain";

// ============================================================
// HTTP API & configuration
// ============================================================

export { createApp, createTestApp } from "./api/server";
export { CampaignStore, createStore } from "./api/store";
export { loadConfig, ConfigError } from "./config";

// ============================================================
// Shared type definitions
// ============================================================

export type {
  WorkflowStatus,
  TransitionRecord,
  Voter,
  VoterStatus,
  VoterChoice,
  Proposal,
  IndexedProposal,
  NoWinnerReason,
  WinnerResult,
  NoWinnerResult,
  TallyResult,
  WinnerDetails,
  CampaignStatus,
  RateLimitSettings,
  CampaignServerConfig,
} from "./types";

export { WORKFLOW_STATUSES, DEFAULT_CONFIG } from "./types";
