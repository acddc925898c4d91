/**
 * Ballot Workflow -- Campaign Errors
 *
 * Every failure of the campaign core is a `CampaignError`.  The `code`
 * tells the caller which rule was violated; for precondition failures the
 * `reason` narrows it down to the exact domain check.
 *
 * @module errors
 * @license AGPL-3.0-or-later
 */

export type CampaignErrorCode =
  | "UNAUTHORIZED"
  | "INVALID_TRANSITION"
  | "PRECONDITION_NOT_MET"
  | "NO_WINNER_AVAILABLE";

export type PreconditionReason =
  | "ALREADY_REGISTERED"
  | "NOT_REGISTERED"
  | "ALREADY_VOTED"
  | "NOT_VOTED"
  | "DUPLICATE_PROPOSAL"
  | "EMPTY_DESCRIPTION"
  | "EMPTY_IDENTITY"
  | "INVALID_PROPOSAL_ID"
  | "NO_VOTERS"
  | "NO_PROPOSALS";

/** Error thrown by the campaign core */
export class CampaignError extends Error {
  constructor(
    message: string,
    public readonly code: CampaignErrorCode,
    public readonly reason?: PreconditionReason
  ) {
    super(message);
    this.name = "CampaignError";
  }
}

/** Shorthand for a `PRECONDITION_NOT_MET` error. */
export function preconditionFailed(
  reason: PreconditionReason,
  message: string
): CampaignError {
  return new CampaignError(message, "PRECONDITION_NOT_MET", reason);
}
