/**
 * Ballot Workflow API -- Vote Routes
 *
 * Endpoints:
 * - POST /v1/campaign/votes -- Cast the caller's ballot
 *
 * Ballots are public: the response echoes who voted for what.
 *
 * @module api/routes/votes
 * @license AGPL-3.0-or-later
 */

import { Router, Request, Response } from "express";
import { callerOf, requireCaller } from "../middleware/caller";
import { ApiError } from "../middleware/error-handler";
import { CampaignStore } from "../store";

interface VoteRequest {
  /** Index of the chosen proposal (0-based) */
  proposal_id?: unknown;
}

export function createVoteRoutes(store: CampaignStore): Router {
  const router = Router();
  const { campaign } = store;

  router.post("/votes", requireCaller, (req: Request, res: Response) => {
    const { proposal_id } = req.body as VoteRequest;

    if (typeof proposal_id !== "number" || !Number.isInteger(proposal_id) || proposal_id < 0) {
      throw new ApiError(
        400,
        "VALIDATION_ERROR",
        "proposal_id must be a non-negative integer."
      );
    }

    const voter = callerOf(req);
    campaign.vote(voter, proposal_id);

    res.status(200).json({
      accepted: true,
      voter,
      proposal_id,
    });
  });

  return router;
}
