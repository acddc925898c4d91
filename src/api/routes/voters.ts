/**
 * Ballot Workflow API -- Voter Routes
 *
 * Endpoints:
 * - GET  /v1/campaign/voters                   -- Every identity ever registered
 * - POST /v1/campaign/voters                   -- Register a voter (administrator)
 * - GET  /v1/campaign/voters/:identity         -- Voter status
 * - GET  /v1/campaign/voters/:identity/choice  -- What a voter voted for
 *
 * @module api/routes/voters
 * @license AGPL-3.0-or-later
 */

import { Router, Request, Response } from "express";
import { CALLER_HEADER, callerOf, requireCaller } from "../middleware/caller";
import { ApiError } from "../middleware/error-handler";
import { CampaignStore } from "../store";

export function createVoterRoutes(store: CampaignStore): Router {
  const router = Router();
  const { campaign } = store;

  // --------------------------------------------------------
  // GET /v1/campaign/voters -- List voters
  // --------------------------------------------------------
  router.get("/voters", (_req: Request, res: Response) => {
    const voters = campaign.listVoters();
    res.json({ voters, total: voters.length });
  });

  // --------------------------------------------------------
  // POST /v1/campaign/voters -- Register a voter
  // --------------------------------------------------------
  router.post("/voters", requireCaller, (req: Request, res: Response) => {
    const { identity } = req.body as { identity?: unknown };

    if (typeof identity !== "string" || identity.trim() === "") {
      throw new ApiError(400, "VALIDATION_ERROR", "identity is required.");
    }

    campaign.addVoter(callerOf(req), identity.trim());
    res.status(201).json({ identity: identity.trim(), is_registered: true });
  });

  // --------------------------------------------------------
  // GET /v1/campaign/voters/:identity -- Voter status
  // --------------------------------------------------------
  router.get("/voters/:identity", (req: Request, res: Response) => {
    const status = campaign.voterStatus(req.params.identity);
    res.json({
      identity: status.identity,
      is_registered: status.isRegistered,
      has_voted: status.hasVoted,
      voted_proposal_id: status.votedProposalId,
    });
  });

  // --------------------------------------------------------
  // GET /v1/campaign/voters/:identity/choice -- Revealed ballot
  // --------------------------------------------------------
  router.get("/voters/:identity/choice", (req: Request, res: Response) => {
    // Any caller may ask, identified or not
    const caller = req.get(CALLER_HEADER)?.trim() ?? "";
    const choice = campaign.getVoterChoice(caller, req.params.identity);
    res.json({
      identity: choice.identity,
      proposal_id: choice.proposalId,
      description: choice.description,
    });
  });

  return router;
}
