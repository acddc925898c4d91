/**
 * Ballot Workflow API -- Proposal Routes
 *
 * Endpoints:
 * - GET  /v1/campaign/proposals -- Proposals of the current generation
 * - POST /v1/campaign/proposals -- Submit a proposal (registered voter)
 *
 * @module api/routes/proposals
 * @license AGPL-3.0-or-later
 */

import { Router, Request, Response } from "express";
import { callerOf, requireCaller } from "../middleware/caller";
import { ApiError } from "../middleware/error-handler";
import { CampaignStore } from "../store";

export function createProposalRoutes(store: CampaignStore): Router {
  const router = Router();
  const { campaign } = store;

  router.get("/proposals", (_req: Request, res: Response) => {
    const proposals = campaign.listProposals().map((p) => ({
      proposal_id: p.proposalId,
      description: p.description,
      vote_count: p.voteCount,
    }));
    res.json({ proposals, total: proposals.length });
  });

  router.post("/proposals", requireCaller, (req: Request, res: Response) => {
    const { description } = req.body as { description?: unknown };

    if (typeof description !== "string") {
      throw new ApiError(400, "VALIDATION_ERROR", "description must be a string.");
    }

    const proposalId = campaign.addNewProposal(callerOf(req), description);
    res.status(201).json({ proposal_id: proposalId, description });
  });

  return router;
}
