/**
 * Ballot Workflow API -- Result Routes
 *
 * Endpoints:
 * - GET /v1/campaign/results -- Tally outcome and final counts
 * - GET /v1/campaign/winner  -- The elected proposal
 *
 * @module api/routes/results
 * @license AGPL-3.0-or-later
 */

import { Router, Request, Response } from "express";
import { CampaignStore } from "../store";
import { serializeTally } from "./campaign";

export function createResultRoutes(store: CampaignStore): Router {
  const router = Router();
  const { campaign } = store;

  // --------------------------------------------------------
  // GET /v1/campaign/results -- Outcome + per-proposal counts
  // --------------------------------------------------------
  router.get("/results", (_req: Request, res: Response) => {
    const outcome = campaign.tallyOutcome();
    const proposals = campaign.listProposals();
    const totalVotes = proposals.reduce((sum, p) => sum + p.voteCount, 0);

    res.json({
      ...serializeTally(outcome),
      total_votes: totalVotes,
      results: proposals.map((p) => ({
        proposal_id: p.proposalId,
        description: p.description,
        votes: p.voteCount,
        percentage:
          totalVotes > 0 ? parseFloat(((p.voteCount / totalVotes) * 100).toFixed(1)) : 0,
      })),
    });
  });

  // --------------------------------------------------------
  // GET /v1/campaign/winner -- Winning proposal
  // --------------------------------------------------------
  router.get("/winner", (_req: Request, res: Response) => {
    const winner = campaign.winnerDetails();
    res.json({
      proposal_id: winner.proposalId,
      description: winner.description,
      vote_count: winner.voteCount,
    });
  });

  return router;
}
