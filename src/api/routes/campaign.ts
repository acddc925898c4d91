/**
 * Ballot Workflow API -- Campaign Routes
 *
 * Campaign status and the administrator's phase transitions.
 *
 * Endpoints:
 * - GET  /v1/campaign                               -- Current phase and counters
 * - POST /v1/campaign/proposals-registration/open   -- Open proposal submission
 * - POST /v1/campaign/proposals-registration/close  -- Close proposal submission
 * - POST /v1/campaign/voting-session/open           -- Open voting
 * - POST /v1/campaign/voting-session/close          -- Close voting
 * - POST /v1/campaign/tally                         -- Count the votes
 * - POST /v1/campaign/reset                         -- Start a new generation
 *
 * @module api/routes/campaign
 * @license AGPL-3.0-or-later
 */

import { Router, Request, Response } from "express";
import type { TallyResult, TransitionRecord } from "../../types";
import { callerOf, requireCaller } from "../middleware/caller";
import { CampaignStore } from "../store";

export function serializeTransition(record: TransitionRecord) {
  return {
    previous_phase: record.previous,
    phase: record.next,
    changed_at: record.at,
  };
}

export function serializeTally(result: TallyResult) {
  return result.kind === "winner"
    ? {
        winner_elected: true,
        winning_proposal_id: result.proposalId,
        vote_count: result.voteCount,
      }
    : {
        winner_elected: false,
        reason: result.reason,
        tied_proposal_ids: result.tiedProposalIds,
      };
}

export function createCampaignRoutes(store: CampaignStore): Router {
  const router = Router();
  const { campaign } = store;

  // --------------------------------------------------------
  // GET /v1/campaign -- Status
  // --------------------------------------------------------
  router.get("/", (_req: Request, res: Response) => {
    const status = campaign.status();
    res.json({
      phase: status.phase,
      generation: status.generation,
      administrator: status.administrator,
      registered_voters: status.registeredVoters,
      proposals: status.proposals,
      votes_cast: status.votesCast,
    });
  });

  // --------------------------------------------------------
  // Phase transitions (administrator only)
  // --------------------------------------------------------
  router.post("/proposals-registration/open", requireCaller, (req: Request, res: Response) => {
    res.json(serializeTransition(campaign.openProposalsRegistration(callerOf(req))));
  });

  router.post("/proposals-registration/close", requireCaller, (req: Request, res: Response) => {
    res.json(serializeTransition(campaign.closeProposalsRegistration(callerOf(req))));
  });

  router.post("/voting-session/open", requireCaller, (req: Request, res: Response) => {
    res.json(serializeTransition(campaign.openVotingSession(callerOf(req))));
  });

  router.post("/voting-session/close", requireCaller, (req: Request, res: Response) => {
    res.json(serializeTransition(campaign.closeVotingSession(callerOf(req))));
  });

  // --------------------------------------------------------
  // POST /v1/campaign/tally -- Count the votes
  // --------------------------------------------------------
  router.post("/tally", requireCaller, (req: Request, res: Response) => {
    const result = campaign.startCounting(callerOf(req));
    res.json({
      phase: campaign.currentPhase(),
      result: serializeTally(result),
    });
  });

  // --------------------------------------------------------
  // POST /v1/campaign/reset -- New generation
  // --------------------------------------------------------
  router.post("/reset", requireCaller, (req: Request, res: Response) => {
    const record = campaign.resetCampaign(callerOf(req));
    res.json({
      ...serializeTransition(record),
      generation: campaign.status().generation,
    });
  });

  return router;
}
