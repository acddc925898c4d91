/**
 * Ballot Workflow API -- Audit Routes
 *
 * Exposes the event ledger so that anyone can replay the campaign and
 * check that the record was not altered.
 *
 * Endpoints:
 * - GET /v1/campaign/events?since=n -- Ledger entries from index n
 * - GET /v1/campaign/audit          -- Ledger verification + phase history
 *
 * @module api/routes/audit
 * @license AGPL-3.0-or-later
 */

import { Router, Request, Response } from "express";
import { ApiError } from "../middleware/error-handler";
import { CampaignStore } from "../store";
import { serializeTransition } from "./campaign";

export function createAuditRoutes(store: CampaignStore): Router {
  const router = Router();
  const { campaign, ledger } = store;

  // --------------------------------------------------------
  // GET /v1/campaign/events -- Ledger entries
  // --------------------------------------------------------
  router.get("/events", (req: Request, res: Response) => {
    const { since } = req.query;
    let from = 0;

    if (since !== undefined) {
      from = typeof since === "string" ? Number(since) : NaN;
      if (!Number.isInteger(from) || from < 0) {
        throw new ApiError(400, "VALIDATION_ERROR", "since must be a non-negative integer.");
      }
    }

    const entries = ledger.entriesSince(from);
    res.json({
      events: entries.map((entry) => ({
        index: entry.index,
        hash: entry.hash,
        previous_hash: entry.previousHash,
        timestamp: entry.timestamp,
        event: entry.data,
      })),
      total: ledger.stats().totalEntries,
    });
  });

  // --------------------------------------------------------
  // GET /v1/campaign/audit -- Integrity report
  // --------------------------------------------------------
  router.get("/audit", (_req: Request, res: Response) => {
    const verification = ledger.verify();
    const stats = ledger.stats();

    res.json({
      phase: campaign.currentPhase(),
      audit: {
        total_events: stats.totalEvents,
        total_entries: stats.totalEntries,
        ledger_valid: verification.isValid,
        first_invalid_entry: verification.firstInvalidIndex,
        genesis_hash: stats.genesisHash,
        latest_hash: stats.latestHash,
        opened_at: stats.openedAt,
        latest_timestamp: stats.latestTimestamp,
      },
      transitions: campaign.transitions().map(serializeTransition),
      verification_error: verification.error ?? null,
    });
  });

  return router;
}
