/**
 * Ballot Workflow API -- Express Server
 *
 * Assembles all routes, middleware, and starts the HTTP server.
 *
 * Usage:
 *   CAMPAIGN_ADMIN=<identity> node dist/api/server.js
 *   Or import createApp() for testing without starting the listener.
 *
 * @module api/server
 * @license AGPL-3.0-or-later
 */

import express, { Express } from "express";
import cors from "cors";
import { loadConfig, ConfigError } from "../config";
import type { CampaignEvent } from "../core/events";
import { DEFAULT_CONFIG, type CampaignServerConfig } from "../types";
import { CALLER_HEADER } from "./middleware/caller";
import { notFoundHandler, errorHandler } from "./middleware/error-handler";
import { createRateLimiters } from "./middleware/rate-limiter";
import { createAuditRoutes } from "./routes/audit";
import { createCampaignRoutes } from "./routes/campaign";
import { createProposalRoutes } from "./routes/proposals";
import { createResultRoutes } from "./routes/results";
import { createVoterRoutes } from "./routes/voters";
import { createVoteRoutes } from "./routes/votes";
import { CampaignStore, createStore } from "./store";

// ============================================================
// App Factory
// ============================================================

interface AppOptions {
  store: CampaignStore;
  config?: Partial<Omit<CampaignServerConfig, "administrator">>;
  /** Disable rate limiting (for testing) */
  disableRateLimiting?: boolean;
}

/**
 * Creates and configures the Express app around a campaign store.
 */
export function createApp(options: AppOptions): Express {
  const app = express();
  const { store } = options;
  const corsOrigins = options.config?.corsOrigins ?? DEFAULT_CONFIG.corsOrigins;
  const rateLimits = options.config?.rateLimits ?? DEFAULT_CONFIG.rateLimits;

  // --------------------------------------------------------
  // Global Middleware
  // --------------------------------------------------------

  app.use(express.json());

  app.use(
    cors({
      origin: corsOrigins,
      methods: ["GET", "POST", "OPTIONS"],
      allowedHeaders: [CALLER_HEADER, "Content-Type"],
    })
  );

  // --------------------------------------------------------
  // Health Check
  // --------------------------------------------------------

  app.get("/health", (_req, res) => {
    res.json({
      status: "ok",
      version: "0.1.0",
      timestamp: new Date().toISOString(),
    });
  });

  // --------------------------------------------------------
  // API v1 Routes
  // --------------------------------------------------------

  if (!options.disableRateLimiting) {
    app.use("/v1/campaign", ...createRateLimiters(rateLimits));
  }

  app.use("/v1/campaign", createCampaignRoutes(store));
  app.use("/v1/campaign", createVoterRoutes(store));
  app.use("/v1/campaign", createProposalRoutes(store));
  app.use("/v1/campaign", createVoteRoutes(store));
  app.use("/v1/campaign", createResultRoutes(store));
  app.use("/v1/campaign", createAuditRoutes(store));

  // --------------------------------------------------------
  // Error Handling
  // --------------------------------------------------------

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

/**
 * Creates a fresh app with a fresh store (for testing).
 */
export function createTestApp(
  administrator = "admin"
): { app: Express; store: CampaignStore } {
  const store = createStore(administrator);
  const app = createApp({ store, disableRateLimiting: true });
  return { app, store };
}

/** One log line per domain event. */
export function formatEvent(event: CampaignEvent): string {
  switch (event.type) {
    case "voter:registered":
      return `voter:registered ${event.identity}`;
    case "proposal:registered":
      return `proposal:registered #${event.proposalId} by ${event.author}`;
    case "phase:changed":
      return `phase:changed ${event.previous} -> ${event.next}`;
    case "vote:cast":
      return `vote:cast ${event.voter} -> #${event.proposalId}`;
    case "tally:winner":
      return `tally:winner #${event.proposalId} with ${event.voteCount} votes`;
    case "tally:no-winner":
      return `tally:no-winner ${event.reason}`;
    case "campaign:reset":
      return `campaign:reset generation ${event.generation}`;
  }
}

// ============================================================
// Start Server (only when run directly)
// ============================================================

if (require.main === module) {
  let config: CampaignServerConfig;
  try {
    config = loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`[Campaign API] ${err.message}`);
      process.exit(1);
    }
    throw err;
  }

  const store = createStore(config.administrator);
  store.events.subscribeAll((event) => {
    console.log(`[Campaign] ${formatEvent(event)}`);
  });

  const app = createApp({ store, config });

  app.listen(config.port, () => {
    console.log(`[Campaign API] Listening on http://localhost:${config.port}/v1/campaign`);
    console.log(`[Campaign API] Administrator: ${config.administrator}`);
  });
}
