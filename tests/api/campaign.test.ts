/**
 * Tests for Campaign Routes
 *
 * Covers:
 * - Health check and status
 * - Phase transitions (200)
 * - Missing caller (401), non-administrator (403)
 * - Wrong phase (409), unmet precondition (422)
 * - Unknown routes (404)
 */

import request from "supertest";
import { Express } from "express";
import { createApp, createTestApp } from "../../src/api/server";
import { createStore, CampaignStore } from "../../src/api/store";

describe("Campaign Routes", () => {
  let app: Express;
  let store: CampaignStore;

  beforeEach(() => {
    const test = createTestApp("admin");
    app = test.app;
    store = test.store;
  });

  it("should answer the health check", async () => {
    const res = await request(app).get("/health");

    expect(res.status).toBe(200);
    expect(res.body.status).toBe("ok");
  });

  describe("GET /v1/campaign", () => {
    it("should return the initial status", async () => {
      const res = await request(app).get("/v1/campaign");

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        phase: "RegisteringVoters",
        generation: 0,
        administrator: "admin",
        registered_voters: 0,
        proposals: 0,
        votes_cast: 0,
      });
    });
  });

  describe("POST /v1/campaign/proposals-registration/open", () => {
    it("should require a caller", async () => {
      const res = await request(app).post("/v1/campaign/proposals-registration/open");

      expect(res.status).toBe(401);
      expect(res.body.error).toBe("MISSING_CALLER");
    });

    it("should reject a non-administrator and keep the phase", async () => {
      store.campaign.addVoter("admin", "alice");

      const res = await request(app)
        .post("/v1/campaign/proposals-registration/open")
        .set("X-Caller-Identity", "alice");

      expect(res.status).toBe(403);
      expect(res.body.error).toBe("UNAUTHORIZED");
      expect(store.campaign.currentPhase()).toBe("RegisteringVoters");
    });

    it("should refuse to open without voters", async () => {
      const res = await request(app)
        .post("/v1/campaign/proposals-registration/open")
        .set("X-Caller-Identity", "admin");

      expect(res.status).toBe(422);
      expect(res.body).toEqual({
        error: "PRECONDITION_NOT_MET",
        message: "At least one voter must be registered",
        details: { reason: "NO_VOTERS" },
      });
    });

    it("should open proposal registration", async () => {
      store.campaign.addVoter("admin", "alice");

      const res = await request(app)
        .post("/v1/campaign/proposals-registration/open")
        .set("X-Caller-Identity", "admin");

      expect(res.status).toBe(200);
      expect(res.body.previous_phase).toBe("RegisteringVoters");
      expect(res.body.phase).toBe("ProposalsRegistrationStarted");
      expect(res.body.changed_at).toBeDefined();
    });
  });

  describe("phase guards", () => {
    it("should return 409 when skipping a phase", async () => {
      const res = await request(app)
        .post("/v1/campaign/voting-session/open")
        .set("X-Caller-Identity", "admin");

      expect(res.status).toBe(409);
      expect(res.body.error).toBe("INVALID_TRANSITION");
      expect(res.body.details).toBeUndefined();
    });

    it("should return 409 when resetting from the initial phase", async () => {
      const res = await request(app)
        .post("/v1/campaign/reset")
        .set("X-Caller-Identity", "admin");

      expect(res.status).toBe(409);
    });
  });

  describe("POST /v1/campaign/tally and /reset", () => {
    beforeEach(() => {
      const { campaign } = store;
      campaign.addVoter("admin", "alice");
      campaign.openProposalsRegistration("admin");
      campaign.addNewProposal("alice", "Alpha");
      campaign.closeProposalsRegistration("admin");
      campaign.openVotingSession("admin");
      campaign.vote("alice", 0);
    });

    it("should close voting, tally and reset", async () => {
      const close = await request(app)
        .post("/v1/campaign/voting-session/close")
        .set("X-Caller-Identity", "admin");
      expect(close.status).toBe(200);
      expect(close.body.phase).toBe("VotingSessionEnded");

      const tally = await request(app)
        .post("/v1/campaign/tally")
        .set("X-Caller-Identity", "admin");
      expect(tally.status).toBe(200);
      expect(tally.body).toEqual({
        phase: "VotesTallied",
        result: { winner_elected: true, winning_proposal_id: 0, vote_count: 1 },
      });

      const reset = await request(app)
        .post("/v1/campaign/reset")
        .set("X-Caller-Identity", "admin");
      expect(reset.status).toBe(200);
      expect(reset.body.previous_phase).toBe("VotesTallied");
      expect(reset.body.phase).toBe("RegisteringVoters");
      expect(reset.body.generation).toBe(1);
    });
  });

  it("should return 404 for unknown routes", async () => {
    const res = await request(app).get("/v1/elections");

    expect(res.status).toBe(404);
    expect(res.body.error).toBe("NOT_FOUND");
  });

  it("should reject malformed JSON bodies", async () => {
    const res = await request(app)
      .post("/v1/campaign/voters")
      .set("X-Caller-Identity", "admin")
      .set("Content-Type", "application/json")
      .send("{not json");

    expect(res.status).toBe(400);
    expect(res.body.error).toBe("INVALID_JSON");
  });

  describe("rate limiting", () => {
    it("should limit state-changing requests per IP", async () => {
      const limited = createApp({
        store: createStore("admin"),
        config: { rateLimits: { writePerMinute: 2, readPerMinute: 100 } },
      });

      const send = () =>
        request(limited)
          .post("/v1/campaign/reset")
          .set("X-Caller-Identity", "admin");

      expect((await send()).status).toBe(409);
      expect((await send()).status).toBe(409);

      const third = await send();
      expect(third.status).toBe(429);
      expect(third.body.error).toBe("RATE_LIMITED");

      const read = await request(limited).get("/v1/campaign");
      expect(read.status).toBe(200);
    });
  });
});
