/**
 * End-to-End Campaign Flow Tests
 *
 * Drives a complete campaign through the HTTP API:
 *   1. Register voters
 *   2. Open proposals, submit, close
 *   3. Vote, close voting
 *   4. Tally and read the winner
 *   5. Audit the ledger
 *   6. Reset and check the new generation
 */

import request from "supertest";
import { Express } from "express";
import { createTestApp } from "../../src/api/server";

const ADMIN = "0xadmin";

describe("E2E: Complete Campaign Flow", () => {
  let app: Express;

  const as = (caller: string) => ({
    post: (path: string, body: object = {}) =>
      request(app).post(`/v1/campaign${path}`).set("X-Caller-Identity", caller).send(body),
  });

  beforeEach(() => {
    app = createTestApp(ADMIN).app;
  });

  it("should elect Beta with 2 votes", async () => {
    // ---- Step 1: Register A, B, C ----
    for (const identity of ["0xA", "0xB", "0xC"]) {
      const res = await as(ADMIN).post("/voters", { identity });
      expect(res.status).toBe(201);
    }

    // ---- Step 2: Proposals ----
    expect((await as(ADMIN).post("/proposals-registration/open")).status).toBe(200);

    const alpha = await as("0xA").post("/proposals", { description: "Alpha" });
    const beta = await as("0xB").post("/proposals", { description: "Beta" });
    expect(alpha.body.proposal_id).toBe(0);
    expect(beta.body.proposal_id).toBe(1);

    expect((await as(ADMIN).post("/proposals-registration/close")).status).toBe(200);

    // ---- Step 3: Voting ----
    expect((await as(ADMIN).post("/voting-session/open")).status).toBe(200);

    expect((await as("0xA").post("/votes", { proposal_id: 0 })).status).toBe(200);
    expect((await as("0xB").post("/votes", { proposal_id: 1 })).status).toBe(200);
    expect((await as("0xC").post("/votes", { proposal_id: 1 })).status).toBe(200);

    // Double vote is rejected
    expect((await as("0xC").post("/votes", { proposal_id: 0 })).status).toBe(422);

    expect((await as(ADMIN).post("/voting-session/close")).status).toBe(200);

    // ---- Step 4: Tally ----
    const tally = await as(ADMIN).post("/tally");
    expect(tally.body.result).toEqual({
      winner_elected: true,
      winning_proposal_id: 1,
      vote_count: 2,
    });

    const winner = await request(app).get("/v1/campaign/winner");
    expect(winner.status).toBe(200);
    expect(winner.body).toEqual({ proposal_id: 1, description: "Beta", vote_count: 2 });

    const choice = await request(app).get("/v1/campaign/voters/0xA/choice");
    expect(choice.body).toEqual({ identity: "0xA", proposal_id: 0, description: "Alpha" });

    // ---- Step 5: Audit ----
    const audit = await request(app).get("/v1/campaign/audit");
    expect(audit.body.audit.ledger_valid).toBe(true);
    // 3 voters + 2 proposals + 3 votes + 5 transitions + 1 tally
    expect(audit.body.audit.total_events).toBe(14);
    expect(audit.body.transitions.map((t: { phase: string }) => t.phase)).toEqual([
      "ProposalsRegistrationStarted",
      "ProposalsRegistrationEnded",
      "VotingSessionStarted",
      "VotingSessionEnded",
      "VotesTallied",
    ]);

    // ---- Step 6: Reset ----
    expect((await as(ADMIN).post("/reset")).status).toBe(200);

    const status = await request(app).get("/v1/campaign");
    expect(status.body).toEqual({
      phase: "RegisteringVoters",
      generation: 1,
      administrator: ADMIN,
      registered_voters: 0,
      proposals: 0,
      votes_cast: 0,
    });

    const proposals = await request(app).get("/v1/campaign/proposals");
    expect(proposals.body.proposals).toEqual([]);

    const voters = await request(app).get("/v1/campaign/voters");
    expect(voters.body.voters).toEqual(["0xA", "0xB", "0xC"]);

    const voterA = await request(app).get("/v1/campaign/voters/0xA");
    expect(voterA.body.is_registered).toBe(false);

    const oldWinner = await request(app).get("/v1/campaign/winner");
    expect(oldWinner.status).toBe(404);
  });

  it("should keep the phase when a non-administrator drives the workflow", async () => {
    await as(ADMIN).post("/voters", { identity: "0xA" });

    const res = await as("0xA").post("/proposals-registration/open");
    expect(res.status).toBe(403);
    expect(res.body.error).toBe("UNAUTHORIZED");

    const status = await request(app).get("/v1/campaign");
    expect(status.body.phase).toBe("RegisteringVoters");
  });
});
