/**
 * Tests for the WorkflowStateMachine
 *
 * Covers:
 * - Single forward edges, no skipping, no reversing
 * - Reset edge from any non-initial phase
 * - Transition records and listener notification
 */

import { WORKFLOW_STATUSES, type TransitionRecord } from "../../src/types";
import {
  WorkflowStateMachine,
  nextStatus,
  phaseRank,
} from "../../src/core/workflow";

function advanceThrough(machine: WorkflowStateMachine, count: number): void {
  for (let i = 1; i <= count; i++) {
    machine.advanceTo(WORKFLOW_STATUSES[i]);
  }
}

describe("WorkflowStateMachine", () => {
  it("should start in RegisteringVoters", () => {
    const machine = new WorkflowStateMachine();

    expect(machine.current()).toBe("RegisteringVoters");
    expect(machine.next()).toBe("ProposalsRegistrationStarted");
    expect(machine.history()).toEqual([]);
  });

  it("should walk every forward edge in order", () => {
    const machine = new WorkflowStateMachine();

    advanceThrough(machine, 5);

    expect(machine.current()).toBe("VotesTallied");
    expect(machine.next()).toBeUndefined();
    expect(machine.history().map((r) => [r.previous, r.next])).toEqual([
      ["RegisteringVoters", "ProposalsRegistrationStarted"],
      ["ProposalsRegistrationStarted", "ProposalsRegistrationEnded"],
      ["ProposalsRegistrationEnded", "VotingSessionStarted"],
      ["VotingSessionStarted", "VotingSessionEnded"],
      ["VotingSessionEnded", "VotesTallied"],
    ]);
  });

  it("should refuse to skip a phase", () => {
    const machine = new WorkflowStateMachine();

    expect(() => machine.advanceTo("ProposalsRegistrationEnded")).toThrow(
      expect.objectContaining({ code: "INVALID_TRANSITION" })
    );
    expect(machine.current()).toBe("RegisteringVoters");
  });

  it("should refuse to move backwards other than by reset", () => {
    const machine = new WorkflowStateMachine();
    advanceThrough(machine, 3);

    expect(() => machine.advanceTo("ProposalsRegistrationEnded")).toThrow(
      expect.objectContaining({ code: "INVALID_TRANSITION" })
    );
    expect(() => machine.advanceTo("VotingSessionStarted")).toThrow(
      expect.objectContaining({ code: "INVALID_TRANSITION" })
    );
    expect(machine.current()).toBe("VotingSessionStarted");
  });

  it("should refuse to reset from the initial phase", () => {
    const machine = new WorkflowStateMachine();

    expect(machine.canAdvanceTo("RegisteringVoters")).toBe(false);
    expect(() => machine.advanceTo("RegisteringVoters")).toThrow(
      expect.objectContaining({ code: "INVALID_TRANSITION" })
    );
  });

  it.each([1, 2, 3, 4, 5])("should reset from phase rank %i", (rank) => {
    const machine = new WorkflowStateMachine();
    advanceThrough(machine, rank);

    const record = machine.advanceTo("RegisteringVoters");

    expect(record.previous).toBe(WORKFLOW_STATUSES[rank]);
    expect(record.next).toBe("RegisteringVoters");
    expect(machine.current()).toBe("RegisteringVoters");
  });

  it("should notify the listener once per transition", () => {
    const seen: TransitionRecord[] = [];
    const machine = new WorkflowStateMachine((record) => seen.push(record));

    const record = machine.advanceTo("ProposalsRegistrationStarted");

    expect(seen).toEqual([record]);
    expect(record.at).toMatch(/^\d{4}-\d{2}-\d{2}T/);
  });

  it("should not notify on a rejected transition", () => {
    const listener = jest.fn();
    const machine = new WorkflowStateMachine(listener);

    expect(() => machine.advanceTo("VotesTallied")).toThrow();
    expect(listener).not.toHaveBeenCalled();
  });
});

describe("phase helpers", () => {
  it("should rank phases by workflow order", () => {
    expect(phaseRank("RegisteringVoters")).toBe(0);
    expect(phaseRank("VotingSessionEnded")).toBe(4);
    expect(phaseRank("VotesTallied")).toBe(5);
  });

  it("should give the forward successor", () => {
    expect(nextStatus("VotingSessionStarted")).toBe("VotingSessionEnded");
    expect(nextStatus("VotesTallied")).toBeUndefined();
  });
});
