/**
 * Ballot Workflow -- Domain Events
 *
 * The controller publishes one event per observable change.  Subscribers
 * (logging, the event ledger, notifications) are optional: the campaign
 * behaves the same whether or not anyone listens, and a failing
 * subscriber never fails the operation that published the event.
 *
 * @module events
 * @license AGPL-3.0-or-later
 */

import type { NoWinnerReason, WorkflowStatus } from "../types";

export type CampaignEvent =
  | { type: "voter:registered"; identity: string }
  | {
      type: "proposal:registered";
      proposalId: number;
      description: string;
      author: string;
    }
  | { type: "phase:changed"; previous: WorkflowStatus; next: WorkflowStatus }
  | { type: "vote:cast"; voter: string; proposalId: number }
  | {
      type: "tally:winner";
      proposalId: number;
      description: string;
      voteCount: number;
    }
  | { type: "tally:no-winner"; reason: NoWinnerReason; tiedProposalIds: number[] }
  | { type: "campaign:reset"; generation: number };

export type CampaignEventType = CampaignEvent["type"];

export type CampaignEventHandler = (event: CampaignEvent) => void;

/** Narrows the event union to a single `type`. */
export type EventOfType<K extends CampaignEventType> = Extract<
  CampaignEvent,
  { type: K }
>;

export function isEventOfType<K extends CampaignEventType>(
  event: CampaignEvent,
  type: K
): event is EventOfType<K> {
  return event.type === type;
}

export class CampaignEventBus {
  private handlers = new Map<CampaignEventType, Set<CampaignEventHandler>>();
  private globalHandlers = new Set<CampaignEventHandler>();

  /** Subscribe to one event type.  Returns an unsubscribe function. */
  on<K extends CampaignEventType>(
    type: K,
    handler: (event: EventOfType<K>) => void
  ): () => void {
    const wrapped: CampaignEventHandler = (event) => {
      if (isEventOfType(event, type)) handler(event);
    };
    let set = this.handlers.get(type);
    if (!set) {
      set = new Set();
      this.handlers.set(type, set);
    }
    set.add(wrapped);
    return () => {
      this.handlers.get(type)?.delete(wrapped);
    };
  }

  /** Subscribe to every event (e.g. for the ledger or logging). */
  subscribeAll(handler: CampaignEventHandler): () => void {
    this.globalHandlers.add(handler);
    return () => {
      this.globalHandlers.delete(handler);
    };
  }

  publish(event: CampaignEvent): void {
    for (const handler of this.globalHandlers) {
      this.deliver(handler, event);
    }
    const handlers = this.handlers.get(event.type);
    if (handlers) {
      for (const handler of handlers) {
        this.deliver(handler, event);
      }
    }
  }

  private deliver(handler: CampaignEventHandler, event: CampaignEvent): void {
    try {
      handler(event);
    } catch (err) {
      console.error(`[Campaign] Subscriber failed on ${event.type}:`, err);
    }
  }
}
