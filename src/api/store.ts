/**
 * Ballot Workflow API -- In-Memory Store
 *
 * Holds the campaign controller and the event ledger recording it.  One
 * store is one campaign; all data is lost on restart.
 *
 * @module api/store
 * @license AGPL-3.0-or-later
 */

import { SingleAdministrator } from "../core/access-control";
import { CampaignController } from "../core/campaign";
import { EventLedger } from "../core/event-ledger";
import { CampaignEventBus } from "../core/events";

export class CampaignStore {
  readonly events: CampaignEventBus;
  readonly campaign: CampaignController;
  readonly ledger: EventLedger;

  constructor(administrator: string) {
    this.events = new CampaignEventBus();
    this.ledger = new EventLedger(administrator);
    this.ledger.attach(this.events);
    this.campaign = new CampaignController({
      access: new SingleAdministrator(administrator),
      events: this.events,
    });
  }
}

/**
 * Creates a fresh store for the given administrator.
 */
export function createStore(administrator: string): CampaignStore {
  return new CampaignStore(administrator);
}
