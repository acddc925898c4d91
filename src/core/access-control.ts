/**
 * Ballot Workflow -- Access Control
 *
 * The campaign core never decides who the administrator is; it asks an
 * `AccessControl` collaborator.  Ownership transfer is handled outside
 * the core.
 *
 * @module access-control
 * @license AGPL-3.0-or-later
 */

export interface AccessControl {
  /** Identity currently holding the administrator role */
  administrator(): string;
  isAdministrator(identity: string): boolean;
}

/** A fixed, single administrator. */
export class SingleAdministrator implements AccessControl {
  constructor(private readonly admin: string) {
    if (admin.trim() === "") {
      throw new Error("Administrator identity must not be empty");
    }
  }

  administrator(): string {
    return this.admin;
  }

  isAdministrator(identity: string): boolean {
    return identity === this.admin;
  }
}
