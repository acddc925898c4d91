/**
 * Ballot Workflow API -- Caller Identity
 *
 * Every state-changing request names its caller in the
 * `X-Caller-Identity` header.  Authenticating that identity is the job of
 * whatever sits in front of this API; here it is taken as given and
 * passed to the campaign core, which decides what the caller may do.
 *
 * @module api/middleware/caller
 * @license AGPL-3.0-or-later
 */

import { Request, Response, NextFunction } from "express";
import { ApiError } from "./error-handler";

export const CALLER_HEADER = "X-Caller-Identity";

/**
 * Returns the caller identity of a request.
 *
 * @throws ApiError 401 `MISSING_CALLER` when the header is absent or blank
 */
export function callerOf(req: Request): string {
  const caller = req.get(CALLER_HEADER)?.trim();
  if (!caller) {
    throw new ApiError(
      401,
      "MISSING_CALLER",
      `The ${CALLER_HEADER} header is required for this action.`
    );
  }
  return caller;
}

/**
 * Rejects requests without a caller before they reach the route.
 */
export function requireCaller(req: Request, _res: Response, next: NextFunction): void {
  callerOf(req);
  next();
}
