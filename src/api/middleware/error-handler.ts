/**
 * Ballot Workflow API -- Error Handling Middleware
 *
 * Centralized error handling for the Express API.  Campaign errors thrown
 * by route handlers are mapped to HTTP statuses here, so routes only call
 * the controller and render its result.
 *
 * @module api/middleware/error-handler
 * @license AGPL-3.0-or-later
 */

import { Request, Response, NextFunction } from "express";
import { CampaignError, type CampaignErrorCode } from "../../core/errors";

/**
 * Custom API error class (request validation, missing caller, ...).
 */
export class ApiError extends Error {
  constructor(
    public statusCode: number,
    public errorCode: string,
    message: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "ApiError";
  }
}

export const CAMPAIGN_ERROR_STATUS: Record<CampaignErrorCode, number> = {
  UNAUTHORIZED: 403,
  INVALID_TRANSITION: 409,
  PRECONDITION_NOT_MET: 422,
  NO_WINNER_AVAILABLE: 404,
};

/**
 * 404 handler -- catches unmatched routes.
 */
export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    error: "NOT_FOUND",
    message: `Route ${req.method} ${req.originalUrl} not found.`,
  });
}

/**
 * Global error handler -- catches thrown errors.
 */
export function errorHandler(
  err: Error,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (err instanceof CampaignError) {
    res.status(CAMPAIGN_ERROR_STATUS[err.code]).json({
      error: err.code,
      message: err.message,
      ...(err.reason ? { details: { reason: err.reason } } : {}),
    });
    return;
  }

  if (err instanceof ApiError) {
    res.status(err.statusCode).json({
      error: err.errorCode,
      message: err.message,
      ...(err.details ? { details: err.details } : {}),
    });
    return;
  }

  // body-parser rejects malformed JSON with a 400-typed error
  if (err instanceof SyntaxError && "status" in err && err.status === 400) {
    res.status(400).json({
      error: "INVALID_JSON",
      message: "Request body is not valid JSON.",
    });
    return;
  }

  console.error("[Campaign API] Unexpected error:", err);

  res.status(500).json({
    error: "INTERNAL_ERROR",
    message: "An unexpected error occurred.",
  });
}
