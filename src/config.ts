/**
 * Ballot Workflow -- Server Configuration
 *
 * Reads the server settings from environment variables:
 *
 *   PORT                        HTTP port (default 3001)
 *   CAMPAIGN_ADMIN              administrator identity (required)
 *   CORS_ORIGINS                comma-separated allowed origins
 *   RATE_LIMIT_WRITE_PER_MINUTE state-changing requests per IP (default 30)
 *   RATE_LIMIT_READ_PER_MINUTE  read requests per IP (default 100)
 *
 * @module config
 * @license AGPL-3.0-or-later
 */

import { DEFAULT_CONFIG, type CampaignServerConfig } from "./types";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

function positiveInt(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number
): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

/**
 * @throws ConfigError on a missing administrator or a malformed number
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CampaignServerConfig {
  const administrator = env.CAMPAIGN_ADMIN?.trim();
  if (!administrator) {
    throw new ConfigError("CAMPAIGN_ADMIN must be set to the administrator identity");
  }

  const corsOrigins = env.CORS_ORIGINS
    ? env.CORS_ORIGINS.split(",")
        .map((origin) => origin.trim())
        .filter((origin) => origin !== "")
    : DEFAULT_CONFIG.corsOrigins;

  return {
    port: positiveInt(env, "PORT", DEFAULT_CONFIG.port),
    administrator,
    corsOrigins,
    rateLimits: {
      writePerMinute: positiveInt(
        env,
        "RATE_LIMIT_WRITE_PER_MINUTE",
        DEFAULT_CONFIG.rateLimits.writePerMinute
      ),
      readPerMinute: positiveInt(
        env,
        "RATE_LIMIT_READ_PER_MINUTE",
        DEFAULT_CONFIG.rateLimits.readPerMinute
      ),
    },
  };
}
