import { PATHS } from "./paths.config";

function parseLimit(value: string | undefined, fallback: number): number {
  const parsed = Number(value);
  if (!value || !Number.isFinite(parsed) || parsed <= 0) {
    return fallback;
  }
  return parsed;
}

/**
 * Rate limiting configuration for the Gemini transcription backend
 */
export const RATE_LIMIT_CONFIG = {
  /**
   * Maximum requests per minute
   * Requests are spaced (60 * 1000) / PER_MINUTE milliseconds apart,
   * however many workers are running
   */
  PER_MINUTE: parseLimit(process.env.GEMINI_REQUESTS_PER_MINUTE, 10),

  /**
   * Maximum requests per day; reaching it stops the run
   */
  PER_DAY: parseLimit(process.env.GEMINI_REQUESTS_PER_DAY, 500),

  /**
   * Path to the rate limit tracker file
   */
  TRACKER_FILE: PATHS.data.rateLimitTracker,
} as const;
