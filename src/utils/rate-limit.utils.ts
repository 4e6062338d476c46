import fs from "fs";
import { z } from "zod";
import { readJsonFile, writeJsonFile } from "./file.utils";
import { consoleLogger, type Logger } from "./logger.utils";

/**
 * Rate limit tracker, shared by every request of one process
 */
export interface RateLimitTracker {
  date: string; // YYYY-MM-DD format
  requestCount: number;
  lastRequestTime: number; // Timestamp in milliseconds
}

export interface RateLimitSettings {
  perMinute: number;
  perDay: number;
}

const RateLimitTrackerSchema = z.object({
  date: z.string(),
  requestCount: z.number().int().min(0),
  lastRequestTime: z.number().min(0),
});

/**
 * Gets today's date in YYYY-MM-DD format
 */
export function getTodayDate(now: number = Date.now()): string {
  return new Date(now).toISOString().split("T")[0];
}

export function createRateLimitTracker(now: number = Date.now()): RateLimitTracker {
  return { date: getTodayDate(now), requestCount: 0, lastRequestTime: 0 };
}

/**
 * Minimum delay between two requests in milliseconds
 */
export function minDelayBetweenRequests(settings: RateLimitSettings): number {
  return (60 * 1000) / settings.perMinute;
}

/**
 * Loads the tracker; a missing, unreadable or outdated file starts a fresh day
 */
export function loadRateLimitTracker(
  filePath: string,
  logger: Logger = consoleLogger
): RateLimitTracker {
  if (!fs.existsSync(filePath)) {
    return createRateLimitTracker();
  }

  try {
    const tracker = RateLimitTrackerSchema.parse(readJsonFile(filePath));
    if (tracker.date !== getTodayDate()) {
      return createRateLimitTracker();
    }
    return tracker;
  } catch (error) {
    logger.warn(
      `⚠️  Error loading rate limit tracker: ${
        error instanceof Error ? error.message : String(error)
      }`
    );
    return createRateLimitTracker();
  }
}

export function saveRateLimitTracker(
  filePath: string,
  tracker: RateLimitTracker
): void {
  writeJsonFile(filePath, tracker);
}

/**
 * Checks if we can make a request (daily limit)
 */
export function canMakeRequest(
  tracker: RateLimitTracker,
  settings: RateLimitSettings
): { canMake: boolean; remaining: number } {
  const remaining = settings.perDay - tracker.requestCount;
  return {
    canMake: remaining > 0,
    remaining: Math.max(0, remaining),
  };
}

/**
 * Books the next free request slot and returns how long to wait for it.
 * The slot is taken before waiting, so concurrent callers queue up
 * one minimum delay apart.
 */
export function recordRequest(
  tracker: RateLimitTracker,
  settings: RateLimitSettings,
  now: number = Date.now()
): number {
  const today = getTodayDate(now);
  if (tracker.date !== today) {
    tracker.date = today;
    tracker.requestCount = 0;
  }

  const slot = Math.max(
    now,
    tracker.lastRequestTime + minDelayBetweenRequests(settings)
  );
  tracker.lastRequestTime = slot;
  tracker.requestCount++;
  return slot - now;
}

/**
 * Waits if necessary to respect rate limit per minute
 */
export async function respectRateLimitPerMinute(
  tracker: RateLimitTracker,
  settings: RateLimitSettings,
  logger: Logger = consoleLogger
): Promise<void> {
  const waitTime = recordRequest(tracker, settings);
  if (waitTime > 0) {
    logger.info(
      `⏳ Rate limiting: waiting ${(waitTime / 1000).toFixed(1)}s before next request...`
    );
    await new Promise((resolve) => setTimeout(resolve, waitTime));
  }
}
