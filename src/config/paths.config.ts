import path from "path";
import dotenv from "dotenv";

// Load environment variables from .env file
dotenv.config();

/**
 * Centralized paths configuration for all scripts
 * All paths are relative to the project root unless overridden in .env
 */
const PROJECT_ROOT = path.join(__dirname, "..", "..");

function resolveDir(envValue: string | undefined, fallback: string): string {
  if (!envValue) {
    return path.join(PROJECT_ROOT, fallback);
  }
  return path.isAbsolute(envValue)
    ? envValue
    : path.resolve(process.cwd(), envValue);
}

const WAV_DIR = resolveDir(process.env.WAV_DIR, "wav");
const CHAPTERS_DIR = resolveDir(process.env.CHAPTERS_DIR, "chapters");
const AUDIO_CHECK_DIR = resolveDir(process.env.AUDIO_CHECK_DIR, "audio-check");

export const PATHS = {
  /**
   * Input paths
   */
  input: {
    /**
     * Narrated chunk audio (wav/<chapter>/<chunk>.wav)
     */
    wav: WAV_DIR,

    /**
     * Ground-truth chunk text (chapters/<chapter>/<chunk>.txt)
     */
    chapters: CHAPTERS_DIR,
  },

  /**
   * Output paths
   */
  output: {
    /**
     * Per-chunk results and every report (audio-check/)
     */
    root: AUDIO_CHECK_DIR,
  },

  /**
   * Runtime data that is not part of the results
   */
  data: {
    /**
     * Daily request count and last request time of the Gemini backend
     */
    rateLimitTracker: path.join(PROJECT_ROOT, ".data", "rate-limit-tracker.json"),
  },

  /**
   * Configuration files
   */
  config: {
    /**
     * Book sets and thresholds
     */
    corpus: path.join(PROJECT_ROOT, "config", "corpus.yaml"),
  },
} as const;
