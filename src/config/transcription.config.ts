import dotenv from "dotenv";

// Load environment variables from .env file
dotenv.config();

export type TranscriberBackend = "hear" | "gemini";

function parseBackend(value: string | undefined): TranscriberBackend {
  return value === "gemini" ? "gemini" : "hear";
}

function parseWorkers(value: string | undefined, fallback: number): number {
  const parsed = Number(value);
  if (!value || !Number.isInteger(parsed) || parsed < 1) {
    return fallback;
  }
  return parsed;
}

/**
 * Transcription configuration for the audio check
 */
export const TRANSCRIPTION_CONFIG = {
  /**
   * Which oracle transcribes the chunks: the local "hear" executable or Gemini
   */
  BACKEND: parseBackend(process.env.TRANSCRIBER_BACKEND),

  /**
   * Executable looked up on PATH for the "hear" backend
   */
  COMMAND: process.env.TRANSCRIBER_COMMAND || "hear",

  /**
   * Locale passed to the transcriber
   */
  LOCALE: process.env.TRANSCRIPTION_LOCALE || "de-DE",

  /**
   * Number of audio files processed concurrently
   */
  WORKERS: parseWorkers(process.env.AUDIO_CHECK_WORKERS, 20),

  /**
   * Upper bound for a single transcriber run
   */
  TIMEOUT_MS: 5 * 60 * 1000, // 5 minutes
} as const;
