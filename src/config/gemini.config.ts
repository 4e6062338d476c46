/**
 * Gemini API configuration
 */
export const GEMINI_CONFIG = {
  /**
   * Gemini model used when the transcription backend is "gemini"
   * Available models:
   * - gemini-2.0-flash: fast, good quality
   * - gemini-1.5-pro: higher quality, slower
   */
  MODEL: "gemini-2.0-flash",
} as const;
