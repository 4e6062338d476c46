import fs from "fs";
import path from "path";
import {
  GoogleGenAI,
  type GenerateContentParameters,
  type GenerateContentResponse,
} from "@google/genai";
import { GEMINI_CONFIG } from "./config/gemini.config";
import { RATE_LIMIT_CONFIG } from "./config/rate-limit.config";
import {
  TRANSCRIPTION_CONFIG,
  type TranscriberBackend,
} from "./config/transcription.config";
import { consoleLogger, type Logger } from "./utils/logger.utils";
import {
  findExecutable,
  isMissingExecutableError,
  runCommand,
} from "./utils/process.utils";
import {
  canMakeRequest,
  createRateLimitTracker,
  loadRateLimitTracker,
  respectRateLimitPerMinute,
  saveRateLimitTracker,
  type RateLimitSettings,
  type RateLimitTracker,
} from "./utils/rate-limit.utils";

/**
 * Every further file would fail the same way. Aborts the whole run.
 */
export class FatalTranscriberError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FatalTranscriberError";
  }
}

/**
 * The transcriber program is not installed
 */
export class TranscriberNotFoundError extends FatalTranscriberError {
  constructor(readonly command: string) {
    super(`The '${command}' command was not found in your system's PATH.`);
    this.name = "TranscriberNotFoundError";
  }
}

/**
 * An API key needed by the selected backend is not set
 */
export class MissingCredentialError extends FatalTranscriberError {
  constructor(readonly variable: string) {
    super(`${variable} environment variable is not set.`);
    this.name = "MissingCredentialError";
  }
}

/**
 * The API refused a request for quota or rate reasons, or the daily limit
 * is used up. The chunk stays pending for the next run.
 */
export class TranscriptionQuotaError extends FatalTranscriberError {
  constructor(detail: string) {
    super(`Transcription quota exhausted: ${detail}`);
    this.name = "TranscriptionQuotaError";
  }
}

/**
 * True for HTTP 429 / RESOURCE_EXHAUSTED answers of the Gemini API
 */
export function isQuotaError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  if ("status" in error && error.status === 429) return true;
  return /\b429\b|RESOURCE_EXHAUSTED/.test(error.message);
}

/**
 * Speech-to-text for one audio file.
 * `transcribe` resolves with "" when this file failed; it only rejects for
 * conditions that make every further file fail as well.
 */
export interface Transcriber {
  readonly name: string;
  /** Throws a fatal error when the backend cannot work at all */
  assertAvailable(): void;
  transcribe(audioPath: string): Promise<string>;
}

/**
 * Runs the local `hear` executable: hear -d -i <file> -l <locale>
 */
export class HearTranscriber implements Transcriber {
  readonly name: string;

  constructor(
    private readonly command: string,
    private readonly locale: string,
    private readonly timeoutMs: number,
    private readonly logger: Logger = consoleLogger
  ) {
    this.name = command;
  }

  assertAvailable(): void {
    if (!findExecutable(this.command)) {
      throw new TranscriberNotFoundError(this.command);
    }
  }

  async transcribe(audioPath: string): Promise<string> {
    try {
      const result = await runCommand(
        this.command,
        ["-d", "-i", audioPath, "-l", this.locale],
        { timeoutMs: this.timeoutMs }
      );

      if (result.exitCode !== 0) {
        this.logger.warn(
          `⚠️  '${this.command}' failed for ${audioPath} (exit ${result.exitCode}). Stderr: ${result.stderr.trim()}`
        );
        return "";
      }

      return result.stdout.trim();
    } catch (error) {
      if (isMissingExecutableError(error)) {
        throw new TranscriberNotFoundError(this.command);
      }
      this.logger.warn(
        `⚠️  Unexpected error transcribing ${audioPath}: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
      return "";
    }
  }
}

/**
 * Determines MIME type based on file extension
 */
function audioMimeType(filePath: string): string {
  const ext = path.extname(filePath).toLowerCase();
  if (ext === ".mp3") return "audio/mpeg";
  if (ext === ".m4a") return "audio/mp4";
  if (ext === ".ogg") return "audio/ogg";
  return "audio/wav";
}

export type GenerateContentFn = (
  params: GenerateContentParameters
) => Promise<GenerateContentResponse>;

export interface GeminiTranscriberOptions {
  apiKey: string | undefined;
  locale: string;
  model?: string;
  rateLimit?: RateLimitSettings;
  /** Where the daily request count is kept; null keeps it in memory */
  trackerFile?: string | null;
  logger?: Logger;
  /** Replaces the API call, defaults to a GoogleGenAI client */
  generateContent?: GenerateContentFn;
}

/**
 * Transcribes with the Gemini API instead of a local program.
 * Requests are spaced and counted per day. A quota error is fatal, so no
 * chunk is stored with an empty transcription because of it.
 */
export class GeminiTranscriber implements Transcriber {
  readonly name = "gemini";
  private readonly apiKey: string | undefined;
  private readonly locale: string;
  private readonly model: string;
  private readonly rateLimit: RateLimitSettings;
  private readonly trackerFile: string | null;
  private readonly logger: Logger;
  private generate: GenerateContentFn | null;
  private tracker: RateLimitTracker | null = null;

  constructor(options: GeminiTranscriberOptions) {
    this.apiKey = options.apiKey;
    this.locale = options.locale;
    this.model = options.model ?? GEMINI_CONFIG.MODEL;
    this.rateLimit = options.rateLimit ?? {
      perMinute: RATE_LIMIT_CONFIG.PER_MINUTE,
      perDay: RATE_LIMIT_CONFIG.PER_DAY,
    };
    this.trackerFile =
      options.trackerFile === undefined
        ? RATE_LIMIT_CONFIG.TRACKER_FILE
        : options.trackerFile;
    this.logger = options.logger ?? consoleLogger;
    this.generate = options.generateContent ?? null;
  }

  assertAvailable(): void {
    if (!this.apiKey) {
      throw new MissingCredentialError("GEMINI_API_KEY or API_KEY");
    }
  }

  private client(): GenerateContentFn {
    if (this.generate) {
      return this.generate;
    }
    if (!this.apiKey) {
      throw new MissingCredentialError("GEMINI_API_KEY or API_KEY");
    }
    const ai = new GoogleGenAI({ apiKey: this.apiKey });
    const generate: GenerateContentFn = (params) =>
      ai.models.generateContent(params);
    this.generate = generate;
    return generate;
  }

  private rateLimitTracker(): RateLimitTracker {
    if (!this.tracker) {
      this.tracker = this.trackerFile
        ? loadRateLimitTracker(this.trackerFile, this.logger)
        : createRateLimitTracker();
    }
    return this.tracker;
  }

  async transcribe(audioPath: string): Promise<string> {
    this.assertAvailable();
    const generate = this.client();
    const tracker = this.rateLimitTracker();

    if (!canMakeRequest(tracker, this.rateLimit).canMake) {
      throw new TranscriptionQuotaError(
        `daily limit of ${this.rateLimit.perDay} requests reached`
      );
    }
    await respectRateLimitPerMinute(tracker, this.rateLimit, this.logger);
    if (this.trackerFile) {
      saveRateLimitTracker(this.trackerFile, tracker);
    }

    try {
      const base64Audio = fs.readFileSync(audioPath).toString("base64");

      const response = await generate({
        model: this.model,
        contents: [
          {
            role: "user",
            parts: [
              {
                text: `Transcribe the speech in this audio file. The language is ${this.locale}.
              Return ONLY the transcription text without any additional commentary or metadata.`,
              },
              {
                inlineData: {
                  mimeType: audioMimeType(audioPath),
                  data: base64Audio,
                },
              },
            ],
          },
        ],
      });

      const parts = response.candidates?.[0]?.content?.parts;
      if (!parts || parts.length === 0) {
        throw new Error("No text content in response");
      }

      return parts
        .map((part) => part.text ?? "")
        .join("\n")
        .trim();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      if (isQuotaError(error)) {
        throw new TranscriptionQuotaError(message);
      }
      this.logger.warn(
        `⚠️  Gemini transcription failed for ${audioPath}: ${message}`
      );
      return "";
    }
  }
}

/**
 * Builds the transcriber selected in the configuration
 */
export function createTranscriber(
  backend: TranscriberBackend = TRANSCRIPTION_CONFIG.BACKEND,
  logger: Logger = consoleLogger
): Transcriber {
  if (backend === "gemini") {
    return new GeminiTranscriber({
      apiKey: process.env.GEMINI_API_KEY || process.env.API_KEY,
      locale: TRANSCRIPTION_CONFIG.LOCALE,
      logger,
    });
  }
  return new HearTranscriber(
    TRANSCRIPTION_CONFIG.COMMAND,
    TRANSCRIPTION_CONFIG.LOCALE,
    TRANSCRIPTION_CONFIG.TIMEOUT_MS,
    logger
  );
}
