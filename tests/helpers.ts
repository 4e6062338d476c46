import fs from "fs";
import os from "os";
import path from "path";
import { buildCorpusConfig, type CorpusConfig } from "../src/config/corpus.config";
import type { ChunkRecord } from "../src/interfaces/chunk-record.interface";
import type { Transcriber } from "../src/transcriber";
import type { Logger } from "../src/utils/logger.utils";

export function makeTempDir(prefix = "audio-check-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function writeFile(filePath: string, content: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content, "utf-8");
}

export function readJson(filePath: string): unknown {
  return JSON.parse(fs.readFileSync(filePath, "utf-8"));
}

/**
 * Logger that keeps every message instead of printing
 */
export function createMemoryLogger(): Logger & {
  infos: string[];
  warnings: string[];
  errors: string[];
} {
  const infos: string[] = [];
  const warnings: string[] = [];
  const errors: string[] = [];
  return {
    infos,
    warnings,
    errors,
    info: (message) => infos.push(message),
    warn: (message) => warnings.push(message),
    error: (message) => errors.push(message),
  };
}

export const testCorpus: CorpusConfig = buildCorpusConfig({
  subdivisions: [
    {
      name: "NT",
      analysisThreshold: 0.1,
      purgeThreshold: 0.036,
      books: ["Mt", "1Kor"],
    },
    {
      name: "OT",
      analysisThreshold: 0.1,
      purgeThreshold: 0.05,
      books: ["Gen", "Ex"],
    },
  ],
  patcher: { snippetWords: 5, sentinelDistance: 999 },
  report: { deficientThresholdPercent: 50 },
});

export function makeRecord(
  chapter: string,
  chunk: string,
  levenshtein_distance: number,
  original_text: string,
  transcribed_text = original_text
): ChunkRecord {
  return { chapter, chunk, levenshtein_distance, original_text, transcribed_text };
}

/**
 * Transcriber answering from a table keyed by "<chapter>/<chunk>"
 */
export class FakeTranscriber implements Transcriber {
  readonly name = "fake";
  readonly calls: string[] = [];
  inFlight = 0;
  maxInFlight = 0;
  available = true;

  constructor(
    private readonly answers: Record<string, string>,
    private readonly delayMs = 0
  ) {}

  assertAvailable(): void {
    if (!this.available) {
      throw new Error("fake transcriber unavailable");
    }
  }

  async transcribe(audioPath: string): Promise<string> {
    const key = `${path.basename(path.dirname(audioPath))}/${path.parse(audioPath).name}`;
    this.calls.push(key);
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      if (this.delayMs > 0) {
        await new Promise((resolve) => setTimeout(resolve, this.delayMs));
      }
      const answer = this.answers[key];
      if (answer === undefined) {
        throw new Error(`no answer for ${key}`);
      }
      return answer;
    } finally {
      this.inFlight--;
    }
  }
}
