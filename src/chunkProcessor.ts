import fs from "fs";
import path from "path";
import type {
  ChunkKey,
  ChunkRecord,
} from "./interfaces/chunk-record.interface";
import type { ResultStore } from "./resultStore";
import type { Transcriber } from "./transcriber";
import { consoleLogger, type Logger } from "./utils/logger.utils";
import { levenshteinDistance, normalizeText } from "./utils/text.utils";

/**
 * One narrated chunk: its audio, its ground-truth text and its result key
 */
export interface AudioUnit {
  key: ChunkKey;
  audioPath: string;
  textPath: string;
}

export type ChunkOutcome = "written" | "already-done" | "missing-text";

/**
 * Derives the unit for wav/<chapter>/<chunk>.wav.
 * The text file mirrors the audio's path below the chapters directory.
 */
export function resolveAudioUnit(
  audioPath: string,
  wavDir: string,
  chaptersDir: string
): AudioUnit {
  const relativePath = path.relative(wavDir, audioPath);
  const parsed = path.parse(relativePath);

  return {
    key: {
      chapter: path.basename(path.dirname(audioPath)),
      chunk: parsed.name,
    },
    audioPath,
    textPath: path.join(chaptersDir, parsed.dir, `${parsed.name}.txt`),
  };
}

/**
 * Scores a transcription against the original text
 */
export function buildChunkRecord(
  key: ChunkKey,
  originalText: string,
  transcribedText: string
): ChunkRecord {
  const distance = levenshteinDistance(
    normalizeText(originalText),
    normalizeText(transcribedText)
  );

  return {
    chapter: key.chapter,
    chunk: key.chunk,
    levenshtein_distance: distance,
    original_text: originalText.trim(),
    transcribed_text: transcribedText,
  };
}

/**
 * Transcribes one chunk, scores it and stores the record.
 * Does nothing when the record already exists.
 */
export async function processChunk(
  unit: AudioUnit,
  deps: { store: ResultStore; transcriber: Transcriber; logger?: Logger }
): Promise<ChunkOutcome> {
  const logger = deps.logger ?? consoleLogger;

  if (deps.store.exists(unit.key)) {
    return "already-done";
  }

  if (!fs.existsSync(unit.textPath)) {
    logger.warn(
      `⚠️  No matching text file for ${unit.audioPath}. Skipping.`
    );
    return "missing-text";
  }

  const transcribedText = await deps.transcriber.transcribe(unit.audioPath);
  const originalText = fs.readFileSync(unit.textPath, "utf-8");

  deps.store.write(buildChunkRecord(unit.key, originalText, transcribedText));
  return "written";
}
