import type { ResultStore } from "./resultStore";
import {
  processChunk,
  resolveAudioUnit,
  type AudioUnit,
} from "./chunkProcessor";
import { FatalTranscriberError, type Transcriber } from "./transcriber";
import { runWorkerPool } from "./utils/concurrency.utils";
import { listFilesRecursive } from "./utils/file.utils";
import { consoleLogger, type Logger } from "./utils/logger.utils";

export interface DispatchOptions {
  wavDir: string;
  chaptersDir: string;
  store: ResultStore;
  transcriber: Transcriber;
  workers: number;
  logger?: Logger;
  /** Log a progress line every N finished chunks */
  progressEvery?: number;
}

export interface DispatchSummary {
  totalAudioFiles: number;
  pending: number;
  written: number;
  missingText: number;
  failed: number;
}

/**
 * Audio units whose result record does not exist yet, sorted by path
 */
export function findPendingUnits(
  wavDir: string,
  chaptersDir: string,
  store: ResultStore
): { all: AudioUnit[]; pending: AudioUnit[] } {
  const all = listFilesRecursive(wavDir, ".wav").map((audioPath) =>
    resolveAudioUnit(audioPath, wavDir, chaptersDir)
  );
  return { all, pending: all.filter((unit) => !store.exists(unit.key)) };
}

/**
 * Transcribes and scores every unfinished chunk with a bounded worker pool.
 * A missing transcriber aborts before anything is queued. A fatal transcriber
 * error during the run lets no further chunk start and is rethrown once the
 * chunks in flight are done; other failures of single chunks are logged and
 * counted.
 */
export async function dispatchAudioCheck(
  options: DispatchOptions
): Promise<DispatchSummary> {
  const logger = options.logger ?? consoleLogger;
  const progressEvery = options.progressEvery ?? 10;

  options.transcriber.assertAvailable();

  logger.info("📂 Scanning for audio files to process...");
  const { all, pending } = findPendingUnits(
    options.wavDir,
    options.chaptersDir,
    options.store
  );

  const summary: DispatchSummary = {
    totalAudioFiles: all.length,
    pending: pending.length,
    written: 0,
    missingText: 0,
    failed: 0,
  };

  if (pending.length === 0) {
    logger.info("✅ All audio chunks already have analysis results.");
    return summary;
  }

  logger.info(
    `📝 Found ${pending.length} new audio chunks to process (${options.workers} workers).`
  );

  const abort: { error: FatalTranscriberError | null } = { error: null };

  await runWorkerPool(
    pending,
    options.workers,
    async (unit) => {
      if (abort.error) return;
      const outcome = await processChunk(unit, {
        store: options.store,
        transcriber: options.transcriber,
        logger,
      });
      if (outcome === "written") summary.written++;
      if (outcome === "missing-text") summary.missingText++;
    },
    {
      onError: (unit, error) => {
        if (error instanceof FatalTranscriberError) {
          abort.error = abort.error ?? error;
          return;
        }
        summary.failed++;
        logger.error(
          `❌ Error processing ${unit.audioPath}: ${
            error instanceof Error ? error.message : String(error)
          }`
        );
      },
      onProgress: (completed, total) => {
        if (completed % progressEvery === 0 || completed === total) {
          logger.info(`  Processed ${completed}/${total} chunks...`);
        }
      },
    }
  );

  if (abort.error) {
    throw abort.error;
  }

  return summary;
}
