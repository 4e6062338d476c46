import fs from "fs";
import path from "path";
import readline from "readline";
import type { CorpusConfig } from "./config/corpus.config";
import type { RemovalManifestEntry } from "./interfaces/analysis.interface";
import type { StoredChunkRecord } from "./interfaces/chunk-record.interface";
import type { ResultStore } from "./resultStore";
import { readAllRecords } from "./resultScanner";
import { classifyChapter } from "./utils/corpus.utils";
import { consoleLogger, type Logger } from "./utils/logger.utils";
import { recordErrorRate } from "./utils/text.utils";

export const REMOVAL_MANIFEST_FILE = "files_to_remove.json";

/**
 * Chunks whose error rate is above the purge threshold of their subdivision.
 * Uncategorized chapters are never listed.
 */
export function buildRemovalManifest(
  records: readonly StoredChunkRecord[],
  corpus: CorpusConfig,
  wavDir: string
): RemovalManifestEntry[] {
  const manifest: RemovalManifestEntry[] = [];

  for (const { record } of records) {
    const subdivision = classifyChapter(record.chapter, corpus);
    if (!subdivision) continue;

    const rate = recordErrorRate(record);
    if (rate > subdivision.purgeThreshold) {
      manifest.push({
        chapter: record.chapter,
        chunk: record.chunk,
        wav_path: path.join(wavDir, record.chapter, `${record.chunk}.wav`),
        error_rate: rate,
        threshold: subdivision.purgeThreshold,
      });
    }
  }

  return manifest;
}

/**
 * Deletes the listed audio files. Files that are already gone are skipped.
 * Returns how many files were actually removed.
 */
export function deleteFlaggedAudio(
  manifest: readonly RemovalManifestEntry[],
  logger: Logger = consoleLogger
): number {
  let deleted = 0;
  for (const entry of manifest) {
    if (!fs.existsSync(entry.wav_path)) continue;
    try {
      fs.unlinkSync(entry.wav_path);
      deleted++;
    } catch (error) {
      logger.warn(
        `⚠️  Could not delete ${entry.wav_path}: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
    }
  }
  return deleted;
}

/**
 * Asks a question on the terminal and resolves with the answer
 */
export function askOnTerminal(question: string): Promise<string> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });
  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer);
    });
  });
}

export interface PurgeOptions {
  store: ResultStore;
  corpus: CorpusConfig;
  wavDir: string;
  /** Delete files instead of only writing the manifest */
  doit: boolean;
  /** Reserved: would also remove the chunks from the database */
  syncDb: boolean;
  ask?: (question: string) => Promise<string>;
  logger?: Logger;
}

export interface PurgeSummary {
  manifestPath: string;
  manifest: RemovalManifestEntry[];
  confirmed: boolean;
  deleted: number;
}

/**
 * Writes the removal manifest and, only with `doit` and a typed "yes",
 * deletes the flagged audio. Chunk records are left untouched.
 */
export async function runPurge(options: PurgeOptions): Promise<PurgeSummary> {
  const logger = options.logger ?? consoleLogger;
  const ask = options.ask ?? askOnTerminal;

  const { records } = readAllRecords(options.store, logger);
  const manifest = buildRemovalManifest(records, options.corpus, options.wavDir);

  logger.info("\n--- Dry Run Summary ---");
  logger.info(
    `Identified ${manifest.length} chunks exceeding their respective thresholds.`
  );
  const manifestPath = options.store.writeReport(REMOVAL_MANIFEST_FILE, manifest);
  logger.info(`📄 List of files to be removed saved to: ${manifestPath}`);

  const summary: PurgeSummary = {
    manifestPath,
    manifest,
    confirmed: false,
    deleted: 0,
  };

  if (!options.doit) {
    logger.info("\nℹ️  This was a dry run. No files were deleted.");
    logger.info("   To permanently delete these files, run again with --doit.");
    return summary;
  }

  if (options.syncDb) {
    logger.warn("⚠️  --sync-db is not available yet; the database is not changed.");
  }

  if (manifest.length === 0) {
    logger.info("\n✅ No files to delete.");
    return summary;
  }

  logger.info("\n" + "=".repeat(50));
  logger.info("!! WARNING: You have used the --doit flag. !!");
  logger.info(`This will permanently delete ${manifest.length} .wav files.`);
  const answer = await ask("Type 'yes' to proceed with deletion: ");

  if (answer.trim().toLowerCase() !== "yes") {
    logger.info("\n❌ Deletion aborted by user.");
    return summary;
  }

  summary.confirmed = true;
  summary.deleted = deleteFlaggedAudio(manifest, logger);
  logger.info(`\n✅ Successfully deleted ${summary.deleted} .wav files.`);
  return summary;
}
