import type {
  CorpusConfig,
  CorpusSubdivision,
} from "./config/corpus.config";
import type {
  ChunkRecord,
  StoredChunkRecord,
} from "./interfaces/chunk-record.interface";
import type { ResultStore } from "./resultStore";
import { classifyChapter } from "./utils/corpus.utils";
import { consoleLogger, type Logger } from "./utils/logger.utils";

/**
 * Records of one subdivision, flat and grouped by chapter
 */
export interface SubdivisionRecords {
  subdivision: CorpusSubdivision;
  chunks: ChunkRecord[];
  chapters: Map<string, ChunkRecord[]>;
}

export interface ScanResult {
  totalFiles: number;
  records: StoredChunkRecord[];
  partitions: SubdivisionRecords[];
  uncategorizedCount: number;
  unreadableCount: number;
}

/**
 * Reads every stored record in path order; unreadable files are reported and skipped
 */
export function readAllRecords(
  store: ResultStore,
  logger: Logger = consoleLogger
): { totalFiles: number; records: StoredChunkRecord[]; unreadableCount: number } {
  const files = store.listRecordFiles();
  const records: StoredChunkRecord[] = [];
  let unreadableCount = 0;

  for (const filePath of files) {
    try {
      const record = store.readRecordFile(filePath);
      records.push({ filePath, record });
    } catch (error) {
      unreadableCount++;
      logger.warn(
        `⚠️  Could not process file ${filePath}: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
    }
  }

  return { totalFiles: files.length, records, unreadableCount };
}

/**
 * Partitions every stored record by corpus subdivision and chapter
 */
export function scanResults(
  store: ResultStore,
  corpus: CorpusConfig,
  logger: Logger = consoleLogger
): ScanResult {
  const { totalFiles, records, unreadableCount } = readAllRecords(
    store,
    logger
  );

  const partitions = corpus.subdivisions.map(
    (subdivision): SubdivisionRecords => ({
      subdivision,
      chunks: [],
      chapters: new Map<string, ChunkRecord[]>(),
    })
  );
  let uncategorizedCount = 0;

  for (const { record } of records) {
    const subdivision = classifyChapter(record.chapter, corpus);
    const partition = partitions.find((p) => p.subdivision === subdivision);
    if (!partition) {
      uncategorizedCount++;
      continue;
    }

    partition.chunks.push(record);
    const chapterChunks = partition.chapters.get(record.chapter) ?? [];
    chapterChunks.push(record);
    partition.chapters.set(record.chapter, chapterChunks);
  }

  return { totalFiles, records, partitions, uncategorizedCount, unreadableCount };
}

/**
 * Prints how the records were partitioned
 */
export function logPartitionSummary(
  scan: ScanResult,
  logger: Logger = consoleLogger
): void {
  logger.info("\n📊 Data Partitioning Summary:");
  logger.info(`   • Result files found: ${scan.totalFiles}`);
  for (const partition of scan.partitions) {
    logger.info(
      `   • Assigned to ${partition.subdivision.name}: ${partition.chunks.length}`
    );
  }
  if (scan.uncategorizedCount > 0) {
    logger.info(`   • Could not categorize: ${scan.uncategorizedCount}`);
  }
  if (scan.unreadableCount > 0) {
    logger.info(`   • Unreadable: ${scan.unreadableCount}`);
  }
}
