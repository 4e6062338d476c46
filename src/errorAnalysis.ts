import type {
  ChapterErrorRate,
  ChunkDistributionReport,
  ChunkErrorRate,
  PercentileImpact,
} from "./interfaces/analysis.interface";
import type { ChunkRecord } from "./interfaces/chunk-record.interface";
import type { ResultStore } from "./resultStore";
import type { SubdivisionRecords } from "./resultScanner";
import { percentileImpact } from "./utils/statistics.utils";
import { consoleLogger, type Logger } from "./utils/logger.utils";
import {
  errorRate,
  normalizeText,
  recordErrorRate,
} from "./utils/text.utils";

/**
 * Part 1: error rate of every chunk, in input order
 */
export function computeChunkErrorRates(
  records: readonly ChunkRecord[]
): ChunkErrorRate[] {
  return records.map((record) => ({
    chunk_id: `${record.chapter}/${record.chunk}`,
    normalized_error_rate: recordErrorRate(record),
  }));
}

/**
 * Part 2: summed distance over summed normalized length per chapter,
 * worst chapter first
 */
export function computeChapterErrorRates(
  chapters: ReadonlyMap<string, readonly ChunkRecord[]>
): ChapterErrorRate[] {
  const names = [...chapters.keys()].sort();
  const results = names.map((chapter) => {
    const chunks = chapters.get(chapter) ?? [];
    const totalDistance = chunks.reduce(
      (sum, chunk) => sum + chunk.levenshtein_distance,
      0
    );
    const totalLength = chunks.reduce(
      (sum, chunk) => sum + normalizeText(chunk.original_text).length,
      0
    );
    return {
      chapter,
      aggregated_error_rate: errorRate(totalDistance, totalLength),
    };
  });

  return results.sort(
    (a, b) => b.aggregated_error_rate - a.aggregated_error_rate
  );
}

/**
 * Parts 3 and 4: items strictly above the threshold, lowest rate first
 */
export function filterAboveThreshold<T>(
  items: readonly T[],
  rateOf: (item: T) => number,
  threshold: number
): T[] {
  return items
    .filter((item) => rateOf(item) > threshold)
    .sort((a, b) => rateOf(a) - rateOf(b));
}

/**
 * File names of the four reports of one subdivision
 */
export function analysisReportFileNames(
  subdivisionName: string,
  threshold: number
): {
  distribution: string;
  chapters: string;
  flaggedChunks: string;
  flaggedChapters: string;
} {
  const suffix = String(threshold).replace(".", "_");
  return {
    distribution: `1_${subdivisionName}_individual_chunks_analysis.json`,
    chapters: `2_${subdivisionName}_chapter_level_analysis.json`,
    flaggedChunks: `3_${subdivisionName}_chunks_over_threshold_${suffix}.json`,
    flaggedChapters: `4_${subdivisionName}_chapters_over_threshold_${suffix}.json`,
  };
}

function logPercentileImpact(
  logger: Logger,
  impact: readonly PercentileImpact[],
  itemType: string,
  subdivisionName: string
): void {
  if (impact.length === 0) return;
  logger.info(
    `\n📈 Statistical threshold impact for ${itemType} (${subdivisionName}):`
  );
  for (const row of impact) {
    logger.info(
      `   > ${row.threshold.toFixed(3)} (${row.percentile}th percentile) would flag ${row.flaggedCount} of ${row.totalCount} ${itemType}.`
    );
  }
}

export interface SubdivisionAnalysis {
  subdivisionName: string;
  threshold: number;
  chunkRates: ChunkErrorRate[];
  chapterRates: ChapterErrorRate[];
  chunkImpact: PercentileImpact[];
  chapterImpact: PercentileImpact[];
  flaggedChunks: ChunkErrorRate[];
  flaggedChapters: ChapterErrorRate[];
  writtenFiles: string[];
}

/**
 * Runs the four analyses for one subdivision and writes their JSON reports.
 * Parts without data are skipped without writing anything.
 */
export function analyzeSubdivision(
  data: SubdivisionRecords,
  store: ResultStore,
  logger: Logger = consoleLogger
): SubdivisionAnalysis | null {
  const name = data.subdivision.name;
  const threshold = data.subdivision.analysisThreshold;
  const files = analysisReportFileNames(name, threshold);
  const writtenFiles: string[] = [];

  logger.info(`\n==================== ANALYSIS FOR: ${name} ====================`);
  if (data.chunks.length === 0) {
    logger.info(`ℹ️  No data found for ${name}. Skipping analysis.`);
    return null;
  }

  // Part 1
  logger.info(`\n--- Part 1: Individual chunks (${name}) ---`);
  const chunkRates = computeChunkErrorRates(data.chunks);
  const distribution: ChunkDistributionReport = {
    summary_statistics: { total_chunks: chunkRates.length },
    all_chunks: chunkRates,
  };
  writtenFiles.push(store.writeReport(files.distribution, distribution));
  logger.info(`✅ Analyzed ${chunkRates.length} chunks → ${files.distribution}`);
  const chunkImpact = percentileImpact(
    chunkRates.map((r) => r.normalized_error_rate)
  );
  logPercentileImpact(logger, chunkImpact, "chunks", name);

  // Part 2
  logger.info(`\n--- Part 2: Aggregated chapters (${name}) ---`);
  const chapterRates = computeChapterErrorRates(data.chapters);
  let chapterImpact: PercentileImpact[] = [];
  if (chapterRates.length > 0) {
    writtenFiles.push(store.writeReport(files.chapters, chapterRates));
    logger.info(`✅ Analyzed ${chapterRates.length} chapters → ${files.chapters}`);
    chapterImpact = percentileImpact(
      chapterRates.map((r) => r.aggregated_error_rate)
    );
    logPercentileImpact(logger, chapterImpact, "chapters", name);
  }

  // Part 3
  logger.info(`\n--- Part 3: Chunks over threshold > ${threshold} (${name}) ---`);
  const flaggedChunks = filterAboveThreshold(
    chunkRates,
    (r) => r.normalized_error_rate,
    threshold
  );
  if (flaggedChunks.length === 0) {
    logger.info(`ℹ️  No chunks found with an error rate greater than ${threshold}.`);
  } else {
    writtenFiles.push(store.writeReport(files.flaggedChunks, flaggedChunks));
    logger.info(
      `⚠️  Found ${flaggedChunks.length} chunks exceeding the threshold → ${files.flaggedChunks}`
    );
  }

  // Part 4
  logger.info(`\n--- Part 4: Chapters over threshold > ${threshold} (${name}) ---`);
  const flaggedChapters = filterAboveThreshold(
    chapterRates,
    (r) => r.aggregated_error_rate,
    threshold
  );
  if (flaggedChapters.length === 0) {
    logger.info(`ℹ️  No chapters found with an error rate greater than ${threshold}.`);
  } else {
    writtenFiles.push(store.writeReport(files.flaggedChapters, flaggedChapters));
    logger.info(
      `⚠️  Found ${flaggedChapters.length} chapters exceeding the threshold → ${files.flaggedChapters}`
    );
  }

  return {
    subdivisionName: name,
    threshold,
    chunkRates,
    chapterRates,
    chunkImpact,
    chapterImpact,
    flaggedChunks,
    flaggedChapters,
    writtenFiles,
  };
}
