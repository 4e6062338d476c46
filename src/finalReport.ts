import type { ResultStore } from "./resultStore";
import { readAllRecords } from "./resultScanner";
import { consoleLogger, type Logger } from "./utils/logger.utils";

export const FINAL_REPORT_FILE = "report.json";

export interface ChapterDeficiency {
  chapter: string;
  total: number;
  deficient: number;
  deficiencyRate: number; // Percent of chunks with a non-zero distance
}

export interface FinalReportSummary {
  reportPath: string | null;
  chapters: ChapterDeficiency[];
  problematicChapters: string[];
}

/**
 * Counts deficient chunks (distance > 0) per chapter, sorted by chapter name
 */
export function computeChapterDeficiency(
  records: ReadonlyArray<{ chapter: string; levenshtein_distance: number }>
): ChapterDeficiency[] {
  const stats = new Map<string, { total: number; deficient: number }>();
  for (const record of records) {
    const entry = stats.get(record.chapter) ?? { total: 0, deficient: 0 };
    entry.total++;
    if (record.levenshtein_distance > 0) entry.deficient++;
    stats.set(record.chapter, entry);
  }

  return [...stats.keys()].sort().map((chapter) => {
    const entry = stats.get(chapter) ?? { total: 0, deficient: 0 };
    return {
      chapter,
      total: entry.total,
      deficient: entry.deficient,
      deficiencyRate:
        entry.total > 0 ? (entry.deficient / entry.total) * 100 : 0,
    };
  });
}

/**
 * Collects every chunk record into report.json and prints the chapters
 * with too many deficient chunks
 */
export function generateFinalReport(
  store: ResultStore,
  deficientThresholdPercent: number,
  logger: Logger = consoleLogger
): FinalReportSummary {
  logger.info("\n--- Generating Final Report and Analysis ---");

  const { records } = readAllRecords(store, logger);
  if (records.length === 0) {
    logger.info("ℹ️  No chunk results found to analyze.");
    return { reportPath: null, chapters: [], problematicChapters: [] };
  }

  const reportPath = store.writeReport(
    FINAL_REPORT_FILE,
    records.map((entry) => entry.record)
  );
  logger.info(`✅ Final report generated at: ${reportPath}`);

  logger.info("\n--- Deficiency Analysis ---");
  const chapters = computeChapterDeficiency(records.map((entry) => entry.record));
  for (const entry of chapters) {
    logger.info(
      `Chapter '${entry.chapter}': ${entry.deficient}/${entry.total} deficient chunks (${entry.deficiencyRate.toFixed(1)}%).`
    );
  }

  const problematicChapters = chapters
    .filter((entry) => entry.deficiencyRate > deficientThresholdPercent)
    .map((entry) => entry.chapter);

  logger.info("\n--- Summary ---");
  if (problematicChapters.length > 0) {
    logger.info(
      `The following chapters have over ${deficientThresholdPercent}% deficient chunks:`
    );
    for (const chapter of problematicChapters) {
      logger.info(` - ${chapter}`);
    }
  } else {
    logger.info(
      `No chapters exceeded the ${deficientThresholdPercent}% deficiency threshold.`
    );
  }

  return { reportPath, chapters, problematicChapters };
}
