import type { ChunkRecord } from "./interfaces/chunk-record.interface";
import type { ResultStore } from "./resultStore";
import { readAllRecords } from "./resultScanner";
import { consoleLogger, type Logger } from "./utils/logger.utils";
import { normalizeText } from "./utils/text.utils";

/**
 * True when the transcription contains the first `snippetWords` words of the
 * original but does not start with them, i.e. the transcriber put something
 * (usually an English introduction) in front of the real text.
 * Records with an empty side or a shorter original are never flagged.
 */
export function hasLeadingForeignContent(
  record: Pick<ChunkRecord, "original_text" | "transcribed_text">,
  snippetWords: number
): boolean {
  if (!record.original_text || !record.transcribed_text) {
    return false;
  }

  const originalWords = normalizeText(record.original_text).split(" ");
  if (originalWords.length < snippetWords || originalWords[0] === "") {
    return false;
  }

  const snippet = originalWords.slice(0, snippetWords).join(" ");
  const transcribed = normalizeText(record.transcribed_text);

  return transcribed.includes(snippet) && !transcribed.startsWith(snippet);
}

export interface PatchSummary {
  scanned: number;
  modified: number;
  unreadable: number;
}

/**
 * Sets the distance of every record with leading foreign content to the
 * sentinel. Records already at the sentinel are not rewritten.
 */
export function patchIntroErrors(
  store: ResultStore,
  options: { snippetWords: number; sentinelDistance: number },
  logger: Logger = consoleLogger
): PatchSummary {
  const { totalFiles, records, unreadableCount } = readAllRecords(
    store,
    logger
  );
  let modified = 0;
  let unreadable = unreadableCount;

  for (const { filePath, record } of records) {
    if (!hasLeadingForeignContent(record, options.snippetWords)) continue;
    if (record.levenshtein_distance === options.sentinelDistance) continue;

    try {
      store.updateRecordFile(filePath, {
        levenshtein_distance: options.sentinelDistance,
      });
      modified++;
    } catch (error) {
      unreadable++;
      logger.warn(
        `⚠️  Could not update file ${filePath}: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
    }
  }

  return { scanned: totalFiles, modified, unreadable };
}
