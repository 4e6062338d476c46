import type {
  CorpusConfig,
  CorpusSubdivision,
} from "../config/corpus.config";

const BOOK_ABBREVIATION_REGEX = /^([0-9]?[A-Za-z]+)/;

/**
 * Extracts the book abbreviation from a chapter id
 * Examples: "1Kor13" -> "1Kor", "Gen1" -> "Gen", "42" -> null
 */
export function extractBookAbbreviation(chapter: string): string | null {
  const match = chapter.match(BOOK_ABBREVIATION_REGEX);
  return match ? match[1] : null;
}

/**
 * Finds the subdivision a chapter belongs to, or null when uncategorized
 */
export function classifyChapter(
  chapter: string,
  corpus: CorpusConfig
): CorpusSubdivision | null {
  const book = extractBookAbbreviation(chapter);
  if (!book) {
    return null;
  }
  return corpus.subdivisions.find((sub) => sub.books.has(book)) ?? null;
}
