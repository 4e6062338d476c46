const ABBREVIATION_REGEX = /^([1-3]?[A-Za-z]+)/;

/**
 * Unique book abbreviations of a chapter list, one chapter id per line
 * Example line: "1Thess5" -> "1Thess"
 */
export function extractAbbreviations(content: string): Set<string> {
  const abbreviations = new Set<string>();
  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line) continue;
    const match = line.match(ABBREVIATION_REGEX);
    if (match) abbreviations.add(match[1]);
  }
  return abbreviations;
}

/**
 * `directory_name` of every book object in the parsed JSON.
 * Throws when the data is not an array of objects.
 */
export function extractDirectoryNames(data: unknown): Set<string> {
  if (!Array.isArray(data)) {
    throw new Error("expected a list of objects with 'directory_name' keys");
  }

  const names = new Set<string>();
  for (const book of data) {
    if (typeof book !== "object" || book === null) {
      throw new Error("expected a list of objects with 'directory_name' keys");
    }
    if ("directory_name" in book && typeof book.directory_name === "string") {
      names.add(book.directory_name);
    }
  }
  return names;
}

export interface ConsistencyResult {
  inJsonNotTxt: string[];
  inTxtNotJson: string[];
}

export function compareBookSets(
  txtAbbreviations: ReadonlySet<string>,
  jsonDirectories: ReadonlySet<string>
): ConsistencyResult {
  return {
    inJsonNotTxt: [...jsonDirectories].filter((n) => !txtAbbreviations.has(n)).sort(),
    inTxtNotJson: [...txtAbbreviations].filter((n) => !jsonDirectories.has(n)).sort(),
  };
}
