import fs from "fs";
import yaml from "js-yaml";
import { z } from "zod";
import { PATHS } from "./paths.config";

const SubdivisionSchema = z.object({
  name: z.string().min(1, "Subdivision name is required"),
  analysisThreshold: z.number().min(0).max(1),
  purgeThreshold: z.number().min(0).max(1),
  books: z.array(z.coerce.string().min(1)).min(1, "At least one book is required"),
});

const CorpusFileSchema = z.object({
  subdivisions: z.array(SubdivisionSchema).min(1),
  patcher: z
    .object({
      snippetWords: z.number().int().min(1).default(5),
      sentinelDistance: z.number().int().min(0).default(999),
    })
    .default({}),
  report: z
    .object({
      deficientThresholdPercent: z.number().min(0).max(100).default(50),
    })
    .default({}),
});

export type CorpusFile = z.infer<typeof CorpusFileSchema>;

/**
 * One of the disjoint book sets the corpus is partitioned into
 */
export interface CorpusSubdivision {
  name: string;
  books: ReadonlySet<string>;
  analysisThreshold: number; // Manual threshold for the flagged reports
  purgeThreshold: number; // Chunks above this rate are removed by the purge
}

/**
 * Immutable corpus configuration handed to every component
 */
export interface CorpusConfig {
  subdivisions: readonly CorpusSubdivision[];
  snippetWords: number;
  sentinelDistance: number;
  deficientThresholdPercent: number;
}

/**
 * Builds the config value object and checks that no book belongs to two subdivisions
 */
export function buildCorpusConfig(file: CorpusFile): CorpusConfig {
  const seen = new Map<string, string>();
  const subdivisions = file.subdivisions.map((sub) => {
    for (const book of sub.books) {
      const owner = seen.get(book);
      if (owner && owner !== sub.name) {
        throw new Error(
          `Book "${book}" is listed in both "${owner}" and "${sub.name}"`
        );
      }
      seen.set(book, sub.name);
    }
    return Object.freeze({
      name: sub.name,
      books: new Set(sub.books),
      analysisThreshold: sub.analysisThreshold,
      purgeThreshold: sub.purgeThreshold,
    });
  });

  return Object.freeze({
    subdivisions: Object.freeze(subdivisions),
    snippetWords: file.patcher.snippetWords,
    sentinelDistance: file.patcher.sentinelDistance,
    deficientThresholdPercent: file.report.deficientThresholdPercent,
  });
}

/**
 * Parses the YAML corpus document
 */
export function parseCorpusConfig(content: string): CorpusConfig {
  const parsed = CorpusFileSchema.safeParse(yaml.load(content));
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid corpus configuration: ${issues}`);
  }
  return buildCorpusConfig(parsed.data);
}

/**
 * Loads config/corpus.yaml (or another file)
 */
export function loadCorpusConfig(
  filePath: string = PATHS.config.corpus
): CorpusConfig {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Corpus configuration not found: ${filePath}`);
  }
  return parseCorpusConfig(fs.readFileSync(filePath, "utf-8"));
}
