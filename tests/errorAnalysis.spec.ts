import fs from "fs";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  analysisReportFileNames,
  analyzeSubdivision,
  computeChapterErrorRates,
  computeChunkErrorRates,
  filterAboveThreshold,
} from "../src/errorAnalysis";
import { FileResultStore } from "../src/resultStore";
import { scanResults } from "../src/resultScanner";
import {
  createMemoryLogger,
  makeRecord,
  makeTempDir,
  readJson,
  removeDir,
  testCorpus,
} from "./helpers";

const GEN1_001 = "Im Anfang schuf Gott Himmel und Erde."; // 36 characters normalized
const GEN1_002 = "Und die Erde war wüst und leer."; // 29 characters normalized

describe("error rate computations", () => {
  it("rates every chunk", () => {
    const rates = computeChunkErrorRates([
      makeRecord("Gen1", "001", 0, GEN1_001),
      makeRecord("Gen1", "002", 4, GEN1_002),
      makeRecord("Gen1", "003", 3, "?!"),
    ]);

    expect(rates.map((r) => r.chunk_id)).toEqual(["Gen1/001", "Gen1/002", "Gen1/003"]);
    expect(rates[0].normalized_error_rate).toBe(0);
    expect(rates[1].normalized_error_rate).toBeCloseTo(4 / 29, 10);
    expect(rates[2].normalized_error_rate).toBe(1);
  });

  it("aggregates chapters over summed lengths, worst first", () => {
    const chapters = new Map([
      ["Gen1", [makeRecord("Gen1", "001", 0, GEN1_001), makeRecord("Gen1", "002", 4, GEN1_002)]],
      ["Ex1", [makeRecord("Ex1", "001", 500, "Kurz")]],
      ["Ex2", [makeRecord("Ex2", "001", 0, "Kurz")]],
    ]);

    const rates = computeChapterErrorRates(chapters);

    expect(rates.map((r) => r.chapter)).toEqual(["Ex1", "Gen1", "Ex2"]);
    expect(rates[0].aggregated_error_rate).toBe(1);
    expect(rates[1].aggregated_error_rate).toBeCloseTo(4 / 65, 10);
    expect(rates[2].aggregated_error_rate).toBe(0);
  });

  it("keeps items strictly above the threshold, lowest first", () => {
    const flagged = filterAboveThreshold(
      [{ id: "a", rate: 0.5 }, { id: "b", rate: 0.1 }, { id: "c", rate: 0.2 }, { id: "d", rate: 0.9 }],
      (item) => item.rate,
      0.1
    );

    expect(flagged.map((item) => item.id)).toEqual(["c", "a", "d"]);
  });

  it("names the reports after subdivision and threshold", () => {
    expect(analysisReportFileNames("OT", 0.15)).toEqual({
      distribution: "1_OT_individual_chunks_analysis.json",
      chapters: "2_OT_chapter_level_analysis.json",
      flaggedChunks: "3_OT_chunks_over_threshold_0_15.json",
      flaggedChapters: "4_OT_chapters_over_threshold_0_15.json",
    });
  });
});

describe("analyzeSubdivision", () => {
  let root: string;
  let store: FileResultStore;

  beforeEach(() => {
    root = makeTempDir();
    store = new FileResultStore(root);
  });

  afterEach(() => {
    removeDir(root);
  });

  it("writes the reports for a two chunk chapter", () => {
    store.write(makeRecord("Gen1", "001", 0, GEN1_001));
    store.write(
      makeRecord("Gen1", "002", 4, GEN1_002, "Und die Erde war wüst und voll.")
    );
    const logger = createMemoryLogger();
    const scan = scanResults(store, testCorpus, logger);

    const result = analyzeSubdivision(scan.partitions[1], store, logger);

    expect(result?.subdivisionName).toBe("OT");
    const distribution = readJson(
      path.join(root, "1_OT_individual_chunks_analysis.json")
    );
    expect(distribution).toEqual({
      summary_statistics: { total_chunks: 2 },
      all_chunks: [
        { chunk_id: "Gen1/001", normalized_error_rate: 0 },
        { chunk_id: "Gen1/002", normalized_error_rate: 4 / 29 },
      ],
    });
    expect(readJson(path.join(root, "2_OT_chapter_level_analysis.json"))).toEqual([
      { chapter: "Gen1", aggregated_error_rate: 4 / 65 },
    ]);
    expect(readJson(path.join(root, "3_OT_chunks_over_threshold_0_1.json"))).toEqual([
      { chunk_id: "Gen1/002", normalized_error_rate: 4 / 29 },
    ]);
    // 4/65 is below 0.1, so no chapter report
    expect(fs.existsSync(path.join(root, "4_OT_chapters_over_threshold_0_1.json"))).toBe(false);
    expect(result?.flaggedChapters).toEqual([]);
    expect(result?.writtenFiles).toHaveLength(3);
    expect(result?.chunkImpact).toHaveLength(6);
  });

  it("skips a subdivision without data", () => {
    const logger = createMemoryLogger();
    const scan = scanResults(store, testCorpus, logger);

    expect(analyzeSubdivision(scan.partitions[0], store, logger)).toBeNull();
    expect(fs.readdirSync(root)).toEqual([]);
    expect(logger.infos).toContain("ℹ️  No data found for NT. Skipping analysis.");
  });
});
