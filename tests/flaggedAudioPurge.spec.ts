import fs from "fs";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  REMOVAL_MANIFEST_FILE,
  buildRemovalManifest,
  runPurge,
} from "../src/flaggedAudioPurge";
import { readAllRecords } from "../src/resultScanner";
import { FileResultStore } from "../src/resultStore";
import {
  createMemoryLogger,
  makeRecord,
  makeTempDir,
  readJson,
  removeDir,
  testCorpus,
  writeFile,
} from "./helpers";

describe("flagged audio purge", () => {
  let resultsDir: string;
  let wavDir: string;
  let store: FileResultStore;

  beforeEach(() => {
    resultsDir = makeTempDir();
    wavDir = makeTempDir();
    store = new FileResultStore(resultsDir);

    store.write(makeRecord("Gen1", "001", 0, "Im Anfang schuf Gott Himmel und Erde."));
    store.write(makeRecord("Gen1", "002", 4, "Und die Erde war wüst und leer."));
    store.write(makeRecord("Mt5", "001", 1, "Selig sind die Armen.", "Selig sind die Arme."));
    store.write(makeRecord("Xyz1", "001", 10, "Unbekanntes Buch."));

    writeFile(path.join(wavDir, "Gen1", "001.wav"), "RIFF");
    writeFile(path.join(wavDir, "Gen1", "002.wav"), "RIFF");
    // Mt5/001.wav is already gone
  });

  afterEach(() => {
    removeDir(resultsDir);
    removeDir(wavDir);
  });

  it("lists chunks above their subdivision's purge threshold", () => {
    const { records } = readAllRecords(store, createMemoryLogger());

    const manifest = buildRemovalManifest(records, testCorpus, wavDir);

    expect(manifest).toEqual([
      {
        chapter: "Gen1",
        chunk: "002",
        wav_path: path.join(wavDir, "Gen1", "002.wav"),
        error_rate: 4 / 29,
        threshold: 0.05,
      },
      {
        chapter: "Mt5",
        chunk: "001",
        wav_path: path.join(wavDir, "Mt5", "001.wav"),
        error_rate: 0.05,
        threshold: 0.036,
      },
    ]);
  });

  it("only writes the manifest on a dry run", async () => {
    const ask = vi.fn(async () => "yes");

    const summary = await runPurge({
      store,
      corpus: testCorpus,
      wavDir,
      doit: false,
      syncDb: false,
      ask,
      logger: createMemoryLogger(),
    });

    expect(ask).not.toHaveBeenCalled();
    expect(summary.deleted).toBe(0);
    expect(summary.manifestPath).toBe(path.join(resultsDir, REMOVAL_MANIFEST_FILE));
    expect(readJson(summary.manifestPath)).toHaveLength(2);
    expect(fs.existsSync(path.join(wavDir, "Gen1", "002.wav"))).toBe(true);
  });

  it("aborts unless the answer is yes", async () => {
    const summary = await runPurge({
      store,
      corpus: testCorpus,
      wavDir,
      doit: true,
      syncDb: false,
      ask: async () => "no",
      logger: createMemoryLogger(),
    });

    expect(summary.confirmed).toBe(false);
    expect(summary.deleted).toBe(0);
    expect(fs.existsSync(path.join(wavDir, "Gen1", "002.wav"))).toBe(true);
  });

  it("deletes the flagged audio after confirmation and keeps the records", async () => {
    const logger = createMemoryLogger();

    const summary = await runPurge({
      store,
      corpus: testCorpus,
      wavDir,
      doit: true,
      syncDb: true,
      ask: async () => "YES ",
      logger,
    });

    expect(summary.confirmed).toBe(true);
    expect(summary.deleted).toBe(1);
    expect(fs.existsSync(path.join(wavDir, "Gen1", "002.wav"))).toBe(false);
    expect(fs.existsSync(path.join(wavDir, "Gen1", "001.wav"))).toBe(true);
    expect(store.exists({ chapter: "Gen1", chunk: "002" })).toBe(true);
    expect(store.exists({ chapter: "Mt5", chunk: "001" })).toBe(true);
    expect(logger.warnings).toEqual([
      "⚠️  --sync-db is not available yet; the database is not changed.",
    ]);
  });

  it("does not ask when nothing is flagged", async () => {
    const cleanDir = makeTempDir();
    const ask = vi.fn(async () => "yes");
    try {
      const summary = await runPurge({
        store: new FileResultStore(cleanDir),
        corpus: testCorpus,
        wavDir,
        doit: true,
        syncDb: false,
        ask,
        logger: createMemoryLogger(),
      });

      expect(summary.manifest).toEqual([]);
      expect(ask).not.toHaveBeenCalled();
      expect(readJson(summary.manifestPath)).toEqual([]);
    } finally {
      removeDir(cleanDir);
    }
  });
});
