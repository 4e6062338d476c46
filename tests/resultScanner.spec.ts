import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { FileResultStore } from "../src/resultStore";
import { scanResults } from "../src/resultScanner";
import {
  createMemoryLogger,
  makeRecord,
  makeTempDir,
  removeDir,
  testCorpus,
  writeFile,
} from "./helpers";

describe("scanResults", () => {
  let root: string;
  let store: FileResultStore;

  beforeEach(() => {
    root = makeTempDir();
    store = new FileResultStore(root);
  });

  afterEach(() => {
    removeDir(root);
  });

  it("partitions records by subdivision and chapter", () => {
    store.write(makeRecord("Gen1", "001", 0, "Im Anfang"));
    store.write(makeRecord("Gen1", "002", 1, "Und die Erde"));
    store.write(makeRecord("1Kor13", "001", 2, "Die Liebe"));
    store.write(makeRecord("Xyz3", "001", 0, "Unbekannt"));
    store.write(makeRecord("42", "001", 0, "Zahl"));
    store.writeReport("report.json", [{ chapter: "Gen1" }]);

    const scan = scanResults(store, testCorpus, createMemoryLogger());
    const [nt, ot] = scan.partitions;

    expect(scan.totalFiles).toBe(5);
    expect(scan.uncategorizedCount).toBe(2);
    expect(scan.unreadableCount).toBe(0);
    expect(nt.subdivision.name).toBe("NT");
    expect(nt.chunks.map((c) => `${c.chapter}/${c.chunk}`)).toEqual(["1Kor13/001"]);
    expect(ot.chunks.map((c) => `${c.chapter}/${c.chunk}`)).toEqual([
      "Gen1/001",
      "Gen1/002",
    ]);
    expect([...ot.chapters.keys()]).toEqual(["Gen1"]);
    expect(ot.chapters.get("Gen1")).toHaveLength(2);
  });

  it("skips malformed files with a warning", () => {
    store.write(makeRecord("Gen1", "001", 0, "Im Anfang"));
    writeFile(path.join(root, "Gen1", "002.json"), "{ not json");
    writeFile(path.join(root, "Gen1", "003.json"), JSON.stringify({ chunk: "003" }));
    const logger = createMemoryLogger();

    const scan = scanResults(store, testCorpus, logger);

    expect(scan.totalFiles).toBe(3);
    expect(scan.unreadableCount).toBe(2);
    expect(scan.partitions[1].chunks).toHaveLength(1);
    expect(logger.warnings).toHaveLength(2);
    expect(logger.warnings[0]).toContain(path.join(root, "Gen1", "002.json"));
  });
});
