import fs from "fs";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { FileResultStore, parseChunkRecord } from "../src/resultStore";
import { makeRecord, makeTempDir, readJson, removeDir, writeFile } from "./helpers";

describe("FileResultStore", () => {
  let root: string;
  let store: FileResultStore;

  beforeEach(() => {
    root = makeTempDir();
    store = new FileResultStore(root);
  });

  afterEach(() => {
    removeDir(root);
  });

  it("stores a record under <chapter>/<chunk>.json", () => {
    const record = makeRecord("Gen1", "001", 0, "Im Anfang");
    const filePath = store.write(record);

    expect(filePath).toBe(path.join(root, "Gen1", "001.json"));
    expect(readJson(filePath)).toEqual(record);
    expect(store.exists({ chapter: "Gen1", chunk: "001" })).toBe(true);
    expect(store.exists({ chapter: "Gen1", chunk: "002" })).toBe(false);
    expect(store.read({ chapter: "Gen1", chunk: "001" })).toEqual(record);
  });

  it("leaves no temporary files behind", () => {
    store.write(makeRecord("Gen1", "001", 0, "Im Anfang"));
    expect(fs.readdirSync(path.join(root, "Gen1"))).toEqual(["001.json"]);
  });

  it("lists only records inside chapter directories, sorted", () => {
    store.write(makeRecord("Mt5", "001", 0, "Selig"));
    store.write(makeRecord("Gen1", "002", 0, "Und"));
    store.write(makeRecord("Gen1", "001", 0, "Im"));
    store.writeReport("report.json", []);
    writeFile(path.join(root, "Gen1", "notes.txt"), "ignored");

    expect(store.listRecordFiles()).toEqual([
      path.join(root, "Gen1", "001.json"),
      path.join(root, "Gen1", "002.json"),
      path.join(root, "Mt5", "001.json"),
    ]);
  });

  it("lists nothing when the root does not exist", () => {
    expect(new FileResultStore(path.join(root, "missing")).listRecordFiles()).toEqual([]);
  });
});

describe("parseChunkRecord", () => {
  it("fills defaults and keeps unknown fields", () => {
    const record = parseChunkRecord({ chapter: "Gen1", chunk: 7, extra: "kept" });

    expect(record).toEqual({
      chapter: "Gen1",
      chunk: "7",
      levenshtein_distance: 0,
      original_text: "",
      transcribed_text: "",
      extra: "kept",
    });
  });

  it("rejects a record without chapter", () => {
    expect(() => parseChunkRecord({ chunk: "001" })).toThrow(
      "Invalid chunk record: chapter"
    );
  });

  it("rejects a negative distance", () => {
    expect(() =>
      parseChunkRecord({ chapter: "Gen1", chunk: "001", levenshtein_distance: -1 })
    ).toThrow("levenshtein_distance");
  });
});
