import fs from "fs";
import path from "path";
import { z } from "zod";
import type {
  ChunkKey,
  ChunkRecord,
} from "./interfaces/chunk-record.interface";
import {
  ensureDirectoryExists,
  listFilesRecursive,
  readJsonFile,
  writeJsonFile,
} from "./utils/file.utils";

export const ChunkRecordSchema = z
  .object({
    chapter: z.string().min(1, "Chapter is required"),
    chunk: z
      .union([z.string().min(1, "Chunk is required"), z.number()])
      .transform((value) => String(value)),
    levenshtein_distance: z.number().int().min(0).default(0),
    original_text: z.string().default(""),
    transcribed_text: z.string().default(""),
  })
  .passthrough();

/**
 * Validates parsed JSON as a chunk record; throws with the offending fields
 */
export function parseChunkRecord(data: unknown): ChunkRecord {
  const parsed = ChunkRecordSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid chunk record: ${issues}`);
  }
  return parsed.data;
}

/**
 * Key-value view of the per-chunk results. A record that exists is done.
 */
export interface ResultStore {
  readonly root: string;
  exists(key: ChunkKey): boolean;
  read(key: ChunkKey): ChunkRecord;
  write(record: ChunkRecord): string;
  /** Files of every stored record, sorted by path */
  listRecordFiles(): string[];
  readRecordFile(filePath: string): ChunkRecord;
  /** Changes the given fields and keeps everything else in the file as it is */
  updateRecordFile(
    filePath: string,
    changes: Partial<Pick<ChunkRecord, "levenshtein_distance">>
  ): void;
  /** Writes a report next to the chunk directories and returns its path */
  writeReport(fileName: string, value: unknown): string;
}

/**
 * Stores each record as <root>/<chapter>/<chunk>.json
 */
export class FileResultStore implements ResultStore {
  constructor(readonly root: string) {}

  pathFor(key: ChunkKey): string {
    return path.join(this.root, key.chapter, `${key.chunk}.json`);
  }

  exists(key: ChunkKey): boolean {
    return fs.existsSync(this.pathFor(key));
  }

  read(key: ChunkKey): ChunkRecord {
    return this.readRecordFile(this.pathFor(key));
  }

  write(record: ChunkRecord): string {
    const filePath = this.pathFor(record);
    writeJsonFile(filePath, record);
    return filePath;
  }

  listRecordFiles(): string[] {
    const root = path.resolve(this.root);
    // Top-level files are reports, not chunk records
    return listFilesRecursive(root, ".json").filter(
      (filePath) => path.dirname(filePath) !== root
    );
  }

  readRecordFile(filePath: string): ChunkRecord {
    return parseChunkRecord(readJsonFile(filePath));
  }

  updateRecordFile(
    filePath: string,
    changes: Partial<Pick<ChunkRecord, "levenshtein_distance">>
  ): void {
    const raw = readJsonFile(filePath);
    if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
      throw new Error(`Invalid chunk record: ${filePath}`);
    }
    writeJsonFile(filePath, { ...raw, ...changes });
  }

  writeReport(fileName: string, value: unknown): string {
    ensureDirectoryExists(this.root);
    const filePath = path.join(this.root, fileName);
    writeJsonFile(filePath, value);
    return filePath;
  }
}
