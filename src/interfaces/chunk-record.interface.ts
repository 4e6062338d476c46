/**
 * Identifies one chunk record in the result store
 */
export interface ChunkKey {
  chapter: string; // <BookAbbreviation><ChapterNumber>, e.g. "Gen1", "1Kor13"
  chunk: string; // Ordinal within the chapter, e.g. "001"
}

/**
 * One scored unit of narrated text, as persisted in audio-check/<chapter>/<chunk>.json
 */
export interface ChunkRecord extends ChunkKey {
  levenshtein_distance: number; // May be the sentinel (999) once patched
  original_text: string; // Ground truth, trailing whitespace stripped
  transcribed_text: string; // Oracle output, empty when transcription failed
}

/**
 * A chunk record together with the file it was read from
 */
export interface StoredChunkRecord {
  filePath: string;
  record: ChunkRecord;
}
