/**
 * Error rate of a single chunk
 */
export interface ChunkErrorRate {
  chunk_id: string; // "<chapter>/<chunk>"
  normalized_error_rate: number;
}

/**
 * Aggregated error rate of a chapter
 */
export interface ChapterErrorRate {
  chapter: string;
  aggregated_error_rate: number;
}

/**
 * Contents of the per-chunk distribution report
 */
export interface ChunkDistributionReport {
  summary_statistics: {
    total_chunks: number;
  };
  all_chunks: ChunkErrorRate[];
}

/**
 * How many items a percentile-derived threshold would flag
 */
export interface PercentileImpact {
  percentile: number;
  threshold: number;
  flaggedCount: number;
  totalCount: number;
}

/**
 * Entry of the removal manifest written by the purge
 */
export interface RemovalManifestEntry {
  chapter: string;
  chunk: string;
  wav_path: string;
  error_rate: number;
  threshold: number;
}
