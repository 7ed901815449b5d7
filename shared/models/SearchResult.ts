/**
 * Search Result Types
 * Vector search and Q&A response type definitions
 */
import type { RepoRecord } from './RepoRecord.js';

/** Raw hit from the vector index */
export interface IndexHit {
  /** Insertion position in the index (and the metadata table) */
  position: number;
  /** Euclidean distance to the query vector */
  distance: number;
}

/** A Record returned to the caller, annotated with its match quality */
export type SourceRecord = RepoRecord & {
  distance: number;
  similarityScore: number;
};

export interface QAResponse {
  answer: string;
  sources: SourceRecord[];
  /** true when retrieval succeeded but answer synthesis did not */
  degraded: boolean;
  executionTimeMs: number;
}
