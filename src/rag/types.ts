/**
 * RAG System Types
 *
 * Defines the documents, chunks and results that flow through the
 * question-answering pipeline.
 */

/**
 * Scalar values allowed in document metadata.
 */
export type MetadataValue = string | number | boolean;

/**
 * Metadata attached to a loaded document.
 */
export interface DocumentMetadata {
  /** Identifier of the originating file */
  source: string;
  [key: string]: MetadataValue;
}

/**
 * A loaded document. Immutable once created.
 */
export interface Document {
  content: string;
  metadata: DocumentMetadata;
}

/**
 * Metadata of a chunk: the document's metadata plus its position.
 */
export interface ChunkMetadata extends DocumentMetadata {
  /** Position of the chunk within its document (0-indexed) */
  chunkIndex: number;
  /** Offset of the chunk within its document, in code points */
  startIndex: number;
}

/**
 * A bounded-length segment of a document, ready for embedding.
 */
export interface Chunk {
  /** Stable identifier (hash of source, index and content) */
  id: string;
  content: string;
  metadata: ChunkMetadata;
}

/**
 * A chunk returned by similarity search.
 */
export interface RetrievedDocument {
  chunk: Chunk;
  /** Similarity score under the index metric (higher is more similar) */
  score: number;
  /** Position in the result list (1-indexed) */
  rank: number;
}

/**
 * Result of a complete (non-streaming) query.
 */
export interface QueryResult {
  answer: string;
  /** Wall-clock time from retrieval start to generation end */
  latencySeconds: number;
  documents: RetrievedDocument[];
}

/**
 * Comparison operators accepted in a metadata filter.
 */
export interface FieldCondition {
  $eq?: MetadataValue;
  $ne?: MetadataValue;
  $in?: Array<string | number>;
  $nin?: Array<string | number>;
  $gt?: number;
  $gte?: number;
  $lt?: number;
  $lte?: number;
}

/**
 * Metadata filter: every field must satisfy its condition.
 * A bare value means equality.
 */
export type MetadataFilter = Record<string, MetadataValue | FieldCondition>;

/**
 * Distance metrics understood by index services.
 */
export type DistanceMetric = 'cosine' | 'euclidean' | 'dotproduct';

/**
 * Summary returned by a successful ingestion.
 */
export interface IngestReport {
  /** Ids of every chunk stored, in upsert order */
  upserted: string[];
  /** Number of batches processed */
  batches: number;
  durationMs: number;
}

/**
 * Progress callback for ingestion, called after each stored batch.
 */
export type IngestProgressCallback = (batch: number, totalBatches: number, stored: number) => void;
