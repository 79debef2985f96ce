/**
 * Vector Store Service
 *
 * In-memory vector store for semantic similarity search over document chunks.
 *
 * HOW IT WORKS:
 * 1. Every chunk is stored with its embedding vector
 * 2. The query is embedded with the same model
 * 3. Every entry is scored by cosine similarity against the query vector
 * 4. Results are ranked by score, ties broken by original chunk order
 *
 * Exact brute-force search: the reference set is a handful of documents.
 */

import { VectorEntry, DocumentChunk } from '../../shared/types';

/**
 * Result of a similarity search.
 */
export interface SearchResult {
  entry: VectorEntry;
  score: number; // Cosine similarity score, higher = more similar
}

export interface IVectorStore {
  add(entry: VectorEntry): void;
  addMany(entries: VectorEntry[]): void;
  search(queryEmbedding: number[], limit: number): SearchResult[];
  get(id: string): VectorEntry | undefined;
  size(): number;
  clear(): void;
}

/**
 * Cosine similarity between two vectors.
 *
 * Formula: cos(θ) = (A · B) / (||A|| × ||B||)
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vector dimension mismatch: ${a.length} vs ${b.length}`);
  }

  if (a.length === 0) {
    return 0;
  }

  let dotProduct = 0;
  let magnitudeA = 0;
  let magnitudeB = 0;

  for (let i = 0; i < a.length; i++) {
    const aVal = a[i] ?? 0;
    const bVal = b[i] ?? 0;
    dotProduct += aVal * bVal;
    magnitudeA += aVal * aVal;
    magnitudeB += bVal * bVal;
  }

  const magnitude = Math.sqrt(magnitudeA) * Math.sqrt(magnitudeB);

  // Zero vectors have no direction
  if (magnitude === 0) {
    return 0;
  }

  return dotProduct / magnitude;
}

export class InMemoryVectorStore implements IVectorStore {
  private entries: Map<string, VectorEntry> = new Map();

  add(entry: VectorEntry): void {
    this.entries.set(entry.id, entry);
  }

  addMany(entries: VectorEntry[]): void {
    for (const entry of entries) {
      this.add(entry);
    }
  }

  /**
   * Search for entries most similar to the query embedding.
   *
   * @param queryEmbedding - The embedding vector to search for
   * @param limit - Maximum number of results to return
   * @returns Results sorted by similarity (highest first), then by entry order
   */
  search(queryEmbedding: number[], limit: number): SearchResult[] {
    if (limit <= 0) {
      return [];
    }

    const results: SearchResult[] = [];

    for (const entry of this.entries.values()) {
      const score = cosineSimilarity(queryEmbedding, entry.embedding);
      results.push({ entry, score });
    }

    results.sort((a, b) => b.score - a.score || a.entry.order - b.entry.order);

    return results.slice(0, limit);
  }

  get(id: string): VectorEntry | undefined {
    return this.entries.get(id);
  }

  size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}

/**
 * Convert a DocumentChunk to the VectorEntry stored in the index.
 *
 * @param order - Position of the chunk across the whole index
 */
export function chunkToVectorEntry(chunk: DocumentChunk, order: number): VectorEntry {
  return {
    id: chunk.id,
    documentId: chunk.documentId,
    order,
    content: chunk.content,
    embedding: chunk.embedding,
  };
}

export function createVectorStore(): IVectorStore {
  return new InMemoryVectorStore();
}
