/**
 * Document Chunker Service
 *
 * Splits document text into overlapping fixed-size spans and embeds them.
 *
 * Sliding window:
 * 1. Take at most chunkSize characters starting at `start`
 * 2. Pull the end back to a paragraph, sentence or word boundary when one
 *    sits in the second half of the window
 * 3. Start the next span exactly chunkOverlap characters before that end
 *
 * Consecutive spans of a document therefore always share chunkOverlap
 * characters; only the final span ends without a successor.
 */

import { DocumentChunk, DocumentRecord } from '../../shared/types';
import type { EmbeddingProvider } from './documentIndexer';

/**
 * Configuration for the chunking process.
 */
export interface ChunkingConfig {
  /** Maximum size of each chunk in characters */
  chunkSize: number;
  /** Number of characters shared by consecutive chunks */
  chunkOverlap: number;
}

export const DEFAULT_CHUNKING_CONFIG: ChunkingConfig = {
  chunkSize: 1000,
  chunkOverlap: 200,
};

/**
 * Result of chunking without embeddings.
 */
export interface TextChunk {
  content: string;
  chunkIndex: number;
  start: number;
  end: number;
}

export function validateChunkingConfig(config: ChunkingConfig): void {
  const { chunkSize, chunkOverlap } = config;
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}`);
  }
  if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0 || chunkOverlap >= chunkSize) {
    throw new RangeError(
      `chunkOverlap must be an integer in [0, chunkSize), got ${chunkOverlap} for chunkSize ${chunkSize}`
    );
  }
}

export function splitIntoChunks(
  text: string,
  config: ChunkingConfig = DEFAULT_CHUNKING_CONFIG
): TextChunk[] {
  validateChunkingConfig(config);
  const { chunkSize, chunkOverlap } = config;

  if (!text || text.trim().length === 0) {
    return [];
  }

  const chunks: TextChunk[] = [];
  let start = 0;

  for (;;) {
    let end = Math.min(start + chunkSize, text.length);

    if (end < text.length) {
      end = findNaturalBreak(text, start, end, chunkOverlap);
    }

    chunks.push({
      content: text.slice(start, end),
      chunkIndex: chunks.length,
      start,
      end,
    });

    if (end >= text.length) {
      break;
    }
    start = end - chunkOverlap;
  }

  return chunks;
}

/**
 * Find a natural break point inside [start, targetEnd].
 *
 * Preference order:
 * 1. Paragraph break (double newline)
 * 2. Sentence end (. ! ? followed by a capital letter)
 * 3. Word boundary (space)
 * 4. targetEnd
 *
 * A candidate is only taken if the span stays longer than the overlap, so
 * the window always moves forward.
 */
function findNaturalBreak(
  text: string,
  start: number,
  targetEnd: number,
  overlap: number
): number {
  const searchWindow = text.slice(start, targetEnd);
  const minimum = (ratio: number) =>
    Math.max(overlap + 1, Math.floor(searchWindow.length * ratio));

  const paragraphBreak = searchWindow.lastIndexOf('\n\n');
  if (paragraphBreak !== -1 && paragraphBreak + 2 >= minimum(0.5)) {
    return start + paragraphBreak + 2;
  }

  let sentenceEnd = -1;
  for (const match of searchWindow.matchAll(/[.!?]\s+(?=[A-ZÀ-Ý])/g)) {
    sentenceEnd = (match.index ?? 0) + match[0].length;
  }
  if (sentenceEnd !== -1 && sentenceEnd >= minimum(0.5)) {
    return start + sentenceEnd;
  }

  const lastSpace = searchWindow.lastIndexOf(' ');
  if (lastSpace !== -1 && lastSpace + 1 >= minimum(0.7)) {
    return start + lastSpace + 1;
  }

  return targetEnd;
}

/**
 * Chunks a document record and embeds every chunk.
 */
export class DocumentChunker {
  private readonly embedder: EmbeddingProvider;
  private readonly config: ChunkingConfig;

  constructor(embedder: EmbeddingProvider, config: Partial<ChunkingConfig> = {}) {
    this.embedder = embedder;
    this.config = { ...DEFAULT_CHUNKING_CONFIG, ...config };
    validateChunkingConfig(this.config);
  }

  /**
   * Chunk a document and generate embeddings for each chunk, in order.
   */
  async chunkDocument(record: DocumentRecord): Promise<DocumentChunk[]> {
    const documentChunks: DocumentChunk[] = [];

    for (const textChunk of this.chunkDocumentWithoutEmbeddings(record)) {
      const embedding = await this.embedder.generateEmbedding(textChunk.content);

      documentChunks.push({
        id: `${record.id}:${textChunk.chunkIndex}`,
        documentId: record.id,
        content: textChunk.content,
        start: textChunk.start,
        end: textChunk.end,
        embedding,
        metadata: {
          sourceType: record.id,
          fingerprint: record.fingerprint,
          processedAt: record.processedAt,
          chunkIndex: textChunk.chunkIndex,
        },
      });
    }

    return documentChunks;
  }

  /**
   * Chunk a document without generating embeddings.
   */
  chunkDocumentWithoutEmbeddings(record: DocumentRecord): TextChunk[] {
    return splitIntoChunks(record.text, this.config);
  }
}
