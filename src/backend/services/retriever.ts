/**
 * Retriever Service
 *
 * Two interchangeable strategies for finding the passages that go into the
 * prompt:
 * - VectorRetriever: embeds the query and searches the chunk index
 * - KeywordRetriever: scores paragraphs by query-word occurrences, used when
 *   no embedding service is available or the index cannot be built
 */

import { DocumentChunk } from '../../shared/types';
import { DocumentIndexer, EmbeddingProvider, ScoredChunk } from './documentIndexer';
import { DocumentStore } from './documentStore';

export type RetrievalMode = 'vector' | 'keyword';

/**
 * Common contract of both strategies: the text block to inject into the prompt.
 */
export interface ContextRetriever {
  readonly mode: RetrievalMode;
  retrieveContext(query: string): Promise<string>;
}

export interface RetrieverConfig {
  /** Number of chunks returned by vector search */
  topK: number;
  /** Maximum characters of context handed to the prompt */
  contextCharBudget: number;
  /** Paragraphs kept per document in keyword mode */
  paragraphsPerDocument: number;
}

export const DEFAULT_RETRIEVER_CONFIG: RetrieverConfig = {
  topK: 3,
  contextCharBudget: 4000,
  paragraphsPerDocument: 2,
};

/**
 * Lower-cased distinct words of the query, stripped of surrounding punctuation.
 */
export function extractQueryWords(query: string): Set<string> {
  return new Set(
    query
      .toLowerCase()
      .split(/\s+/)
      .map((word) => word.replace(/^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu, ''))
      .filter((word) => word.length > 0)
  );
}

/**
 * Non-overlapping occurrences of `needle` in `haystack`.
 */
export function countOccurrences(haystack: string, needle: string): number {
  if (needle.length === 0) {
    return 0;
  }

  let count = 0;
  let position = haystack.indexOf(needle);
  while (position !== -1) {
    count++;
    position = haystack.indexOf(needle, position + needle.length);
  }
  return count;
}

/**
 * Keyword-overlap scoring over raw document text.
 *
 * Per document: split into paragraphs on blank lines, score each paragraph as
 * the summed occurrence count of the query words, keep the best
 * `paragraphsPerDocument` with a positive score (ties keep document order).
 * Selected paragraphs are joined across documents in iteration order and cut
 * to `contextCharBudget` characters.
 *
 * Never throws: a scoring failure yields an empty context.
 */
export function findRelevantContent(
  query: string,
  documents: ReadonlyMap<string, string>,
  config: Pick<RetrieverConfig, 'contextCharBudget' | 'paragraphsPerDocument'> = DEFAULT_RETRIEVER_CONFIG
): string {
  try {
    const queryWords = extractQueryWords(query);
    if (queryWords.size === 0) {
      return '';
    }

    const relevantParts: string[] = [];

    for (const content of documents.values()) {
      const scored = content
        .split('\n\n')
        .map((paragraph, position) => {
          const lowered = paragraph.toLowerCase();
          let score = 0;
          for (const word of queryWords) {
            score += countOccurrences(lowered, word);
          }
          return { paragraph, position, score };
        })
        .filter((candidate) => candidate.score > 0);

      scored.sort((a, b) => b.score - a.score || a.position - b.position);
      relevantParts.push(
        ...scored.slice(0, config.paragraphsPerDocument).map((candidate) => candidate.paragraph)
      );
    }

    return relevantParts.join('\n\n').slice(0, config.contextCharBudget);
  } catch (error) {
    console.error('Failed to score document paragraphs:', error);
    return '';
  }
}

/**
 * Renders retrieved chunks as labelled blocks.
 */
export function formatChunks(chunks: DocumentChunk[]): string {
  return chunks.map((chunk) => `[${chunk.documentId}]\n${chunk.content}`).join('\n\n');
}

export class KeywordRetriever implements ContextRetriever {
  readonly mode = 'keyword' as const;
  private readonly config: RetrieverConfig;

  constructor(
    private readonly documentStore: Pick<DocumentStore, 'loadOrRefresh'>,
    config: Partial<RetrieverConfig> = {}
  ) {
    this.config = { ...DEFAULT_RETRIEVER_CONFIG, ...config };
  }

  /**
   * Scores the documents that are present; a missing file only narrows the
   * context.
   *
   * @throws AssistantError NO_DOCUMENTS_LOADED when no document is available
   */
  async retrieveContext(query: string): Promise<string> {
    const documents = await this.documentStore.loadOrRefresh({ skipMissing: true });
    const texts = new Map(Array.from(documents, ([id, record]) => [id, record.text]));
    return findRelevantContent(query, texts, this.config);
  }
}

export class VectorRetriever implements ContextRetriever {
  readonly mode = 'vector' as const;
  private readonly config: RetrieverConfig;

  constructor(
    private readonly documentStore: Pick<DocumentStore, 'loadOrRefresh'>,
    private readonly indexer: Pick<DocumentIndexer, 'ensureIndex'>,
    private readonly embedder: EmbeddingProvider,
    config: Partial<RetrieverConfig> = {}
  ) {
    this.config = { ...DEFAULT_RETRIEVER_CONFIG, ...config };
  }

  /**
   * Refreshes the documents, rebuilds the index if it went stale, and returns
   * at most `k` chunks by similarity (ties in chunk order).
   *
   * @throws AssistantError MISSING_DOCUMENT, NO_DOCUMENTS_LOADED, INDEX_BUILD_FAILED
   */
  async search(query: string, k: number = this.config.topK): Promise<ScoredChunk[]> {
    const documents = await this.documentStore.loadOrRefresh();
    const index = await this.indexer.ensureIndex(documents);
    const queryEmbedding = await this.embedder.generateEmbedding(query);
    return index.search(queryEmbedding, k);
  }

  async retrieveContext(query: string): Promise<string> {
    const results = await this.search(query);
    return formatChunks(results.map((result) => result.chunk)).slice(0, this.config.contextCharBudget);
  }
}
