/**
 * Document Indexer Service
 *
 * Builds immutable index snapshots over the chunks of every loaded document
 * and decides when a snapshot must be rebuilt.
 *
 * A snapshot is valid while:
 * - it is younger than the cache duration (12 hours by default), and
 * - every document it was built from is still present with the same
 *   fingerprint, and no new document appeared.
 *
 * A rebuild chunks and embeds everything from scratch into a new snapshot and
 * swaps it in with a single assignment; if any step fails, nothing is
 * swapped. The retired snapshot refuses further searches.
 */

import { DocumentChunk, DocumentRecord } from '../../shared/types';
import { ChunkingConfig, DEFAULT_CHUNKING_CONFIG, DocumentChunker } from './documentChunker';
import { AssistantError, AssistantErrorCode } from './errors';
import { IVectorStore, chunkToVectorEntry, createVectorStore } from './vectorStore';

/**
 * Embedding collaborator. Swappable: anything that turns text into a vector.
 */
export interface EmbeddingProvider {
    generateEmbedding(text: string): Promise<number[]>;
}

export interface IndexerConfig extends ChunkingConfig {
    /** Maximum age of a snapshot in milliseconds */
    cacheDurationMs: number;
    /**
     * When a rebuild fails and a previous snapshot exists, keep serving the
     * previous snapshot instead of failing.
     */
    tolerateStaleIndex: boolean;
}

export const DEFAULT_INDEXER_CONFIG: IndexerConfig = {
    ...DEFAULT_CHUNKING_CONFIG,
    cacheDurationMs: 12 * 60 * 60 * 1000,
    tolerateStaleIndex: false,
};

export type StalenessReason =
    | 'no-index'
    | 'expired'
    | 'missing-document'
    | 'fingerprint-changed'
    | 'document-added';

/**
 * A chunk returned from a search, with its similarity score.
 */
export interface ScoredChunk {
    chunk: DocumentChunk;
    score: number;
}

export interface IndexStatus {
    lastBuiltAt: Date | null;
    trackedDocuments: string[];
    chunkCount: number;
    indexInitialized: boolean;
    cacheValid: boolean;
    staleReason: StalenessReason | null;
}

interface DocumentIndexInit {
    builtAt: Date;
    cacheDurationMs: number;
    fingerprints: Map<string, string>;
    chunks: DocumentChunk[];
    vectorStore: IVectorStore;
    staleTolerated: boolean;
    now: () => Date;
}

/**
 * Logical snapshot over all chunks, built at one point in time.
 */
export class DocumentIndex {
    readonly builtAt: Date;
    private readonly cacheDurationMs: number;
    private readonly fingerprints: Map<string, string>;
    private readonly chunks: DocumentChunk[];
    private readonly chunksById: Map<string, DocumentChunk>;
    private readonly vectorStore: IVectorStore;
    private readonly staleTolerated: boolean;
    private readonly now: () => Date;
    private retired = false;

    constructor(init: DocumentIndexInit) {
        this.builtAt = init.builtAt;
        this.cacheDurationMs = init.cacheDurationMs;
        this.fingerprints = new Map(init.fingerprints);
        this.chunks = [...init.chunks];
        this.chunksById = new Map(this.chunks.map((chunk) => [chunk.id, chunk]));
        this.vectorStore = init.vectorStore;
        this.staleTolerated = init.staleTolerated;
        this.now = init.now;
    }

    /**
     * Validates this snapshot against the current document fingerprints
     * (null marks a missing document). Returns null when it is still valid.
     */
    stalenessAgainst(current: ReadonlyMap<string, string | null>): StalenessReason | null {
        if (this.isExpired()) {
            return 'expired';
        }

        for (const [documentId, fingerprint] of this.fingerprints) {
            const currentFingerprint = current.get(documentId);
            if (currentFingerprint === undefined || currentFingerprint === null) {
                return 'missing-document';
            }
            if (currentFingerprint !== fingerprint) {
                return 'fingerprint-changed';
            }
        }

        for (const [documentId, fingerprint] of current) {
            if (fingerprint !== null && !this.fingerprints.has(documentId)) {
                return 'document-added';
            }
        }

        return null;
    }

    isExpired(): boolean {
        return this.now().getTime() - this.builtAt.getTime() > this.cacheDurationMs;
    }

    /**
     * True once a newer snapshot replaced this one, or once it outlived the
     * cache duration.
     */
    isStale(): boolean {
        return this.retired || this.isExpired();
    }

    /**
     * Top-k chunks by similarity, ties broken by chunk order.
     *
     * @throws AssistantError STALE_INDEX when the snapshot must be rebuilt first
     */
    search(queryEmbedding: number[], k: number): ScoredChunk[] {
        if (!this.staleTolerated && this.isStale()) {
            throw new AssistantError(
                'The document index is stale and must be rebuilt before searching',
                AssistantErrorCode.STALE_INDEX
            );
        }

        const results: ScoredChunk[] = [];
        for (const { entry, score } of this.vectorStore.search(queryEmbedding, k)) {
            const chunk = this.chunksById.get(entry.id);
            if (chunk) {
                results.push({ chunk, score });
            }
        }
        return results;
    }

    getChunks(): DocumentChunk[] {
        return [...this.chunks];
    }

    getFingerprints(): Map<string, string> {
        return new Map(this.fingerprints);
    }

    /** @internal Called by the indexer when a newer snapshot replaces this one. */
    retire(): void {
        this.retired = true;
    }
}

export class DocumentIndexer {
    private readonly config: IndexerConfig;
    private readonly chunker: DocumentChunker;
    private current: DocumentIndex | null = null;
    /** In-flight rebuild, keyed by the fingerprints it indexes */
    private building: { key: string; promise: Promise<DocumentIndex> } | null = null;

    constructor(
        embedder: EmbeddingProvider,
        config: Partial<IndexerConfig> = {},
        private readonly now: () => Date = () => new Date()
    ) {
        this.config = { ...DEFAULT_INDEXER_CONFIG, ...config };
        this.chunker = new DocumentChunker(embedder, {
            chunkSize: this.config.chunkSize,
            chunkOverlap: this.config.chunkOverlap,
        });
    }

    /**
     * Why the current snapshot cannot be used for these fingerprints, or null
     * if it can.
     */
    checkStaleness(fingerprints: ReadonlyMap<string, string | null>): StalenessReason | null {
        if (!this.current) {
            return 'no-index';
        }
        return this.current.stalenessAgainst(fingerprints);
    }

    /**
     * Returns a snapshot valid for `documents`, rebuilding it when needed.
     * Concurrent callers with the same fingerprints share one in-flight
     * rebuild; a caller with other fingerprints waits for it to settle and
     * then checks again.
     *
     * @throws AssistantError INDEX_BUILD_FAILED
     */
    async ensureIndex(documents: Map<string, DocumentRecord>): Promise<DocumentIndex> {
        const fingerprints = fingerprintsOf(documents);
        const reason = this.checkStaleness(fingerprints);
        if (reason === null && this.current) {
            return this.current;
        }

        const key = fingerprintKey(fingerprints);
        if (this.building) {
            if (this.building.key === key) {
                return this.building.promise;
            }
            // Its outcome belongs to the callers that share it
            await Promise.allSettled([this.building.promise]);
            return this.ensureIndex(documents);
        }

        const building = {
            key,
            promise: this.rebuild(documents, reason ?? 'no-index').finally(() => {
                if (this.building === building) {
                    this.building = null;
                }
            }),
        };
        this.building = building;
        return building.promise;
    }

    /**
     * Latest snapshot, if any. May be stale; searching it enforces validity.
     */
    getCurrentIndex(): DocumentIndex | null {
        return this.current;
    }

    getStatus(fingerprints?: ReadonlyMap<string, string | null>): IndexStatus {
        const index = this.current;
        const staleReason = fingerprints
            ? this.checkStaleness(fingerprints)
            : index && index.isExpired()
                ? 'expired'
                : index
                    ? null
                    : 'no-index';

        return {
            lastBuiltAt: index ? index.builtAt : null,
            trackedDocuments: index ? Array.from(index.getFingerprints().keys()) : [],
            chunkCount: index ? index.getChunks().length : 0,
            indexInitialized: index !== null,
            cacheValid: staleReason === null,
            staleReason,
        };
    }

    private async rebuild(
        documents: Map<string, DocumentRecord>,
        reason: StalenessReason
    ): Promise<DocumentIndex> {
        console.log(`Building document index (${reason}) from ${documents.size} documents`);

        try {
            const chunks: DocumentChunk[] = [];
            for (const record of documents.values()) {
                chunks.push(...(await this.chunker.chunkDocument(record)));
            }

            const vectorStore = createVectorStore();
            chunks.forEach((chunk, order) => vectorStore.add(chunkToVectorEntry(chunk, order)));

            const index = new DocumentIndex({
                builtAt: this.now(),
                cacheDurationMs: this.config.cacheDurationMs,
                fingerprints: fingerprintsOf(documents),
                chunks,
                vectorStore,
                staleTolerated: this.config.tolerateStaleIndex,
                now: this.now,
            });

            const previous = this.current;
            this.current = index;
            previous?.retire();

            console.log(`Document index built: ${chunks.length} chunks`);
            return index;
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);

            if (this.config.tolerateStaleIndex && this.current) {
                console.warn(`Index rebuild failed, serving previous index: ${message}`);
                return this.current;
            }

            throw new AssistantError(
                `Failed to build document index: ${message}`,
                AssistantErrorCode.INDEX_BUILD_FAILED,
                error instanceof Error ? error : undefined
            );
        }
    }
}

function fingerprintsOf(documents: Map<string, DocumentRecord>): Map<string, string> {
    return new Map(Array.from(documents, ([id, record]) => [id, record.fingerprint]));
}

function fingerprintKey(fingerprints: Map<string, string>): string {
    return Array.from(fingerprints, ([id, fingerprint]) => `${id}=${fingerprint}`).join('\n');
}

export function createDocumentIndexer(
    embedder: EmbeddingProvider,
    config?: Partial<IndexerConfig>
): DocumentIndexer {
    return new DocumentIndexer(embedder, config);
}
