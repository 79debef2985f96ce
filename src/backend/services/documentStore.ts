/**
 * Document Store Service
 *
 * Loads the fixed set of reference documents and keeps them as immutable
 * DocumentRecords. Every refresh re-reads the raw bytes and recomputes the
 * fingerprint; a document is converted to text again only when its
 * fingerprint drifted since the last successful conversion.
 *
 * Failure modes:
 * - A configured file is missing: the whole refresh fails (MISSING_DOCUMENT),
 *   unless the caller asked to skip missing files
 * - A conversion fails: the document is skipped and the failure logged; it is
 *   not converted again until its bytes change
 * - Nothing could be converted: the refresh fails (NO_DOCUMENTS_LOADED)
 */

import { createHash } from 'crypto';
import { promises as fs } from 'fs';
import { DocumentRecord, DocumentSource } from '../../shared/types';
import { DocumentConverter } from './documentParser';
import { AssistantError, AssistantErrorCode, isAssistantError } from './errors';

export interface DocumentStoreConfig {
    documents: DocumentSource[];
}

export interface LoadOptions {
    /** Leave missing files out of the snapshot instead of failing */
    skipMissing?: boolean;
}

export interface DocumentStoreStatus {
    lastLoadedAt: Date | null;
    documents: Array<{
        id: string;
        path: string;
        fingerprint: string;
        processedAt: Date;
    }>;
}

/**
 * MD5 hex digest of the raw bytes. Used for change detection only.
 */
export function calculateFingerprint(bytes: Buffer): string {
    return createHash('md5').update(bytes).digest('hex');
}

function isMissingFileError(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class DocumentStore {
    private readonly sources: DocumentSource[];
    private readonly records: Map<string, DocumentRecord> = new Map();
    /** Fingerprint of the bytes whose last conversion failed, by document */
    private readonly failedConversions: Map<string, string> = new Map();
    private lastLoadedAt: Date | null = null;

    constructor(
        private readonly converter: DocumentConverter,
        config: DocumentStoreConfig,
        private readonly now: () => Date = () => new Date()
    ) {
        this.sources = config.documents.map((source) => ({ ...source }));
    }

    /**
     * Returns the current snapshot of every convertible document, keyed by
     * document identifier, in configuration order.
     *
     * @throws AssistantError MISSING_DOCUMENT or NO_DOCUMENTS_LOADED
     */
    async loadOrRefresh(options: LoadOptions = {}): Promise<Map<string, DocumentRecord>> {
        const snapshot = new Map<string, DocumentRecord>();

        for (const source of this.sources) {
            let bytes: Buffer;
            try {
                bytes = await this.readSource(source);
            } catch (error) {
                if (options.skipMissing && isAssistantError(error, AssistantErrorCode.MISSING_DOCUMENT)) {
                    console.warn(error.message);
                    continue;
                }
                throw error;
            }
            const fingerprint = calculateFingerprint(bytes);

            const cached = this.records.get(source.id);
            if (cached && cached.fingerprint === fingerprint) {
                snapshot.set(source.id, cached);
                continue;
            }
            if (this.failedConversions.get(source.id) === fingerprint) {
                continue;
            }

            try {
                console.log(`Converting document: ${source.id} (${source.path})`);
                const text = await this.converter.convert(source.path);
                const record: DocumentRecord = {
                    id: source.id,
                    sourcePath: source.path,
                    text,
                    fingerprint,
                    processedAt: this.now(),
                };
                this.records.set(source.id, record);
                this.failedConversions.delete(source.id);
                snapshot.set(source.id, record);
            } catch (error) {
                console.error(`Failed to convert document ${source.id}:`, error);
                this.records.delete(source.id);
                this.failedConversions.set(source.id, fingerprint);
            }
        }

        if (snapshot.size === 0) {
            throw new AssistantError(
                'No reference document could be loaded',
                AssistantErrorCode.NO_DOCUMENTS_LOADED
            );
        }

        this.lastLoadedAt = this.now();
        return snapshot;
    }

    /**
     * Current fingerprint of every configured document, without converting.
     * Missing files map to null.
     */
    async fingerprints(): Promise<Map<string, string | null>> {
        const result = new Map<string, string | null>();
        for (const source of this.sources) {
            try {
                result.set(source.id, calculateFingerprint(await fs.readFile(source.path)));
            } catch (error) {
                if (!isMissingFileError(error)) {
                    throw error;
                }
                result.set(source.id, null);
            }
        }
        return result;
    }

    getStatus(): DocumentStoreStatus {
        return {
            lastLoadedAt: this.lastLoadedAt,
            documents: Array.from(this.records.values()).map((record) => ({
                id: record.id,
                path: record.sourcePath,
                fingerprint: record.fingerprint,
                processedAt: record.processedAt,
            })),
        };
    }

    private async readSource(source: DocumentSource): Promise<Buffer> {
        try {
            return await fs.readFile(source.path);
        } catch (error) {
            if (isMissingFileError(error)) {
                throw new AssistantError(
                    `Document not found: ${source.id} (${source.path})`,
                    AssistantErrorCode.MISSING_DOCUMENT,
                    error instanceof Error ? error : undefined,
                    source.id
                );
            }
            throw error;
        }
    }
}

export function createDocumentStore(
    converter: DocumentConverter,
    config: DocumentStoreConfig
): DocumentStore {
    return new DocumentStore(converter, config);
}
