/**
 * Document Indexer Tests
 *
 * Snapshot reuse, staleness detection, atomic rebuilds and ranking.
 */

import { DocumentIndexer } from '../documentIndexer';
import { AssistantError, AssistantErrorCode } from '../errors';
import { DocumentRecord } from '../../../shared/types';

const HOUR = 60 * 60 * 1000;

function countChar(text: string, char: string): number {
    return text.split(char).length - 1;
}

/** Two-dimensional embedding: occurrences of "a" and of "b". */
function embed(text: string): number[] {
    return [countChar(text, 'a'), countChar(text, 'b')];
}

function record(id: string, text: string, fingerprint: string = `fp-${id}`): DocumentRecord {
    return {
        id,
        sourcePath: `/docs/${id}.pdf`,
        text,
        fingerprint,
        processedAt: new Date('2026-03-02T10:00:00.000Z'),
    };
}

function documents(...records: DocumentRecord[]): Map<string, DocumentRecord> {
    return new Map(records.map((item) => [item.id, item]));
}

describe('DocumentIndexer', () => {
    let current: Date;
    let generateEmbedding: jest.Mock<Promise<number[]>, [string]>;
    let indexer: DocumentIndexer;

    beforeEach(() => {
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
        jest.spyOn(console, 'warn').mockImplementation(() => undefined);

        current = new Date('2026-03-02T10:00:00.000Z');
        generateEmbedding = jest.fn((text: string) => Promise.resolve(embed(text)));
        indexer = new DocumentIndexer({ generateEmbedding }, { chunkSize: 100, chunkOverlap: 10 }, () => current);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    describe('ensureIndex', () => {
        it('should reuse the snapshot for unchanged documents within the cache window', async () => {
            const docs = documents(record('manual', 'aaa'), record('sobre', 'bbb'));

            const first = await indexer.ensureIndex(docs);
            current = new Date(current.getTime() + 11 * HOUR);
            const second = await indexer.ensureIndex(docs);

            expect(second).toBe(first);
            expect(generateEmbedding).toHaveBeenCalledTimes(2);
        });

        it('should rebuild when a fingerprint changes, whatever the remaining cache time', async () => {
            const first = await indexer.ensureIndex(documents(record('manual', 'aaa')));
            const changed = documents(record('manual', 'aab', 'fp-manual-2'));

            expect(indexer.checkStaleness(new Map([['manual', 'fp-manual-2']]))).toBe('fingerprint-changed');

            const second = await indexer.ensureIndex(changed);

            expect(second).not.toBe(first);
            expect(second.getFingerprints().get('manual')).toBe('fp-manual-2');
            expect(second.getChunks()[0]?.content).toBe('aab');
        });

        it('should rebuild once the cache duration has passed', async () => {
            const docs = documents(record('manual', 'aaa'));
            const first = await indexer.ensureIndex(docs);

            current = new Date(current.getTime() + 12 * HOUR + 1);

            expect(first.isStale()).toBe(true);
            expect(indexer.checkStaleness(new Map([['manual', 'fp-manual']]))).toBe('expired');
            expect(await indexer.ensureIndex(docs)).not.toBe(first);
        });

        it('should share one build between concurrent callers', async () => {
            const docs = documents(record('manual', 'aaa'), record('sobre', 'bbb'));

            const [first, second] = await Promise.all([indexer.ensureIndex(docs), indexer.ensureIndex(docs)]);

            expect(second).toBe(first);
            expect(generateEmbedding).toHaveBeenCalledTimes(2);
        });

        it('should not hand a concurrent caller with newer documents the build in flight', async () => {
            let release: () => void = () => undefined;
            const gate = new Promise<void>((resolve) => {
                release = resolve;
            });
            generateEmbedding.mockImplementation(async (text: string) => {
                await gate;
                return embed(text);
            });

            const pending = indexer.ensureIndex(documents(record('manual', 'aaa')));
            const newer = indexer.ensureIndex(documents(record('manual', 'aab', 'fp-manual-2')));
            release();
            const [first, second] = await Promise.all([pending, newer]);

            expect(first.getFingerprints().get('manual')).toBe('fp-manual');
            expect(second).not.toBe(first);
            expect(second.getFingerprints().get('manual')).toBe('fp-manual-2');
            expect(second.getChunks()[0]?.content).toBe('aab');
            expect(indexer.getCurrentIndex()).toBe(second);
            expect(() => first.search([1, 0], 1)).toThrow(AssistantError);
        });

        it('should leave the previous snapshot in place when a rebuild fails', async () => {
            const first = await indexer.ensureIndex(documents(record('manual', 'aaa')));
            generateEmbedding.mockRejectedValueOnce(new Error('embedding service down'));

            const error = await indexer
                .ensureIndex(documents(record('manual', 'bbb', 'fp-manual-2')))
                .catch((caught: unknown) => caught);

            expect(error).toBeInstanceOf(AssistantError);
            expect(error).toMatchObject({ code: AssistantErrorCode.INDEX_BUILD_FAILED });
            expect(indexer.getCurrentIndex()).toBe(first);
            expect(first.isStale()).toBe(false);
            expect(first.getChunks()[0]?.content).toBe('aaa');
        });

        it('should serve the previous snapshot after a failed rebuild when stale use is tolerated', async () => {
            const tolerant = new DocumentIndexer(
                { generateEmbedding },
                { chunkSize: 100, chunkOverlap: 10, tolerateStaleIndex: true },
                () => current
            );
            const first = await tolerant.ensureIndex(documents(record('manual', 'aaa')));
            generateEmbedding.mockRejectedValueOnce(new Error('embedding service down'));

            const served = await tolerant.ensureIndex(documents(record('manual', 'bbb', 'fp-manual-2')));

            expect(served).toBe(first);
            expect(console.warn).toHaveBeenCalled();
        });
    });

    describe('checkStaleness', () => {
        it('should report a missing index before the first build', () => {
            expect(indexer.checkStaleness(new Map())).toBe('no-index');
        });

        it('should report a tracked document that disappeared', async () => {
            await indexer.ensureIndex(documents(record('manual', 'aaa')));

            expect(indexer.checkStaleness(new Map([['manual', null]]))).toBe('missing-document');
        });

        it('should report a document that was not indexed yet', async () => {
            await indexer.ensureIndex(documents(record('manual', 'aaa')));

            expect(
                indexer.checkStaleness(
                    new Map([
                        ['manual', 'fp-manual'],
                        ['sobre', 'fp-sobre'],
                    ])
                )
            ).toBe('document-added');
        });

        it('should accept unchanged fingerprints', async () => {
            await indexer.ensureIndex(documents(record('manual', 'aaa')));

            expect(indexer.checkStaleness(new Map([['manual', 'fp-manual']]))).toBeNull();
        });
    });

    describe('DocumentIndex.search', () => {
        it('should rank chunks by similarity', async () => {
            const index = await indexer.ensureIndex(
                documents(record('manual', 'aaa'), record('sobre', 'bbb'), record('boas_praticas', 'aab'))
            );

            const results = index.search([1, 0], 2);

            expect(results.map((result) => result.chunk.documentId)).toEqual(['manual', 'boas_praticas']);
            expect(results[0]?.score).toBeCloseTo(1);
            expect(results[1]?.score).toBeCloseTo(2 / Math.sqrt(5));
        });

        it('should break ties by chunk order', async () => {
            const index = await indexer.ensureIndex(
                documents(record('sobre', 'aaa'), record('manual', 'aaa'))
            );

            expect(index.search([1, 0], 2).map((result) => result.chunk.id)).toEqual(['sobre:0', 'manual:0']);
        });

        it('should refuse to search a replaced snapshot', async () => {
            const first = await indexer.ensureIndex(documents(record('manual', 'aaa')));
            await indexer.ensureIndex(documents(record('manual', 'aab', 'fp-manual-2')));

            let error: unknown;
            try {
                first.search([1, 0], 1);
            } catch (caught) {
                error = caught;
            }

            expect(error).toBeInstanceOf(AssistantError);
            expect(error).toMatchObject({ code: AssistantErrorCode.STALE_INDEX });
        });

        it('should refuse to search an expired snapshot', async () => {
            const index = await indexer.ensureIndex(documents(record('manual', 'aaa')));
            current = new Date(current.getTime() + 13 * HOUR);

            expect(() => index.search([1, 0], 1)).toThrow(AssistantError);
        });
    });

    describe('getStatus', () => {
        it('should describe the current snapshot', async () => {
            expect(indexer.getStatus()).toMatchObject({ indexInitialized: false, staleReason: 'no-index' });

            await indexer.ensureIndex(documents(record('manual', 'aaa'), record('sobre', 'bbb')));

            expect(indexer.getStatus()).toEqual({
                lastBuiltAt: current,
                trackedDocuments: ['manual', 'sobre'],
                chunkCount: 2,
                indexInitialized: true,
                cacheValid: true,
                staleReason: null,
            });
        });
    });
});
