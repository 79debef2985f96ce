/**
 * Application configuration
 *
 * Every tunable comes from the environment (a .env file is read on start-up)
 * and falls back to the component defaults. Malformed numeric values are
 * ignored rather than fatal; the defaults apply instead.
 */

import dotenv from 'dotenv';
import path from 'path';
import { DocumentSource, GenerationOptions } from '../shared/types';
import { DEFAULT_OLLAMA_CONFIG, OllamaClientConfig } from './clients/ollamaClient';
import { DEFAULT_INDEXER_CONFIG, IndexerConfig } from './services/documentIndexer';
import { DEFAULT_PROMPT_COMPOSER_CONFIG } from './services/promptComposer';
import { DEFAULT_RETRIEVER_CONFIG, RetrievalMode, RetrieverConfig } from './services/retriever';
import { DEFAULT_HISTORY_LIMIT } from './services/sessionContext';

export interface AppConfig {
    port: number;
    corsOrigin: string;
    ollama: OllamaClientConfig;
    documentsDir: string;
    documents: DocumentSource[];
    retrievalMode: RetrievalMode;
    indexer: IndexerConfig;
    retriever: RetrieverConfig;
    /** Default number of entries returned by the history endpoint */
    historyLimit: number;
    generation: GenerationOptions;
    assistantName: string;
}

/**
 * Reference documents shipped with a deployment, by identifier.
 */
export const DEFAULT_DOCUMENT_FILES: Record<string, string> = {
    manual: 'manual.pdf',
    boas_praticas: 'boas_praticas.pdf',
    sobre: 'sobre.pdf',
};

/**
 * Reads `.env` from the working directory into process.env. Variables
 * already set in the environment win.
 */
export function loadEnvFile(): void {
    dotenv.config();
}

function readString(env: NodeJS.ProcessEnv, key: string): string | undefined {
    const value = env[key]?.trim();
    return value ? value : undefined;
}

function readInteger(env: NodeJS.ProcessEnv, key: string, fallback: number, min: number = 0): number {
    const raw = readString(env, key);
    if (raw === undefined) {
        return fallback;
    }
    const n = Number(raw);
    return Number.isInteger(n) && n >= min ? n : fallback;
}

function readNumber(env: NodeJS.ProcessEnv, key: string, fallback?: number): number | undefined {
    const raw = readString(env, key);
    if (raw === undefined) {
        return fallback;
    }
    const n = Number(raw);
    return Number.isFinite(n) && n >= 0 ? n : fallback;
}

function readRetrievalMode(env: NodeJS.ProcessEnv): RetrievalMode {
    return readString(env, 'RETRIEVAL_MODE')?.toLowerCase() === 'keyword' ? 'keyword' : 'vector';
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const documentsDir = path.resolve(readString(env, 'DOCUMENTS_DIR') ?? 'documents');
    const cacheHours = readNumber(env, 'INDEX_CACHE_HOURS');

    return {
        port: readInteger(env, 'PORT', 3001, 1),
        corsOrigin: readString(env, 'CORS_ORIGIN') ?? '*',
        ollama: {
            baseUrl: readString(env, 'OLLAMA_BASE_URL') ?? DEFAULT_OLLAMA_CONFIG.baseUrl,
            defaultModel: readString(env, 'OLLAMA_MODEL') ?? DEFAULT_OLLAMA_CONFIG.defaultModel,
            embeddingModel: readString(env, 'OLLAMA_EMBEDDING_MODEL') ?? DEFAULT_OLLAMA_CONFIG.embeddingModel,
            timeoutMs: readInteger(env, 'OLLAMA_TIMEOUT_MS', DEFAULT_OLLAMA_CONFIG.timeoutMs, 1),
        },
        documentsDir,
        documents: Object.entries(DEFAULT_DOCUMENT_FILES).map(([id, file]) => ({
            id,
            path: path.join(documentsDir, file),
        })),
        retrievalMode: readRetrievalMode(env),
        indexer: {
            chunkSize: readInteger(env, 'CHUNK_SIZE', DEFAULT_INDEXER_CONFIG.chunkSize, 1),
            chunkOverlap: readInteger(env, 'CHUNK_OVERLAP', DEFAULT_INDEXER_CONFIG.chunkOverlap),
            cacheDurationMs:
                cacheHours !== undefined ? cacheHours * 60 * 60 * 1000 : DEFAULT_INDEXER_CONFIG.cacheDurationMs,
            tolerateStaleIndex: readString(env, 'TOLERATE_STALE_INDEX')?.toLowerCase() === 'true',
        },
        retriever: {
            ...DEFAULT_RETRIEVER_CONFIG,
            topK: readInteger(env, 'RETRIEVAL_TOP_K', DEFAULT_RETRIEVER_CONFIG.topK, 1),
            contextCharBudget: readInteger(env, 'CONTEXT_CHAR_BUDGET', DEFAULT_RETRIEVER_CONFIG.contextCharBudget, 1),
        },
        historyLimit: readInteger(env, 'HISTORY_LIMIT', DEFAULT_HISTORY_LIMIT, 1),
        generation: {
            model: readString(env, 'OLLAMA_MODEL'),
            temperature: readNumber(env, 'LLM_TEMPERATURE'),
            maxTokens: readNumber(env, 'LLM_MAX_TOKENS'),
        },
        assistantName: readString(env, 'ASSISTANT_NAME') ?? DEFAULT_PROMPT_COMPOSER_CONFIG.assistantName,
    };
}
