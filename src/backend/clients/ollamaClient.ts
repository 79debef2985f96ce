/**
 * Ollama Client
 *
 * Wrapper for communicating with an Ollama instance, which serves both the
 * chat model that answers questions and the embedding model used to index
 * the reference documents.
 *
 * Ollama API endpoints used:
 * - GET /api/tags - List available models (used for health check)
 * - POST /api/chat - Streamed chat completion (NDJSON, one object per line)
 * - POST /api/embeddings - Generate vector embeddings
 */

import { GenerationOptions, PromptMessage } from '../../shared/types';
import type { EmbeddingProvider } from '../services/documentIndexer';
import type { ChatCompletionProvider } from '../services/assistantService';

/**
 * Configuration for the Ollama client.
 */
export interface OllamaClientConfig {
    /** Base URL for Ollama API (default: http://localhost:11434) */
    baseUrl: string;
    /** Default model for chat completions */
    defaultModel: string;
    /** Model used for embeddings */
    embeddingModel: string;
    /** Request timeout in milliseconds (applies until response headers arrive) */
    timeoutMs: number;
}

export const DEFAULT_OLLAMA_CONFIG: OllamaClientConfig = {
    baseUrl: 'http://localhost:11434',
    defaultModel: 'llama3',
    embeddingModel: 'nomic-embed-text',
    timeoutMs: 30000,
};

/**
 * Custom error class for Ollama-specific errors.
 */
export class OllamaError extends Error {
    constructor(
        message: string,
        public readonly code: OllamaErrorCode,
        public readonly cause?: Error
    ) {
        super(message);
        this.name = 'OllamaError';
    }
}

export enum OllamaErrorCode {
    /** Ollama service is not running or unreachable */
    CONNECTION_REFUSED = 'CONNECTION_REFUSED',
    /** Request took too long */
    TIMEOUT = 'TIMEOUT',
    /** Requested model is not available */
    MODEL_NOT_FOUND = 'MODEL_NOT_FOUND',
    /** Ollama returned an error response */
    API_ERROR = 'API_ERROR',
    /** Unexpected error during communication */
    UNKNOWN = 'UNKNOWN',
}

/**
 * Client contract: the two collaborator roles plus a health probe.
 */
export interface IOllamaClient extends EmbeddingProvider, ChatCompletionProvider {
    isAvailable(): Promise<boolean>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null;
}

/**
 * Extracts the content fragment of one streamed /api/chat line.
 * Returns an empty string for lines that carry no text (e.g. the final `done` line).
 */
export function parseChatStreamLine(line: string): string {
    if (line.length === 0) {
        return '';
    }

    const parsed: unknown = JSON.parse(line);
    if (!isRecord(parsed)) {
        return '';
    }

    if (typeof parsed.error === 'string') {
        throw new OllamaError(`Ollama API error: ${parsed.error}`, OllamaErrorCode.API_ERROR);
    }

    const message = parsed.message;
    if (isRecord(message) && typeof message.content === 'string') {
        return message.content;
    }
    return '';
}

export class OllamaClient implements IOllamaClient {
    private readonly config: OllamaClientConfig;

    constructor(config: Partial<OllamaClientConfig> = {}) {
        this.config = { ...DEFAULT_OLLAMA_CONFIG, ...config };
    }

    /**
     * Check if Ollama is available and responding.
     * Used by the /api/health endpoint.
     */
    async isAvailable(): Promise<boolean> {
        try {
            const response = await this.fetchWithTimeout(
                `${this.config.baseUrl}/api/tags`,
                { method: 'GET' },
                5000
            );
            return response.ok;
        } catch {
            return false;
        }
    }

    /**
     * Stream a chat completion, yielding text fragments as Ollama produces them.
     *
     * @param messages - Ordered instruction/turn sequence
     * @param options - Optional generation parameters
     * @throws OllamaError if the request or the stream fails
     */
    async *streamChat(
        messages: PromptMessage[],
        options: GenerationOptions = {}
    ): AsyncGenerator<string, void, undefined> {
        const model = options.model ?? this.config.defaultModel;

        let response: Response;
        try {
            response = await this.fetchWithTimeout(
                `${this.config.baseUrl}/api/chat`,
                {
                    method: 'POST',
                    headers: {
                        'Content-Type': 'application/json',
                    },
                    body: JSON.stringify({
                        model,
                        messages,
                        stream: true,
                        options: {
                            temperature: options.temperature ?? 0.2,
                            num_predict: options.maxTokens ?? 500,
                        },
                    }),
                },
                this.config.timeoutMs
            );

            if (!response.ok) {
                await this.handleErrorResponse(response, model);
            }
        } catch (error) {
            throw this.wrapError(error, 'Failed to start chat completion');
        }

        if (!response.body) {
            throw new OllamaError('Ollama returned an empty response body', OllamaErrorCode.API_ERROR);
        }

        const reader = response.body.getReader();
        const decoder = new TextDecoder();
        let buffer = '';

        try {
            for (;;) {
                const { done, value } = await reader.read();
                if (done) {
                    break;
                }
                buffer += decoder.decode(value, { stream: true });

                let newline = buffer.indexOf('\n');
                while (newline !== -1) {
                    const fragment = parseChatStreamLine(buffer.slice(0, newline).trim());
                    buffer = buffer.slice(newline + 1);
                    if (fragment) {
                        yield fragment;
                    }
                    newline = buffer.indexOf('\n');
                }
            }

            buffer += decoder.decode();
            const last = parseChatStreamLine(buffer.trim());
            if (last) {
                yield last;
            }
        } catch (error) {
            throw this.wrapError(error, 'Failed to read chat stream');
        } finally {
            reader.releaseLock();
        }
    }

    /**
     * Generate an embedding vector for the given text.
     *
     * @throws OllamaError if embedding generation fails
     */
    async generateEmbedding(text: string): Promise<number[]> {
        try {
            const response = await this.fetchWithTimeout(
                `${this.config.baseUrl}/api/embeddings`,
                {
                    method: 'POST',
                    headers: {
                        'Content-Type': 'application/json',
                    },
                    body: JSON.stringify({
                        model: this.config.embeddingModel,
                        prompt: text,
                    }),
                },
                this.config.timeoutMs
            );

            if (!response.ok) {
                await this.handleErrorResponse(response, this.config.embeddingModel);
            }

            const data: unknown = await response.json();
            if (!isRecord(data) || !Array.isArray(data.embedding)) {
                throw new OllamaError('Ollama returned no embedding', OllamaErrorCode.API_ERROR);
            }
            return data.embedding.map((value) => (typeof value === 'number' ? value : 0));
        } catch (error) {
            throw this.wrapError(error, 'Failed to generate embedding');
        }
    }

    /**
     * Fetch with a timeout implemented through AbortController.
     */
    private async fetchWithTimeout(
        url: string,
        options: RequestInit,
        timeoutMs: number
    ): Promise<Response> {
        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

        try {
            return await fetch(url, {
                ...options,
                signal: controller.signal,
            });
        } catch (error) {
            if (error instanceof Error && error.name === 'AbortError') {
                throw new OllamaError(
                    `Request timed out after ${timeoutMs}ms`,
                    OllamaErrorCode.TIMEOUT
                );
            }
            throw error;
        } finally {
            clearTimeout(timeoutId);
        }
    }

    /**
     * Handle non-OK HTTP responses from Ollama.
     * - 404: Model not found (user needs to pull it)
     * - Others: Various API errors
     */
    private async handleErrorResponse(response: Response, model: string): Promise<never> {
        let errorMessage: string;

        try {
            const errorBody: unknown = await response.json();
            errorMessage =
                isRecord(errorBody) && typeof errorBody.error === 'string'
                    ? errorBody.error
                    : `HTTP ${response.status}`;
        } catch {
            errorMessage = `HTTP ${response.status}: ${response.statusText}`;
        }

        if (response.status === 404 || errorMessage.includes('not found')) {
            throw new OllamaError(
                `Model "${model}" not found. Please run: ollama pull ${model}`,
                OllamaErrorCode.MODEL_NOT_FOUND
            );
        }

        throw new OllamaError(
            `Ollama API error: ${errorMessage}`,
            OllamaErrorCode.API_ERROR
        );
    }

    /**
     * Wrap errors in OllamaError so callers see a single error type.
     */
    private wrapError(error: unknown, context: string): OllamaError {
        if (error instanceof OllamaError) {
            return error;
        }

        // Connection errors (Ollama not running)
        if (error instanceof TypeError && error.message.includes('fetch')) {
            return new OllamaError(
                'Cannot connect to Ollama. Please ensure Ollama is running (ollama serve)',
                OllamaErrorCode.CONNECTION_REFUSED,
                error
            );
        }

        const message = error instanceof Error ? error.message : String(error);
        return new OllamaError(
            `${context}: ${message}`,
            OllamaErrorCode.UNKNOWN,
            error instanceof Error ? error : undefined
        );
    }
}

export function createOllamaClient(config?: Partial<OllamaClientConfig>): OllamaClient {
    return new OllamaClient(config);
}
