/**
 * External service clients
 *
 * Wrappers for external service communication:
 * - OllamaClient: chat completions (streamed) and embeddings
 */

export {
    OllamaClient,
    createOllamaClient,
    parseChatStreamLine,
    OllamaError,
    OllamaErrorCode,
    DEFAULT_OLLAMA_CONFIG,
    type IOllamaClient,
    type OllamaClientConfig,
} from './ollamaClient';
