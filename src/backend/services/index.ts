/**
 * Backend services
 *
 * Core business logic components:
 * - DocumentStore / DocumentIndexer: reference documents and their chunk index
 * - Retrievers: vector and keyword context retrieval
 * - QuestionAnalyzer / PromptComposer: question classification and prompts
 * - SessionContext / SessionRegistry: per-conversation state
 * - AssistantService: the question pipeline tying them together
 */

export {
    AssistantError,
    AssistantErrorCode,
    ValidationError,
    isAssistantError,
} from './errors';

export {
    MarkdownParser,
    PlainTextParser,
    PdfParser,
    FileDocumentConverter,
    getParser,
    detectDocumentFormat,
    createDocumentConverter,
} from './documentParser';

export type {
    DocumentFormat,
    DocumentParser,
    DocumentConverter,
    ParseResult,
} from './documentParser';

export { DocumentStore, calculateFingerprint, createDocumentStore } from './documentStore';

export type { DocumentStoreConfig, DocumentStoreStatus, LoadOptions } from './documentStore';

export {
    DocumentChunker,
    splitIntoChunks,
    validateChunkingConfig,
    DEFAULT_CHUNKING_CONFIG,
} from './documentChunker';

export type { ChunkingConfig, TextChunk } from './documentChunker';

export {
    InMemoryVectorStore,
    cosineSimilarity,
    chunkToVectorEntry,
    createVectorStore,
} from './vectorStore';

export type { IVectorStore, SearchResult } from './vectorStore';

export {
    DocumentIndex,
    DocumentIndexer,
    createDocumentIndexer,
    DEFAULT_INDEXER_CONFIG,
} from './documentIndexer';

export type {
    EmbeddingProvider,
    IndexerConfig,
    IndexStatus,
    ScoredChunk,
    StalenessReason,
} from './documentIndexer';

export {
    KeywordRetriever,
    VectorRetriever,
    findRelevantContent,
    formatChunks,
    extractQueryWords,
    DEFAULT_RETRIEVER_CONFIG,
} from './retriever';

export type { ContextRetriever, RetrievalMode, RetrieverConfig } from './retriever';

export { QuestionAnalyzer, createQuestionAnalyzer, DEFAULT_ANALYZER_CONFIG } from './questionAnalyzer';

export type { QuestionAnalyzerConfig, TurnAnalysis } from './questionAnalyzer';

export {
    SessionContext,
    categorizeCompanySize,
    programStage,
    parseCompanyProfile,
    isInitializedSummary,
    CONTEXT_SCHEMA_VERSION,
    DEFAULT_HISTORY_LIMIT,
} from './sessionContext';

export type { RecentHistory } from './sessionContext';

export { SessionRegistry, createSessionRegistry } from './sessionRegistry';

export type { Session } from './sessionRegistry';

export {
    PromptComposer,
    createPromptComposer,
    formatHistory,
    greetingSentence,
    programStatusPhrase,
    DEFAULT_PROMPT_COMPOSER_CONFIG,
    DEFAULT_PROMPT_TEMPLATES,
} from './promptComposer';

export type {
    ComposedPrompt,
    ComposeInput,
    PromptComposerConfig,
    PromptKind,
    PromptTemplates,
} from './promptComposer';

export { AssistantService, createAssistantService, DEFAULT_ASSISTANT_CONFIG } from './assistantService';

export type {
    AskOutcome,
    AssistantDependencies,
    AssistantServiceConfig,
    ChatCompletionProvider,
    DocumentsStatus,
} from './assistantService';
