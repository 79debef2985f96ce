/**
 * Shared type definitions for the Apprentice Assistant
 *
 * These types define the contract between the HTTP layer and the services.
 * They're organized by domain:
 * - Company: Profile submitted at the start of a session
 * - Conversation: Turns and entries recorded per session
 * - Documents: Reference documents, chunks and the vector index
 * - Questions: Classification produced for every incoming question
 * - Prompts: Messages handed to the language model
 * - API: Request/response shapes
 */

// ============================================================================
// Company Types
// ============================================================================

/**
 * Size band derived from the employee count.
 * - micro: fewer than 20 employees
 * - small: fewer than 100
 * - medium: fewer than 500
 * - large: 500 or more
 */
export type CompanySizeCategory = 'micro' | 'small' | 'medium' | 'large';

/**
 * Whether the company already runs an apprenticeship program.
 */
export type ProgramStage = 'experienced' | 'beginner';

/**
 * Company data submitted once per session (and replaced wholesale on resubmission).
 */
export interface CompanyProfile {
    name: string;
    sector: string;
    employeeCount: number;
    hasProgram: boolean;
    extra: Record<string, unknown>;
}

// ============================================================================
// Conversation Types
// ============================================================================

export type TurnRole = 'user' | 'assistant';

/**
 * One user or assistant utterance.
 */
export interface ConversationTurn {
    role: TurnRole;
    content: string;
    timestamp: Date;
}

/**
 * A question paired with the answer it received.
 */
export interface ConversationEntry {
    question: string;
    answer: string;
    timestamp: Date;
}

// ============================================================================
// Document Types
// ============================================================================

/**
 * A configured reference document: its role identifier and where it lives.
 */
export interface DocumentSource {
    /** Document role, e.g. "manual" */
    id: string;
    path: string;
}

/**
 * A loaded reference document.
 * Immutable until re-fingerprinting detects that the file changed.
 */
export interface DocumentRecord {
    id: string;
    sourcePath: string;
    text: string;
    /** MD5 hex digest of the raw file bytes */
    fingerprint: string;
    processedAt: Date;
}

export interface ChunkMetadata {
    /** Identifier of the source document's role */
    sourceType: string;
    fingerprint: string;
    processedAt: Date;
    chunkIndex: number;
}

/**
 * A chunk of a document with its embedding vector.
 * Chunks are the unit of retrieval in vector mode.
 */
export interface DocumentChunk {
    id: string;
    documentId: string;
    content: string;
    /** Character offsets of the span inside the document text */
    start: number;
    end: number;
    embedding: number[];
    metadata: ChunkMetadata;
}

/**
 * Entry in the vector store for similarity search.
 */
export interface VectorEntry {
    id: string;
    documentId: string;
    /** Position of the chunk across the whole index, used to break score ties */
    order: number;
    content: string;
    embedding: number[];
}

// ============================================================================
// Question Types
// ============================================================================

export type QuestionComplexity = 'simple' | 'medium' | 'complex';

/**
 * Classification of an incoming question.
 */
export interface QuestionProfile {
    isGreeting: boolean;
    hasMultipleParts: boolean;
    isComparison: boolean;
    isRequirement: boolean;
    hasLegalReference: boolean;
    isInterrogative: boolean;
    containsNumbers: boolean;
    subQuestions: string[];
    complexity: QuestionComplexity;
    keywords: string[];
}

// ============================================================================
// Prompt Types
// ============================================================================

export type PromptRole = 'system' | 'user' | 'assistant';

/**
 * One instruction unit sent to the language model.
 */
export interface PromptMessage {
    role: PromptRole;
    content: string;
}

/**
 * Options for text generation.
 */
export interface GenerationOptions {
    model?: string;
    temperature?: number;
    maxTokens?: number;
}

// ============================================================================
// Session Summary / Export Types
// ============================================================================

export interface UninitializedContextSummary {
    error: string;
    interactionCount: 0;
    lastInteraction: null;
    contextAgeMinutes: 0;
}

export interface ContextSummary {
    profile: CompanyProfile;
    interactionCount: number;
    lastInteraction: ConversationEntry | null;
    contextAgeMinutes: number;
    sizeCategory: CompanySizeCategory;
    stage: ProgramStage;
}

/**
 * JSON-safe form of a conversation entry.
 */
export interface StoredEntry {
    question: string;
    answer: string;
    timestamp: string; // ISO date
}

export interface ContextExport {
    profile: CompanyProfile | null;
    sizeCategory: CompanySizeCategory | null;
    stage: ProgramStage | null;
    conversationHistory: StoredEntry[];
    lastUpdate: string; // ISO date
    metadata: {
        exportTime: string; // ISO date
        interactionCount: number;
        schemaVersion: string;
    };
}

// ============================================================================
// API Types
// ============================================================================

/**
 * Request body for POST /api/sessions/:id/messages
 */
export interface ChatRequest {
    message: string;
}

/**
 * Response body for GET /api/health
 */
export interface HealthResponse {
    status: 'ok' | 'error';
    ollama: boolean;
    retrievalMode: 'vector' | 'keyword';
}

/**
 * Response body for POST /api/sessions
 */
export interface CreateSessionResponse {
    sessionId: string;
}

/**
 * Error body returned by every endpoint.
 */
export interface ErrorResponse {
    error: string;
    code?: string;
    fields?: string[];
}
