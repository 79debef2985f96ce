/**
 * Error types shared by the assistant services.
 *
 * ValidationError is raised for bad caller input and is never retried.
 * AssistantError signals a degraded-mode condition: the caller may continue
 * with keyword retrieval or reduced context instead of aborting the turn.
 */

/**
 * Error codes for the document and index pipeline.
 */
export enum AssistantErrorCode {
    /** A configured document file does not exist */
    MISSING_DOCUMENT = 'MISSING_DOCUMENT',
    /** No document could be converted to text */
    NO_DOCUMENTS_LOADED = 'NO_DOCUMENTS_LOADED',
    /** Chunk embedding or index construction failed */
    INDEX_BUILD_FAILED = 'INDEX_BUILD_FAILED',
    /** A search was attempted on an index that must be rebuilt first */
    STALE_INDEX = 'STALE_INDEX',
}

export class AssistantError extends Error {
    constructor(
        message: string,
        public readonly code: AssistantErrorCode,
        public readonly cause?: Error,
        /** Document identifier the error refers to, when there is one */
        public readonly documentId?: string
    ) {
        super(message);
        this.name = 'AssistantError';
    }
}

/**
 * Invalid caller input. `fields` names the offending input fields, if any.
 */
export class ValidationError extends Error {
    constructor(
        message: string,
        public readonly fields: string[] = []
    ) {
        super(message);
        this.name = 'ValidationError';
    }
}

export function isAssistantError(error: unknown, ...codes: AssistantErrorCode[]): error is AssistantError {
    if (!(error instanceof AssistantError)) {
        return false;
    }
    return codes.length === 0 || codes.includes(error.code);
}
