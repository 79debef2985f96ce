/**
 * Assistant Service
 *
 * Runs one conversational turn end to end:
 * 1. Validate and classify the question
 * 2. Retrieve document context (skipped for greetings)
 * 3. Compose the prompt from profile, history and context
 * 4. Stream the LLM answer to the caller fragment by fragment
 * 5. Record the assembled answer in the session
 *
 * Retrieval degrades instead of failing: a vector retrieval error falls back
 * to keyword retrieval. Only a failure to load any document at all ends the
 * turn with an error.
 */

import { GenerationOptions, PromptMessage, QuestionProfile } from '../../shared/types';
import { DocumentIndexer, IndexStatus } from './documentIndexer';
import { DocumentStore, DocumentStoreStatus } from './documentStore';
import { ValidationError } from './errors';
import { PromptComposer, PromptKind } from './promptComposer';
import { QuestionAnalyzer } from './questionAnalyzer';
import { ContextRetriever, RetrievalMode } from './retriever';
import { SessionContext } from './sessionContext';

/**
 * Chat collaborator. Yields the answer as a sequence of text fragments.
 */
export interface ChatCompletionProvider {
    streamChat(messages: PromptMessage[], options?: GenerationOptions): AsyncIterable<string>;
}

export interface AssistantServiceConfig {
    retrievalMode: RetrievalMode;
    generation: GenerationOptions;
}

export const DEFAULT_ASSISTANT_CONFIG: AssistantServiceConfig = {
    retrievalMode: 'vector',
    generation: {},
};

export interface AssistantDependencies {
    analyzer: QuestionAnalyzer;
    composer: PromptComposer;
    llm: ChatCompletionProvider;
    documentStore: Pick<DocumentStore, 'loadOrRefresh' | 'fingerprints' | 'getStatus'>;
    keywordRetriever: ContextRetriever;
    /** Required for vector mode; without it the service runs in keyword mode */
    vectorRetriever?: ContextRetriever;
    indexer?: Pick<DocumentIndexer, 'ensureIndex' | 'getStatus'>;
}

/**
 * What a finished turn produced, returned once the stream is exhausted.
 */
export interface AskOutcome {
    answer: string;
    promptKind: PromptKind;
    analysis: QuestionProfile;
    /** Strategy that produced the context, or null when retrieval was skipped */
    retrievalMode: RetrievalMode | null;
    /** True when the configured strategy failed and a fallback was used */
    degraded: boolean;
}

export interface DocumentsStatus {
    retrievalMode: RetrievalMode;
    store: DocumentStoreStatus;
    index: IndexStatus | null;
}

interface RetrievalResult {
    context: string;
    mode: RetrievalMode;
    degraded: boolean;
}

export class AssistantService {
    private readonly config: AssistantServiceConfig;

    constructor(
        private readonly deps: AssistantDependencies,
        config: Partial<AssistantServiceConfig> = {}
    ) {
        this.config = { ...DEFAULT_ASSISTANT_CONFIG, ...config };
    }

    /**
     * Effective retrieval mode: vector only when both the mode asks for it and
     * a vector retriever is wired.
     */
    getRetrievalMode(): RetrievalMode {
        return this.config.retrievalMode === 'vector' && this.deps.vectorRetriever ? 'vector' : 'keyword';
    }

    /**
     * Answers `question` within `session`, yielding answer fragments as they
     * arrive. The turn is recorded only after the stream completed.
     *
     * @throws ValidationError for a blank or non-text question
     * @throws AssistantError when no document can be loaded at all
     */
    async *ask(session: SessionContext, question: unknown): AsyncGenerator<string, AskOutcome, undefined> {
        if (typeof question !== 'string' || question.trim().length === 0) {
            throw new ValidationError('Question cannot be empty or contain only whitespace', ['message']);
        }

        const text = question.trim();
        const analysis = this.deps.analyzer.classify(text);
        const retrieval = analysis.isGreeting ? null : await this.retrieve(text);

        const prompt = this.deps.composer.compose({
            profile: session.getProfile(),
            question: text,
            analysis,
            history: session.messages(),
            retrievedContext: retrieval?.context ?? '',
        });

        let answer = '';
        for await (const fragment of this.deps.llm.streamChat(prompt.messages, this.config.generation)) {
            answer += fragment;
            yield fragment;
        }

        session.appendTurn(text, answer);

        return {
            answer: answer.trim(),
            promptKind: prompt.kind,
            analysis,
            retrievalMode: retrieval?.mode ?? null,
            degraded: retrieval?.degraded ?? false,
        };
    }

    /**
     * Loads the documents and, in vector mode, builds the index, so the first
     * question does not pay for it.
     */
    async warmUp(): Promise<void> {
        const documents = await this.deps.documentStore.loadOrRefresh();
        console.log(`Loaded ${documents.size} reference documents`);

        if (this.getRetrievalMode() === 'vector' && this.deps.indexer) {
            await this.deps.indexer.ensureIndex(documents);
        }
    }

    async getDocumentsStatus(): Promise<DocumentsStatus> {
        const { documentStore, indexer } = this.deps;
        const store = documentStore.getStatus();
        if (!indexer) {
            return { retrievalMode: this.getRetrievalMode(), store, index: null };
        }

        // A document that never converted cannot be in the index
        const loaded = new Set(store.documents.map((document) => document.id));
        const tracked = new Map(
            Array.from(await documentStore.fingerprints()).filter(([id]) => loaded.has(id))
        );
        return {
            retrievalMode: this.getRetrievalMode(),
            store,
            index: indexer.getStatus(tracked),
        };
    }

    private async retrieve(query: string): Promise<RetrievalResult> {
        const { vectorRetriever, keywordRetriever } = this.deps;

        if (this.getRetrievalMode() === 'vector' && vectorRetriever) {
            try {
                return { context: await vectorRetriever.retrieveContext(query), mode: 'vector', degraded: false };
            } catch (error) {
                console.warn('Vector retrieval failed, falling back to keyword retrieval:', error);
                return { context: await keywordRetriever.retrieveContext(query), mode: 'keyword', degraded: true };
            }
        }

        return { context: await keywordRetriever.retrieveContext(query), mode: 'keyword', degraded: false };
    }
}

export function createAssistantService(
    deps: AssistantDependencies,
    config?: Partial<AssistantServiceConfig>
): AssistantService {
    return new AssistantService(deps, config);
}
