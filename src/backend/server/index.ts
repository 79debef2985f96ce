/**
 * Express Server Configuration and Routes
 *
 * HTTP layer of the assistant backend. It exposes REST endpoints for:
 * - Health checks (Ollama connectivity)
 * - Sessions: creation, company profile, history, export
 * - Questions: streamed plain-text answers
 * - Reference document and index status
 *
 * Routes only translate HTTP to service calls. Errors of every route end in
 * the central error middleware, which maps them to status codes:
 * - ValidationError → 400 (with the offending fields)
 * - unknown session → 404
 * - AssistantError / OllamaError → 503 (degraded service)
 * - anything else → 500
 */

import { Server } from 'http';
import express, { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { AppConfig, loadConfig } from '../config';
import { createOllamaClient, IOllamaClient, OllamaError } from '../clients/ollamaClient';
import {
    CreateSessionResponse,
    ErrorResponse,
    HealthResponse,
} from '../../shared/types';
import {
    AssistantError,
    AssistantService,
    DEFAULT_HISTORY_LIMIT,
    KeywordRetriever,
    Session,
    SessionRegistry,
    ValidationError,
    VectorRetriever,
    createAssistantService,
    createDocumentConverter,
    createDocumentIndexer,
    createDocumentStore,
    createPromptComposer,
    createQuestionAnalyzer,
} from '../services';

/**
 * Server configuration options.
 */
export interface ServerConfig {
    /** Port to listen on */
    port: number;
    /** CORS origin (default: allow all) */
    corsOrigin?: string;
    /** Default entry count of the history endpoint */
    historyLimit: number;
    /** Ollama client instance (for dependency injection) */
    ollamaClient?: Pick<IOllamaClient, 'isAvailable'>;
    /** Assistant service instance (for dependency injection) */
    assistant?: AssistantService;
    /** Session registry instance (for dependency injection) */
    sessions?: SessionRegistry;
}

/**
 * Default server configuration.
 */
export const DEFAULT_SERVER_CONFIG: ServerConfig = {
    port: 3001,
    corsOrigin: '*',
    historyLimit: DEFAULT_HISTORY_LIMIT,
};

/**
 * Custom error class for API errors.
 * Includes HTTP status code for proper response handling.
 */
export class ApiError extends Error {
    constructor(
        message: string,
        public readonly statusCode: number = 500,
        public readonly code?: string
    ) {
        super(message);
        this.name = 'ApiError';
    }
}

/**
 * Wires the full question pipeline from application configuration.
 */
export function buildAssistant(config: AppConfig, ollamaClient: IOllamaClient): AssistantService {
    const documentStore = createDocumentStore(createDocumentConverter(), { documents: config.documents });
    const indexer = createDocumentIndexer(ollamaClient, config.indexer);

    return createAssistantService(
        {
            analyzer: createQuestionAnalyzer(),
            composer: createPromptComposer({ assistantName: config.assistantName }),
            llm: ollamaClient,
            documentStore,
            keywordRetriever: new KeywordRetriever(documentStore, config.retriever),
            vectorRetriever: new VectorRetriever(documentStore, indexer, ollamaClient, config.retriever),
            indexer,
        },
        {
            retrievalMode: config.retrievalMode,
            generation: config.generation,
        }
    );
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseLimit(raw: unknown, fallback: number): number {
    if (raw === undefined) {
        return fallback;
    }
    return typeof raw === 'string' && raw.trim() !== '' ? Number(raw) : NaN;
}

function isBodyParseError(err: Error): boolean {
    return 'type' in err && err.type === 'entity.parse.failed';
}

/**
 * Creates and configures the Express application.
 *
 * @param config - Server configuration options
 * @returns Configured Express application
 */
export function createApp(config: Partial<ServerConfig> = {}): Express {
    const mergedConfig = { ...DEFAULT_SERVER_CONFIG, ...config };
    const app = express();

    let ollamaClient = mergedConfig.ollamaClient;
    let assistant = mergedConfig.assistant;
    if (!assistant || !ollamaClient) {
        const appConfig = loadConfig();
        const client = createOllamaClient(appConfig.ollama);
        ollamaClient = ollamaClient ?? client;
        assistant = assistant ?? buildAssistant(appConfig, client);
    }
    const health = ollamaClient;
    const service = assistant;
    const sessions = mergedConfig.sessions ?? new SessionRegistry();

    const requireSession = (id: string): Session => {
        const session = sessions.get(id);
        if (!session) {
            throw new ApiError('Session not found', 404, 'SESSION_NOT_FOUND');
        }
        return session;
    };

    // =========================================================================
    // Middleware Setup
    // =========================================================================

    app.use(
        cors({
            origin: mergedConfig.corsOrigin,
            methods: ['GET', 'POST', 'PUT', 'DELETE'],
            allowedHeaders: ['Content-Type', 'Authorization'],
        })
    );

    app.use(express.json({ limit: '1mb' }));

    // Request logging
    app.use((req: Request, _res: Response, next: NextFunction) => {
        console.log(`${new Date().toISOString()} ${req.method} ${req.path}`);
        next();
    });

    // =========================================================================
    // Health & Status Endpoints
    // =========================================================================

    /**
     * GET /api/health
     *
     * 200 when Ollama answers, 503 otherwise.
     */
    app.get('/api/health', async (_req: Request, res: Response) => {
        let ollamaAvailable = false;
        try {
            ollamaAvailable = await health.isAvailable();
        } catch (error) {
            console.error('Health check error:', error);
        }

        const response: HealthResponse = {
            status: ollamaAvailable ? 'ok' : 'error',
            ollama: ollamaAvailable,
            retrievalMode: service.getRetrievalMode(),
        };
        res.status(ollamaAvailable ? 200 : 503).json(response);
    });

    /**
     * GET /api/documents/status
     *
     * Loaded reference documents and the state of the vector index.
     */
    app.get('/api/documents/status', async (_req: Request, res: Response, next: NextFunction) => {
        try {
            res.json(await service.getDocumentsStatus());
        } catch (error) {
            next(error);
        }
    });

    // =========================================================================
    // Session Endpoints
    // =========================================================================

    app.post('/api/sessions', (_req: Request, res: Response) => {
        const session = sessions.create();
        const response: CreateSessionResponse = { sessionId: session.id };
        res.status(201).json(response);
    });

    app.get('/api/sessions/:id', (req: Request, res: Response, next: NextFunction) => {
        try {
            const session = requireSession(req.params.id);
            res.json({
                sessionId: session.id,
                createdAt: session.createdAt.toISOString(),
                summary: session.context.summary(),
            });
        } catch (error) {
            next(error);
        }
    });

    app.delete('/api/sessions/:id', (req: Request, res: Response, next: NextFunction) => {
        try {
            if (!sessions.delete(req.params.id)) {
                throw new ApiError('Session not found', 404, 'SESSION_NOT_FOUND');
            }
            res.status(204).end();
        } catch (error) {
            next(error);
        }
    });

    /**
     * PUT /api/sessions/:id/profile
     *
     * Replaces the company profile of the session.
     */
    app.put('/api/sessions/:id/profile', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const session = requireSession(req.params.id);
            const body: unknown = req.body;
            await sessions.runExclusive(session.id, async () => session.context.setProfile(body));
            res.json({ summary: session.context.summary() });
        } catch (error) {
            next(error);
        }
    });

    /**
     * POST /api/sessions/:id/messages
     *
     * Answers `message` and streams the answer as plain text. Validation and
     * retrieval failures happen before the first fragment, so they still
     * produce a regular JSON error response.
     */
    app.post('/api/sessions/:id/messages', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const session = requireSession(req.params.id);
            const body: unknown = req.body;
            const message = isRecord(body) ? body.message : undefined;

            await sessions.runExclusive(session.id, async () => {
                const stream = service.ask(session.context, message);
                let step = await stream.next();

                res.status(200).type('text/plain; charset=utf-8');
                while (!step.done) {
                    res.write(step.value);
                    step = await stream.next();
                }
                res.end();
            });
        } catch (error) {
            if (res.headersSent) {
                console.error('Answer stream failed:', error);
                res.end();
                return;
            }
            next(error);
        }
    });

    app.get('/api/sessions/:id/history', (req: Request, res: Response, next: NextFunction) => {
        try {
            const session = requireSession(req.params.id);
            const limit = parseLimit(req.query.limit, mergedConfig.historyLimit);
            res.json(session.context.recent(limit));
        } catch (error) {
            next(error);
        }
    });

    app.delete('/api/sessions/:id/history', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const session = requireSession(req.params.id);
            await sessions.runExclusive(session.id, async () => session.context.clear());
            res.status(204).end();
        } catch (error) {
            next(error);
        }
    });

    app.get('/api/sessions/:id/export', (req: Request, res: Response, next: NextFunction) => {
        try {
            res.json(requireSession(req.params.id).context.export());
        } catch (error) {
            next(error);
        }
    });

    // =========================================================================
    // Error Handling Middleware
    // =========================================================================

    app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
        let status = 500;
        let body: ErrorResponse = { error: 'Internal server error' };

        if (err instanceof ApiError) {
            status = err.statusCode;
            body = { error: err.message, code: err.code };
        } else if (err instanceof ValidationError) {
            status = 400;
            body = { error: err.message, code: 'VALIDATION_ERROR', fields: err.fields };
        } else if (isBodyParseError(err)) {
            status = 400;
            body = { error: 'Malformed JSON body', code: 'INVALID_JSON' };
        } else if (err instanceof AssistantError || err instanceof OllamaError) {
            status = 503;
            body = { error: err.message, code: err.code };
        }

        if (status >= 500) {
            console.error('Request failed:', err);
        }
        res.status(status).json(body);
    });

    return app;
}

/**
 * Starts the Express server.
 *
 * @returns Promise that resolves with the listening server
 */
export function startServer(app: Express, port: number = DEFAULT_SERVER_CONFIG.port): Promise<Server> {
    return new Promise((resolve) => {
        const server = app.listen(port, () => {
            console.log(`Assistant server running on port ${port}`);
            console.log(`Health check: http://localhost:${port}/api/health`);
            resolve(server);
        });
    });
}

/**
 * Factory function to create and optionally start the server.
 */
export async function createServer(
    config: Partial<ServerConfig> = {},
    autoStart: boolean = false
): Promise<Express> {
    const app = createApp(config);

    if (autoStart) {
        await startServer(app, config.port || DEFAULT_SERVER_CONFIG.port);
    }

    return app;
}
