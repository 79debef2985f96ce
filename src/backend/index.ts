/**
 * Backend module entry point
 *
 * The backend is organized into:
 * - server/: Express app configuration and route handlers
 * - services/: Document pipeline, retrieval, sessions and prompts
 * - clients/: External service clients (OllamaClient)
 * - config.ts: environment-driven configuration
 *
 * When run directly, this file starts the server and warms the document
 * index in the background. When imported, it exports the factories.
 */

import { loadConfig, loadEnvFile } from './config';
import { createOllamaClient } from './clients/ollamaClient';
import { buildAssistant, createApp, startServer } from './server';

export {
    createApp,
    createServer,
    startServer,
    buildAssistant,
    ApiError,
    DEFAULT_SERVER_CONFIG,
} from './server';

export type { ServerConfig } from './server';

export { loadConfig, loadEnvFile, DEFAULT_DOCUMENT_FILES } from './config';

export type { AppConfig } from './config';

export * from './services';

export * from './clients';

async function main(): Promise<void> {
    loadEnvFile();
    const config = loadConfig();
    const ollamaClient = createOllamaClient(config.ollama);
    const assistant = buildAssistant(config, ollamaClient);

    const app = createApp({
        port: config.port,
        corsOrigin: config.corsOrigin,
        historyLimit: config.historyLimit,
        ollamaClient,
        assistant,
    });
    await startServer(app, config.port);

    console.log(`Retrieval mode: ${assistant.getRetrievalMode()}, documents in ${config.documentsDir}`);

    // Questions still work while this runs; they build or fall back on their own
    assistant.warmUp().catch((error: unknown) => {
        console.error('Document warm-up failed:', error);
    });
}

if (require.main === module) {
    main().catch((error: unknown) => {
        console.error('Failed to start server:', error);
        process.exit(1);
    });
}
