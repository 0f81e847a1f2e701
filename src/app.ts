import type { Logger } from "pino";
import type { AppConfig } from "./config/types";
import { createPostgresPool, createPostgresRepositories } from "./database/client";
import { Chunker } from "./ingest/chunker";
import { TextExtractor } from "./ingest/extractor";
import type { ObjectStorage } from "./ingest/objectStorage";
import { IngestionPipeline } from "./ingest/pipeline";
import { IngestionRunner } from "./ingest/runner";
import { StaleSourceSweeper } from "./ingest/sweeper";
import { createLLMClient } from "./llm/factory";
import type { LLMClientBundle } from "./llm/types";
import { ChatService } from "./query/chat";
import { ContextAssembler } from "./query/contextAssembler";
import { RetrievalEngine } from "./query/retrieval";
import { createInMemoryRepositories } from "./store/inMemory";
import type { Repositories } from "./store/types";
import { createTokenCounter } from "./utils/tokenEncoder";

export interface AppServices {
    config: AppConfig;
    logger: Logger;
    repositories: Repositories;
    llm: LLMClientBundle;
    extractor: TextExtractor;
    runner: IngestionRunner;
    sweeper: StaleSourceSweeper;
    retrieval: RetrievalEngine;
    chat: ChatService;
    close(): Promise<void>;
}

export interface ServiceOverrides {
    repositories?: Repositories;
    llm?: LLMClientBundle;
    extractor?: TextExtractor;
    objectStorage?: ObjectStorage;
    assembler?: ContextAssembler;
}

/** Wires every component from config; no I/O happens here. */
export function createServices(config: AppConfig, logger: Logger, overrides: ServiceOverrides = {}): AppServices {
    const repositories = overrides.repositories ?? createRepositories(config, logger);
    const llm = overrides.llm ?? createLLMClient(config.llm, logger);

    const extractor = overrides.extractor ?? new TextExtractor({
        logger: logger.child({ module: "extract" }),
        objectStorage: overrides.objectStorage,
        fetchTimeoutMs: config.ingest.urlFetchTimeoutSeconds * 1000,
        maxChars: config.ingest.maxTextChars,
    });

    const pipeline = new IngestionPipeline({
        extractor,
        chunker: new Chunker({ chunkSize: config.ingest.chunkSize, overlap: config.ingest.chunkOverlap }),
        embedding: llm.embedding,
        store: repositories.chunks,
        sources: repositories.sources,
        logger: logger.child({ module: "pipeline" }),
    });

    const runner = new IngestionRunner(
        pipeline,
        repositories.sources,
        { concurrency: config.ingest.concurrency, timeoutMs: config.ingest.timeoutSeconds * 1000 },
        logger
    );

    const sweeper = new StaleSourceSweeper(
        repositories.sources,
        {
            processingTimeoutMs: config.ingest.processingTimeoutMinutes * 60_000,
            isActive: (sourceId) => runner.isActive(sourceId),
        },
        logger
    );

    const retrieval = new RetrievalEngine({
        embedding: llm.queryEmbedding,
        store: repositories.chunks,
        defaults: {
            topK: config.retrieval.topK,
            maxTopK: config.retrieval.maxTopK,
            minSimilarity: config.retrieval.minSimilarity,
        },
        logger: logger.child({ module: "retrieval" }),
    });

    const chat = new ChatService({
        retrieval,
        chat: llm.chat,
        messages: repositories.messages,
        notebooks: repositories.notebooks,
        assembler: overrides.assembler ?? new ContextAssembler(createTokenCounter(config.llm.chat.model)),
        options: {
            historyTurns: config.retrieval.historyTurns,
            defaultContextTokens: config.retrieval.defaultContextTokens,
            retrievalShare: config.retrieval.retrievalShare,
        },
        logger: logger.child({ module: "chat" }),
    });

    return {
        config,
        logger,
        repositories,
        llm,
        extractor,
        runner,
        sweeper,
        retrieval,
        chat,
        close: async () => {
            await sweeper.stop();
            await runner.shutdown();
            await repositories.close();
        },
    };
}

function createRepositories(config: AppConfig, logger: Logger): Repositories {
    const storeLogger = logger.child({ module: "store" });

    if (!config.database.databaseUrl) {
        storeLogger.warn("RAG_DATABASE_URL is not set; using the in-memory store. Data will not survive a restart.");
        return createInMemoryRepositories(config.database.vectorDimension);
    }

    const pool = createPostgresPool(config.database, storeLogger);
    return createPostgresRepositories(pool, storeLogger, config.database.vectorDimension);
}
