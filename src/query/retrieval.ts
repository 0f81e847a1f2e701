import type { Logger } from "pino";
import { CancelledError, getErrorMessage, RetrievalError, ValidationError } from "../errors";
import type { EmbeddingProvider } from "../llm/types";
import type { ChunkStore, RetrievedChunk } from "../store/types";
import { createSilentLogger } from "../utils/logger";

export interface RetrievalRequest {
    query: string;
    notebookId: string;
    sourceId?: string;
    topK?: number;
    minSimilarity?: number;
    signal?: AbortSignal;
}

export interface RetrievalResult {
    chunks: RetrievedChunk[];
    topK: number;
    minSimilarity: number;
}

export interface RetrievalDefaults {
    topK: number;
    maxTopK: number;
    minSimilarity: number;
}

export const DEFAULT_RETRIEVAL: RetrievalDefaults = {
    topK: 5,
    maxTopK: 10,
    minSimilarity: 0.7,
};

export interface RetrievalEngineDeps {
    /** Query-pool provider, never the ingestion one. */
    embedding: EmbeddingProvider;
    store: ChunkStore;
    defaults?: Partial<RetrievalDefaults>;
    logger?: Logger;
}

export class RetrievalEngine {
    private readonly defaults: RetrievalDefaults;
    private readonly logger: Logger;

    constructor(private readonly deps: RetrievalEngineDeps) {
        this.defaults = { ...DEFAULT_RETRIEVAL, ...deps.defaults };
        this.logger = deps.logger ?? createSilentLogger();
    }

    /**
     * Ranked chunks of one notebook (optionally one source) at or above the
     * similarity threshold, most similar first. An empty list is a normal result.
     */
    async retrieve(request: RetrievalRequest): Promise<RetrievalResult> {
        const query = request.query.trim();
        if (!query) {
            throw new ValidationError("Query must not be empty.");
        }
        if (!request.notebookId) {
            throw new ValidationError("notebookId is required.");
        }

        const topK = Math.min(Math.max(1, Math.floor(request.topK ?? this.defaults.topK)), this.defaults.maxTopK);
        const minSimilarity = request.minSimilarity ?? this.defaults.minSimilarity;
        if (!Number.isFinite(minSimilarity) || minSimilarity < -1 || minSimilarity > 1) {
            throw new ValidationError("minSimilarity must be between -1 and 1.");
        }

        let embedding: number[];
        try {
            embedding = await this.deps.embedding.embedQuery(query, { signal: request.signal });
        } catch (error) {
            if (error instanceof CancelledError) {
                throw error;
            }
            throw new RetrievalError("embedding", `Failed to embed query: ${getErrorMessage(error)}`, { cause: error });
        }

        let chunks: RetrievedChunk[];
        try {
            chunks = await this.deps.store.search({
                notebookId: request.notebookId,
                sourceId: request.sourceId,
                embedding,
                topK,
                minSimilarity,
            });
        } catch (error) {
            throw new RetrievalError("search", `Chunk search failed: ${getErrorMessage(error)}`, { cause: error });
        }

        this.logger.debug(
            { notebookId: request.notebookId, sourceId: request.sourceId, topK, minSimilarity, hits: chunks.length },
            "Retrieved chunks."
        );

        return { chunks, topK, minSimilarity };
    }
}
