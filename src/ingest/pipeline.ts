import type { Logger } from "pino";
import {
    CancelledError,
    EmbeddingError,
    ExtractionError,
    getErrorMessage,
    NoContentError,
    StorageError,
    toCancelledError,
    throwIfAborted,
} from "../errors";
import type { EmbeddingProvider } from "../llm/types";
import { transition } from "../sources/stateMachine";
import { sourceKindOf, type FailureReason, type PipelineStage, type SourceInput, type SourceRecord, type StageUpdate } from "../sources/types";
import type { ChunkStore, NewChunk, SourceRepository } from "../store/types";
import { createSilentLogger } from "../utils/logger";
import type { Chunker } from "./chunker";
import type { TextExtractor } from "./extractor";

export interface IngestionPipelineDeps {
    extractor: TextExtractor;
    chunker: Chunker;
    /** Ingestion-pool provider. */
    embedding: EmbeddingProvider;
    store: ChunkStore;
    sources: SourceRepository;
    logger?: Logger;
}

export type IngestionOutcome =
    | { sourceId: string; stage: "completed"; chunkCount: number; durationMs: number }
    | { sourceId: string; stage: "failed"; failureReason: FailureReason; errorDetail: string; durationMs: number }
    /** Another writer (delete, sweeper) moved the source on; nothing was recorded. */
    | { sourceId: string; stage: "superseded"; durationMs: number };

class SupersededError extends Error {
    constructor(public readonly sourceId: string, public readonly expected: PipelineStage) {
        super(`Source "${sourceId}" is no longer at stage "${expected}".`);
    }
}

function failureReasonFor(error: unknown, stage: PipelineStage): FailureReason {
    // per-source timeouts count as cancellation; "timeout" is left to the sweeper
    if (error instanceof CancelledError) return "cancelled";
    if (error instanceof ExtractionError) return "extraction";
    if (error instanceof NoContentError) return "no_content";
    if (error instanceof EmbeddingError) return "embedding";
    if (error instanceof StorageError) return "storage";

    switch (stage) {
        case "embedding":
            return "embedding";
        case "storing":
            return "storage";
        case "chunking":
            return "no_content";
        default:
            return "extraction";
    }
}

/**
 * Extract, chunk, embed and store one source, strictly in that order. Every
 * stage change goes through `transition` and a compare-and-set write; all
 * failures end on the source record rather than escaping to the caller.
 */
export class IngestionPipeline {
    private readonly logger: Logger;

    constructor(private readonly deps: IngestionPipelineDeps) {
        this.logger = deps.logger ?? createSilentLogger();
    }

    async run(source: SourceRecord, input: SourceInput, options: { signal?: AbortSignal } = {}): Promise<IngestionOutcome> {
        const { signal } = options;
        const startedAt = Date.now();
        const logger = this.logger.child({ sourceId: source.id, notebookId: source.notebookId });
        let stage: PipelineStage = source.stage;
        let stored = false;

        const advance = async (to: PipelineStage, patch: Omit<StageUpdate, "from" | "to"> = {}): Promise<void> => {
            const next = transition(stage, to);
            const updated = await this.deps.sources.applyTransition(source.id, { ...patch, from: stage, to: next });
            if (!updated) {
                throw new SupersededError(source.id, stage);
            }
            logger.debug({ from: stage, to: next }, "Source stage advanced.");
            stage = next;
        };

        try {
            await advance("extracting");
            const extracted = await this.deps.extractor.extract(input, { signal });
            throwIfAborted(signal);

            await advance("chunking", {
                title: extracted.title,
                metadata: {
                    contentType: extracted.contentType,
                    textLength: extracted.text.length,
                    ...(extracted.pageCount !== undefined ? { pageCount: extracted.pageCount } : {}),
                    ...(extracted.skippedPages.length > 0 ? { skippedPages: extracted.skippedPages } : {}),
                    ...(extracted.truncated ? { truncated: true } : {}),
                },
            });
            const pieces = this.deps.chunker.chunk(extracted.text);
            if (pieces.length === 0) {
                throw new NoContentError();
            }

            await advance("embedding");
            const embeddings = await this.deps.embedding.embedDocuments(
                pieces.map((piece) => piece.content),
                { signal }
            );
            throwIfAborted(signal);

            const chunks: NewChunk[] = pieces.map((piece, index) => ({
                sourceId: source.id,
                notebookId: source.notebookId,
                ordinal: piece.ordinal,
                content: piece.content,
                embedding: embeddings[index] ?? [],
                metadata: {
                    start: piece.start,
                    end: piece.end,
                    sourceKind: sourceKindOf(input),
                    contentType: extracted.contentType,
                },
            }));

            await advance("storing");
            const chunkCount = await this.deps.store.putBatch(source.id, chunks);
            stored = true;

            await advance("completed", { chunkCount });
            logger.info({ chunkCount, durationMs: Date.now() - startedAt }, "Source ingested.");
            return { sourceId: source.id, stage: "completed", chunkCount, durationMs: Date.now() - startedAt };
        } catch (error) {
            if (error instanceof SupersededError) {
                logger.warn({ stage }, "Source changed underneath the pipeline; stopping.");
                if (stored) {
                    await this.deps.store.deleteBySource(source.id);
                }
                return { sourceId: source.id, stage: "superseded", durationMs: Date.now() - startedAt };
            }

            if (stored) {
                await this.removeChunks(source.id, logger);
            }
            const cause = signal?.aborted ? toCancelledError(signal) : error;
            return this.fail(source.id, stage, cause, logger, startedAt);
        }
    }

    private async removeChunks(sourceId: string, logger: Logger): Promise<void> {
        try {
            const removed = await this.deps.store.deleteBySource(sourceId);
            logger.warn({ removed }, "Removed chunks of a source that failed after storing.");
        } catch (error) {
            logger.error({ err: error }, "Failed to remove chunks of a failed source.");
        }
    }

    private async fail(
        sourceId: string,
        stage: PipelineStage,
        error: unknown,
        logger: Logger,
        startedAt: number
    ): Promise<IngestionOutcome> {
        const failureReason = failureReasonFor(error, stage);
        const errorDetail = getErrorMessage(error);

        logger.error({ err: error, stage, failureReason }, "Source ingestion failed.");

        const updated = await this.deps.sources.applyTransition(sourceId, {
            from: stage,
            to: transition(stage, "failed"),
            failureReason,
            errorDetail,
            metadata: { failedAt: stage },
        });
        if (!updated) {
            logger.warn({ stage }, "Source changed before the failure could be recorded.");
            return { sourceId, stage: "superseded", durationMs: Date.now() - startedAt };
        }

        return { sourceId, stage: "failed", failureReason, errorDetail, durationMs: Date.now() - startedAt };
    }
}
