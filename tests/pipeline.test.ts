import { beforeEach, describe, expect, it } from "vitest";
import { CancelledError, EmbeddingError, StorageError } from "../src/errors";
import { Chunker, chunkText } from "../src/ingest/chunker";
import { TextExtractor, type ExtractedText } from "../src/ingest/extractor";
import { IngestionPipeline } from "../src/ingest/pipeline";
import { BaseEmbeddingProvider } from "../src/llm/base";
import type { EmbeddingProvider } from "../src/llm/types";
import type { SourceInput, SourceRecord, StageUpdate } from "../src/sources/types";
import { createInMemoryState, InMemoryChunkStore, InMemorySourceRepository, type InMemoryState } from "../src/store/inMemory";
import type { NewChunk } from "../src/store/types";
import { FakeEmbeddingProvider } from "./helpers";

class StaticExtractor extends TextExtractor {
    constructor(private readonly result: ExtractedText) {
        super();
    }

    async extract(): Promise<ExtractedText> {
        return this.result;
    }
}

// 20 x "solar " trimmed to 119 characters; 20/5 windows start every 15.
const TEXT_INPUT: SourceInput = { kind: "text", text: "solar ".repeat(20) };

describe("IngestionPipeline", () => {
    let state: InMemoryState;
    let sources: InMemorySourceRepository;
    let store: InMemoryChunkStore;

    beforeEach(() => {
        state = createInMemoryState();
        sources = new InMemorySourceRepository(state);
        store = new InMemoryChunkStore(3, state);
    });

    function createPipeline(
        embedding: EmbeddingProvider = new FakeEmbeddingProvider(),
        options: { extractor?: TextExtractor; chunkStore?: InMemoryChunkStore; sourceRepository?: InMemorySourceRepository } = {}
    ): IngestionPipeline {
        return new IngestionPipeline({
            extractor: options.extractor ?? new TextExtractor(),
            chunker: new Chunker({ chunkSize: 20, overlap: 5 }),
            embedding,
            store: options.chunkStore ?? store,
            sources: options.sourceRepository ?? sources,
        });
    }

    async function createSource(): Promise<SourceRecord> {
        return sources.create({ notebookId: "nb-1", kind: "text", title: "Solar notes" });
    }

    it("ingests a source end to end", async () => {
        const source = await createSource();
        const embedding = new FakeEmbeddingProvider();

        const outcome = await createPipeline(embedding).run(source, TEXT_INPUT);

        expect(outcome).toMatchObject({ sourceId: source.id, stage: "completed", chunkCount: 8 });
        expect(embedding.requests).toHaveLength(1);
        expect(embedding.requests[0]).toHaveLength(8);

        const stored = await sources.get(source.id);
        expect(stored).toMatchObject({
            status: "completed",
            stage: "completed",
            chunkCount: 8,
            metadata: { contentType: "text/plain", textLength: 119 },
        });
        await expect(store.countBySource(source.id)).resolves.toBe(8);

        const hits = await store.search({ notebookId: "nb-1", embedding: [1, 0, 0], topK: 10, minSimilarity: 0.5 });
        expect(hits.map((hit) => hit.ordinal)).toEqual([0, 1, 2, 3, 4, 5, 6, 7]);
        expect(hits[1]?.metadata).toMatchObject({ start: 15, end: 35, sourceKind: "text" });
    });

    it("stores nothing when one embedding batch fails", async () => {
        const source = await createSource();
        const failing: EmbeddingProvider = {
            config: { provider: "openai", model: "test-embedding" },
            embedDocuments: async () => {
                throw new EmbeddingError({ batchIndex: 1, startIndex: 16, endIndex: 32 }, "Embedding batch 1 (chunks 16-31) failed: rate limited");
            },
            embedQuery: async () => [],
        };

        const outcome = await createPipeline(failing).run(source, TEXT_INPUT);

        expect(outcome).toMatchObject({ stage: "failed", failureReason: "embedding" });
        await expect(store.countBySource(source.id)).resolves.toBe(0);
        await expect(sources.get(source.id)).resolves.toMatchObject({
            status: "failed",
            stage: "failed",
            failureReason: "embedding",
            errorDetail: "Embedding batch 1 (chunks 16-31) failed: rate limited",
            chunkCount: 0,
            metadata: { failedAt: "embedding" },
        });
    });

    it("fails the source when the second of three batches exhausts its retries", async () => {
        const source = await createSource();
        // 120 distinct-window characters: 8 chunks, batches of 3, 3 and 2.
        const text = Array.from({ length: 120 }, (_, i) => String.fromCharCode(97 + (i % 26))).join("");
        const poisoned = chunkText(text, { chunkSize: 20, overlap: 5 })[3]?.content;

        class FlakyProvider extends BaseEmbeddingProvider {
            attempts = 0;

            protected async sendEmbeddingRequest(chunks: string[]): Promise<number[][]> {
                if (poisoned !== undefined && chunks.includes(poisoned)) {
                    this.attempts += 1;
                    throw new Error("service unavailable");
                }
                return chunks.map(() => [1, 0, 0]);
            }
        }
        const embedding = new FlakyProvider(
            { provider: "openai", model: "test-embedding" },
            { batchSize: 3, concurrency: 1, retries: 2, minRetryDelayMs: 1, maxRetryDelayMs: 2 }
        );

        const outcome = await createPipeline(embedding).run(source, { kind: "text", text });

        expect(outcome).toMatchObject({
            stage: "failed",
            failureReason: "embedding",
            errorDetail: "Embedding batch 1 (chunks 3-5) failed: service unavailable",
        });
        expect(embedding.attempts).toBe(3);
        await expect(store.countBySource(source.id)).resolves.toBe(0);
        await expect(sources.get(source.id)).resolves.toMatchObject({ status: "failed", chunkCount: 0 });
    });

    it("fails with extraction when the text is too short", async () => {
        const source = await createSource();

        const outcome = await createPipeline().run(source, { kind: "text", text: "tiny" });

        expect(outcome).toMatchObject({ stage: "failed", failureReason: "extraction" });
        await expect(sources.get(source.id)).resolves.toMatchObject({ metadata: { failedAt: "extracting" } });
    });

    it("fails with no_content when extraction yields no chunks", async () => {
        const source = await createSource();
        const extractor = new StaticExtractor({ text: "   ", contentType: "text/plain", skippedPages: [], truncated: false });

        const outcome = await createPipeline(new FakeEmbeddingProvider(), { extractor }).run(source, TEXT_INPUT);

        expect(outcome).toMatchObject({ stage: "failed", failureReason: "no_content" });
        await expect(sources.get(source.id)).resolves.toMatchObject({ metadata: { failedAt: "chunking" } });
    });

    it("records page details from extraction", async () => {
        const source = await createSource();
        const extractor = new StaticExtractor({
            text: "solar flares and lunar cycles",
            title: "Astronomy",
            contentType: "application/pdf",
            pageCount: 3,
            skippedPages: [2],
            truncated: false,
        });

        await createPipeline(new FakeEmbeddingProvider(), { extractor }).run(source, TEXT_INPUT);

        await expect(sources.get(source.id)).resolves.toMatchObject({
            title: "Astronomy",
            status: "completed",
            metadata: { contentType: "application/pdf", pageCount: 3, skippedPages: [2] },
        });
    });

    it("stops without writing when the source is deleted mid-flight", async () => {
        const source = await createSource();
        const embedding = new FakeEmbeddingProvider();
        const deleting: EmbeddingProvider = {
            config: embedding.config,
            embedDocuments: async (chunks, options) => {
                await sources.softDelete(source.id);
                return embedding.embedDocuments(chunks, options);
            },
            embedQuery: (query, options) => embedding.embedQuery(query, options),
        };

        const outcome = await createPipeline(deleting).run(source, TEXT_INPUT);

        expect(outcome.stage).toBe("superseded");
        await expect(store.countBySource(source.id)).resolves.toBe(0);
    });

    it("removes stored chunks when the source is deleted during storing", async () => {
        const source = await createSource();

        class DeletingStore extends InMemoryChunkStore {
            async putBatch(sourceId: string, chunks: NewChunk[]): Promise<number> {
                const count = await super.putBatch(sourceId, chunks);
                await sources.softDelete(sourceId);
                return count;
            }
        }
        const chunkStore = new DeletingStore(3, state);

        const outcome = await createPipeline(new FakeEmbeddingProvider(), { chunkStore }).run(source, TEXT_INPUT);

        expect(outcome.stage).toBe("superseded");
        await expect(chunkStore.countBySource(source.id)).resolves.toBe(0);
    });

    it("removes stored chunks when completing the source fails", async () => {
        const source = await createSource();

        class FailingCompletion extends InMemorySourceRepository {
            async applyTransition(id: string, update: StageUpdate): Promise<SourceRecord | null> {
                if (update.to === "completed") {
                    throw new StorageError("connection reset");
                }
                return super.applyTransition(id, update);
            }
        }
        const sourceRepository = new FailingCompletion(state);

        const outcome = await createPipeline(new FakeEmbeddingProvider(), { sourceRepository }).run(source, TEXT_INPUT);

        expect(outcome).toMatchObject({ stage: "failed", failureReason: "storage", errorDetail: "connection reset" });
        await expect(store.countBySource(source.id)).resolves.toBe(0);
        await expect(store.search({ notebookId: "nb-1", embedding: [1, 0, 0], topK: 10, minSimilarity: 0 })).resolves.toEqual([]);
        await expect(sources.get(source.id)).resolves.toMatchObject({ status: "failed", metadata: { failedAt: "storing" } });
    });

    it("fails with extraction when fetching a URL times out", async () => {
        const source = await sources.create({ notebookId: "nb-1", kind: "url", title: "https://example.com/slow" });
        const extractor = new TextExtractor({
            fetchTimeoutMs: 10,
            fetch: (_input: RequestInfo | URL, init?: RequestInit) =>
                new Promise((_resolve, reject) => {
                    const signal = init?.signal;
                    if (signal) {
                        signal.addEventListener("abort", () => reject(signal.reason), { once: true });
                    }
                }),
        });

        const outcome = await createPipeline(new FakeEmbeddingProvider(), { extractor }).run(source, {
            kind: "url",
            url: "https://example.com/slow",
        });

        expect(outcome).toMatchObject({
            stage: "failed",
            failureReason: "extraction",
            errorDetail: "Fetching URL timed out after 0s.",
        });
    });

    it("records cancellation", async () => {
        const source = await createSource();
        const controller = new AbortController();
        const cancelling: EmbeddingProvider = {
            config: { provider: "openai", model: "test-embedding" },
            embedDocuments: async () => {
                controller.abort();
                throw new CancelledError("cancelled");
            },
            embedQuery: async () => [],
        };

        const outcome = await createPipeline(cancelling).run(source, TEXT_INPUT, { signal: controller.signal });

        expect(outcome).toMatchObject({ stage: "failed", failureReason: "cancelled" });
        await expect(store.countBySource(source.id)).resolves.toBe(0);
    });

    it("records a per-source timeout as cancellation", async () => {
        const source = await createSource();
        const controller = new AbortController();
        const timingOut: EmbeddingProvider = {
            config: { provider: "openai", model: "test-embedding" },
            embedDocuments: async () => {
                controller.abort(new CancelledError("timeout"));
                throw new Error("request aborted");
            },
            embedQuery: async () => [],
        };

        const outcome = await createPipeline(timingOut).run(source, TEXT_INPUT, { signal: controller.signal });

        expect(outcome).toMatchObject({ stage: "failed", failureReason: "cancelled", errorDetail: "Operation timed out." });
    });
});
