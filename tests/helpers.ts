import type { AppConfig, ChatModelConfig, EmbeddingModelConfig } from "../src/config/types";
import { throwIfAborted } from "../src/errors";
import type { ChatProvider, EmbedOptions, EmbeddingProvider, GenerateReplyOptions, LLMClientBundle } from "../src/llm/types";
import type { NewChunk } from "../src/store/types";

const KEYWORDS = ["solar", "lunar", "tidal"];

/** One axis per keyword, valued by how often it occurs. */
export function keywordVector(text: string): number[] {
    const lowered = text.toLowerCase();
    return KEYWORDS.map((keyword) => lowered.split(keyword).length - 1);
}

export class FakeEmbeddingProvider implements EmbeddingProvider {
    readonly config: EmbeddingModelConfig = { provider: "openai", model: "test-embedding" };
    readonly requests: string[][] = [];

    constructor(private readonly embed: (text: string) => number[] = keywordVector) {}

    async embedDocuments(chunks: string[], options?: EmbedOptions): Promise<number[][]> {
        throwIfAborted(options?.signal);
        this.requests.push([...chunks]);
        return chunks.map((chunk) => this.embed(chunk));
    }

    async embedQuery(query: string, options?: EmbedOptions): Promise<number[]> {
        const [embedding] = await this.embedDocuments([query], options);
        return embedding ?? [];
    }
}

/** Never resolves on its own; rejects with the abort reason once cancelled. */
export class BlockingEmbeddingProvider implements EmbeddingProvider {
    readonly config: EmbeddingModelConfig = { provider: "openai", model: "test-embedding" };
    readonly started: Promise<void>;
    private markStarted: () => void = () => undefined;

    constructor() {
        this.started = new Promise((resolve) => {
            this.markStarted = resolve;
        });
    }

    embedDocuments(_chunks: string[], options?: EmbedOptions): Promise<number[][]> {
        this.markStarted();
        return new Promise((_resolve, reject) => {
            const signal = options?.signal;
            if (!signal) {
                reject(new Error("A signal is required."));
                return;
            }
            if (signal.aborted) {
                reject(signal.reason);
                return;
            }
            signal.addEventListener("abort", () => reject(signal.reason), { once: true });
        });
    }

    async embedQuery(query: string, options?: EmbedOptions): Promise<number[]> {
        const [embedding] = await this.embedDocuments([query], options);
        return embedding ?? [];
    }
}

export class FakeChatProvider implements ChatProvider {
    readonly config: ChatModelConfig = { provider: "openai", model: "test-chat", temperature: 0 };
    readonly calls: GenerateReplyOptions[] = [];

    constructor(private readonly reply: (options: GenerateReplyOptions) => Promise<string> = async () => "Test reply.") {}

    async generateReply(options: GenerateReplyOptions): Promise<string> {
        this.calls.push(options);
        return this.reply(options);
    }
}

export function createFakeLLM(embedding: EmbeddingProvider = new FakeEmbeddingProvider(), chat: ChatProvider = new FakeChatProvider()): LLMClientBundle {
    return { embedding, queryEmbedding: embedding, chat };
}

export function makeChunks(
    sourceId: string,
    notebookId: string,
    embeddings: number[][],
    content: (ordinal: number) => string = (ordinal) => `chunk ${ordinal}`
): NewChunk[] {
    return embeddings.map((embedding, ordinal) => ({
        sourceId,
        notebookId,
        ordinal,
        content: content(ordinal),
        embedding,
        metadata: { start: ordinal * 10, end: ordinal * 10 + 10 },
    }));
}

export function createTestConfig(overrides: Partial<AppConfig> = {}): AppConfig {
    const embedding: EmbeddingModelConfig = { provider: "openai", model: "test-embedding", apiKey: "test-secret" };

    return {
        server: { apiKey: "test-secret", port: 0, maxUploadBytes: 1024 * 1024 },
        database: { vectorDimension: 3 },
        logging: { level: "error", pretty: false },
        ingest: {
            chunkSize: 40,
            chunkOverlap: 10,
            concurrency: 2,
            timeoutSeconds: 60,
            processingTimeoutMinutes: 30,
            sweepIntervalMinutes: 0,
            urlFetchTimeoutSeconds: 5,
            maxTextChars: 100_000,
        },
        retrieval: {
            topK: 5,
            maxTopK: 10,
            minSimilarity: 0.7,
            retrievalShare: 0.6,
            historyTurns: 10,
            defaultContextTokens: 8000,
        },
        llm: {
            embedding,
            queryEmbedding: embedding,
            chat: { provider: "openai", model: "test-chat", apiKey: "test-secret", temperature: 0 },
        },
        ...overrides,
    };
}
