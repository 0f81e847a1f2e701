import { afterEach, describe, expect, it, vi } from "vitest";
import { loadAppConfig, validateConfig } from "../src/config/loadConfig";
import { createTestConfig } from "./helpers";

function stubRequiredEnv(): void {
    vi.stubEnv("RAG_SERVER_API_KEY", "test-secret");
    vi.stubEnv("RAG_LLM_EMBEDDING_PROVIDER", "openai");
    vi.stubEnv("RAG_LLM_EMBEDDING_MODEL", "text-embedding-3-small");
    vi.stubEnv("RAG_LLM_CHAT_PROVIDER", "mistral");
    vi.stubEnv("RAG_LLM_CHAT_MODEL", "mistral-small-latest");
}

describe("loadAppConfig", () => {
    afterEach(() => {
        vi.unstubAllEnvs();
    });

    it("applies defaults to a minimal environment", async () => {
        stubRequiredEnv();

        const config = await loadAppConfig();

        expect(config.ingest).toMatchObject({ chunkSize: 512, chunkOverlap: 100, processingTimeoutMinutes: 30 });
        expect(config.retrieval).toEqual({
            topK: 5,
            maxTopK: 10,
            minSimilarity: 0.7,
            retrievalShare: 0.6,
            historyTurns: 10,
            defaultContextTokens: 8000,
        });
        expect(config.llm.embedding.limits).toMatchObject({ batchSize: 16, concurrency: 3, retries: 3 });
        expect(config.llm.queryEmbedding.model).toBe("text-embedding-3-small");
        expect(config.llm.queryEmbedding.limits).toMatchObject({ concurrency: 2, retries: 1 });
        expect(config.llm.chat.provider).toBe("mistral");
    });

    it("requires an API key", async () => {
        stubRequiredEnv();
        vi.stubEnv("RAG_SERVER_API_KEY", "");

        await expect(loadAppConfig()).rejects.toThrow("Server configuration must include RAG_SERVER_API_KEY.");
    });

    it("rejects unknown providers", async () => {
        stubRequiredEnv();
        vi.stubEnv("RAG_LLM_CHAT_PROVIDER", "acme");

        await expect(loadAppConfig()).rejects.toThrow("RAG_LLM_CHAT_PROVIDER must be one of: openai, mistral.");
    });

    it("rejects non-numeric values", async () => {
        stubRequiredEnv();
        vi.stubEnv("RAG_CHUNK_SIZE", "large");

        await expect(loadAppConfig()).rejects.toThrow("Environment variable RAG_CHUNK_SIZE must be a valid number, got: large");
    });

    it("fails on an explicit env file that does not exist", async () => {
        await expect(loadAppConfig("does-not-exist.env")).rejects.toThrow('Failed to load environment file from "does-not-exist.env"');
    });
});

describe("validateConfig", () => {
    it("rejects an overlap as large as the chunk", () => {
        const config = createTestConfig();
        config.ingest.chunkOverlap = config.ingest.chunkSize;

        expect(() => validateConfig(config)).toThrow("RAG_CHUNK_OVERLAP must be between 0 and 39, got: 40");
    });

    it("rejects a context budget outside 1000-32000", () => {
        const config = createTestConfig();
        config.retrieval.defaultContextTokens = 500;

        expect(() => validateConfig(config)).toThrow("RAG_DEFAULT_CONTEXT_TOKENS must be between 1000 and 32000, got: 500");
    });

    it("accepts the test configuration", () => {
        const config = createTestConfig();
        expect(validateConfig(config)).toBe(config);
    });
});
