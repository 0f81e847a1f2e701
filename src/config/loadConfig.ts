import { config as loadDotenv } from "dotenv";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import type { AppConfig, EmbeddingModelConfig, LLMProviderName, LoggingConfig } from "./types";

const PACKAGE_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..", "..");

const providerNameSchema = z.enum(["openai", "mistral"]);
const logLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace"]);

function getEnv(key: string, required = true): string | undefined {
    const value = process.env[key];
    if (required && !value) {
        throw new Error(`Missing required environment variable: ${key}`);
    }
    return value;
}

function getEnvNumber(key: string): number | undefined;
function getEnvNumber(key: string, defaultValue: number): number;
function getEnvNumber(key: string, defaultValue?: number): number | undefined {
    const value = process.env[key];
    if (!value) {
        return defaultValue;
    }
    const parsed = Number.parseFloat(value);
    if (Number.isNaN(parsed)) {
        throw new Error(`Environment variable ${key} must be a valid number, got: ${value}`);
    }
    return parsed;
}

function getEnvBoolean(key: string, defaultValue = false): boolean {
    const value = process.env[key];
    if (!value) {
        return defaultValue;
    }
    const lowered = value.toLowerCase().trim();
    return lowered === "true" || lowered === "1" || lowered === "yes";
}

function getProvider(key: string): LLMProviderName {
    const parsed = providerNameSchema.safeParse(getEnv(key));
    if (!parsed.success) {
        throw new Error(`${key} must be one of: ${providerNameSchema.options.join(", ")}.`);
    }
    return parsed.data;
}

function getLogLevel(key: string): LoggingConfig["level"] {
    const parsed = logLevelSchema.safeParse(getEnv(key, false) ?? "info");
    if (!parsed.success) {
        throw new Error(`${key} must be one of: ${logLevelSchema.options.join(", ")}.`);
    }
    return parsed.data;
}

function assertRange(name: string, value: number, min: number, max: number): void {
    if (!Number.isFinite(value) || value < min || value > max) {
        throw new Error(`${name} must be between ${min} and ${max}, got: ${value}`);
    }
}

export function resolveConfigPath(providedPath?: string): string {
    if (providedPath) {
        return path.resolve(process.cwd(), providedPath);
    }

    if (process.env.RAG_CONFIG_PATH) {
        return path.resolve(process.cwd(), process.env.RAG_CONFIG_PATH);
    }

    return path.join(PACKAGE_ROOT, ".env");
}

export function validateConfig(config: AppConfig): AppConfig {
    const { ingest, retrieval, database } = config;

    assertRange("RAG_CHUNK_SIZE", ingest.chunkSize, 1, 100_000);
    assertRange("RAG_CHUNK_OVERLAP", ingest.chunkOverlap, 0, ingest.chunkSize - 1);
    assertRange("RAG_INGEST_CONCURRENCY", ingest.concurrency, 1, 64);
    assertRange("RAG_VECTOR_DIMENSION", database.vectorDimension, 1, 16_000);
    assertRange("RAG_RETRIEVAL_MAX_TOP_K", retrieval.maxTopK, 1, 100);
    assertRange("RAG_RETRIEVAL_TOP_K", retrieval.topK, 1, retrieval.maxTopK);
    assertRange("RAG_RETRIEVAL_MIN_SIMILARITY", retrieval.minSimilarity, -1, 1);
    assertRange("RAG_RETRIEVAL_SHARE", retrieval.retrievalShare, 0, 1);
    assertRange("RAG_DEFAULT_CONTEXT_TOKENS", retrieval.defaultContextTokens, 1_000, 32_000);

    return config;
}

export async function loadAppConfig(configPath?: string): Promise<AppConfig> {
    const envPath = configPath ?? resolveConfigPath();
    const result = loadDotenv({ path: envPath });

    if (result.error) {
        // An explicit path must exist; otherwise the environment may already be populated.
        if (configPath) {
            throw new Error(`Failed to load environment file from "${configPath}": ${result.error.message}`);
        }
    }

    const apiKey = getEnv("RAG_SERVER_API_KEY", false);
    if (!apiKey) {
        throw new Error("Server configuration must include RAG_SERVER_API_KEY.");
    }

    const embeddingModel = getEnv("RAG_LLM_EMBEDDING_MODEL", false);
    const chatModel = getEnv("RAG_LLM_CHAT_MODEL", false);

    if (!embeddingModel || !chatModel) {
        throw new Error("LLM configuration requires RAG_LLM_EMBEDDING_MODEL and RAG_LLM_CHAT_MODEL.");
    }

    const embedding: EmbeddingModelConfig = {
        provider: getProvider("RAG_LLM_EMBEDDING_PROVIDER"),
        model: embeddingModel,
        apiKey: getEnv("RAG_LLM_EMBEDDING_API_KEY", false),
        baseUrl: getEnv("RAG_LLM_EMBEDDING_BASE_URL", false),
        limits: {
            batchSize: getEnvNumber("RAG_LLM_EMBEDDING_LIMITS_BATCH_SIZE", 16),
            concurrency: getEnvNumber("RAG_LLM_EMBEDDING_LIMITS_CONCURRENCY", 3),
            maxRequestsPerMinute: getEnvNumber("RAG_LLM_EMBEDDING_LIMITS_MAX_REQUESTS_PER_MINUTE", 1500),
            maxTokensPerMinute: getEnvNumber("RAG_LLM_EMBEDDING_LIMITS_MAX_TOKENS_PER_MINUTE", 1_000_000),
            retries: getEnvNumber("RAG_LLM_EMBEDDING_LIMITS_RETRIES", 3),
            minRetryDelayMs: getEnvNumber("RAG_LLM_EMBEDDING_LIMITS_MIN_RETRY_DELAY_MS", 1000),
            maxRetryDelayMs: getEnvNumber("RAG_LLM_EMBEDDING_LIMITS_MAX_RETRY_DELAY_MS", 30_000),
        },
    };

    const config: AppConfig = {
        logging: {
            level: getLogLevel("RAG_LOGGING_LEVEL"),
            pretty: getEnvBoolean("RAG_LOGGING_PRETTY", true),
        },
        server: {
            apiKey,
            port: getEnvNumber("PORT", 3000),
            maxUploadBytes: Math.floor(getEnvNumber("RAG_MAX_UPLOAD_MB", 25) * 1024 * 1024),
        },
        database: {
            databaseUrl: getEnv("RAG_DATABASE_URL", false),
            vectorDimension: getEnvNumber("RAG_VECTOR_DIMENSION", 1536),
        },
        ingest: {
            chunkSize: getEnvNumber("RAG_CHUNK_SIZE", 512),
            chunkOverlap: getEnvNumber("RAG_CHUNK_OVERLAP", 100),
            concurrency: getEnvNumber("RAG_INGEST_CONCURRENCY", 4),
            timeoutSeconds: getEnvNumber("RAG_INGEST_TIMEOUT_SECONDS", 1800),
            processingTimeoutMinutes: getEnvNumber("RAG_PROCESSING_TIMEOUT_MINUTES", 30),
            sweepIntervalMinutes: getEnvNumber("RAG_SWEEP_INTERVAL_MINUTES", 5),
            urlFetchTimeoutSeconds: getEnvNumber("RAG_URL_FETCH_TIMEOUT_SECONDS", 30),
            maxTextChars: getEnvNumber("RAG_MAX_TEXT_CHARS", 10 * 1024 * 1024),
        },
        retrieval: {
            topK: getEnvNumber("RAG_RETRIEVAL_TOP_K", 5),
            maxTopK: getEnvNumber("RAG_RETRIEVAL_MAX_TOP_K", 10),
            minSimilarity: getEnvNumber("RAG_RETRIEVAL_MIN_SIMILARITY", 0.7),
            retrievalShare: getEnvNumber("RAG_RETRIEVAL_SHARE", 0.6),
            historyTurns: getEnvNumber("RAG_HISTORY_TURNS", 10),
            defaultContextTokens: getEnvNumber("RAG_DEFAULT_CONTEXT_TOKENS", 8000),
        },
        llm: {
            embedding,
            // Same model as ingestion, own limiter and pool.
            queryEmbedding: {
                ...embedding,
                limits: {
                    ...embedding.limits,
                    concurrency: getEnvNumber("RAG_LLM_QUERY_EMBEDDING_LIMITS_CONCURRENCY", 2),
                    retries: getEnvNumber("RAG_LLM_QUERY_EMBEDDING_LIMITS_RETRIES", 1),
                },
            },
            chat: {
                provider: getProvider("RAG_LLM_CHAT_PROVIDER"),
                model: chatModel,
                apiKey: getEnv("RAG_LLM_CHAT_API_KEY", false),
                baseUrl: getEnv("RAG_LLM_CHAT_BASE_URL", false),
                temperature: getEnvNumber("RAG_LLM_CHAT_TEMPERATURE", 0.2),
                maxOutputTokens: getEnvNumber("RAG_LLM_CHAT_MAX_OUTPUT_TOKENS", 1024),
                limits: {
                    concurrency: getEnvNumber("RAG_LLM_CHAT_LIMITS_CONCURRENCY", 4),
                    maxRequestsPerMinute: getEnvNumber("RAG_LLM_CHAT_LIMITS_MAX_REQUESTS_PER_MINUTE", 500),
                    maxTokensPerMinute: getEnvNumber("RAG_LLM_CHAT_LIMITS_MAX_TOKENS_PER_MINUTE", 90_000),
                    retries: getEnvNumber("RAG_LLM_CHAT_LIMITS_RETRIES", 2),
                },
            },
        },
    };

    return validateConfig(config);
}
