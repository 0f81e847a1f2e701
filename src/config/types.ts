export interface LoggingConfig {
    level: "fatal" | "error" | "warn" | "info" | "debug" | "trace";
    pretty: boolean;
}

export interface ServerConfig {
    apiKey: string;
    port: number;
    maxUploadBytes: number;
}

export interface DatabaseConfig {
    databaseUrl?: string;
    vectorDimension: number;
}

export interface IngestConfig {
    chunkSize: number;
    chunkOverlap: number;
    concurrency: number;
    timeoutSeconds: number;
    processingTimeoutMinutes: number;
    sweepIntervalMinutes: number;
    urlFetchTimeoutSeconds: number;
    maxTextChars: number;
}

export interface RetrievalConfig {
    topK: number;
    maxTopK: number;
    minSimilarity: number;
    retrievalShare: number;
    historyTurns: number;
    defaultContextTokens: number;
}

export type LLMProviderName =
    | "openai"
    | "mistral";

export interface ProviderLimitsConfig {
    batchSize?: number;
    concurrency?: number;
    maxRequestsPerMinute?: number;
    maxTokensPerMinute?: number;
    retries?: number;
    minRetryDelayMs?: number;
    maxRetryDelayMs?: number;
}

interface BaseModelConfig {
    provider: LLMProviderName;
    apiKey?: string;
    baseUrl?: string;
    limits?: ProviderLimitsConfig;
}

export interface EmbeddingModelConfig extends BaseModelConfig {
    model: string;
}

export interface ChatModelConfig extends BaseModelConfig {
    model: string;
    maxOutputTokens?: number;
    temperature: number;
}

export interface LLMConfig {
    embedding: EmbeddingModelConfig;
    queryEmbedding: EmbeddingModelConfig;
    chat: ChatModelConfig;
}

export interface AppConfig {
    server: ServerConfig;
    database: DatabaseConfig;
    logging: LoggingConfig;
    ingest: IngestConfig;
    retrieval: RetrievalConfig;
    llm: LLMConfig;
}
