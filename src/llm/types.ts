import type { ChatModelConfig, EmbeddingModelConfig } from "../config/types";

export interface EmbedOptions {
    signal?: AbortSignal;
}

export type ChatRole = "user" | "assistant" | "system";

export interface HistoryTurn {
    role: ChatRole;
    content: string;
}

export interface GenerateReplyOptions {
    question: string;
    /** Rendered retrieval context; empty when the reply is ungrounded. */
    context: string;
    history: HistoryTurn[];
    grounded: boolean;
    systemPrompt?: string;
    temperature?: number;
    maxTokens?: number;
    signal?: AbortSignal;
}

export interface EmbeddingProvider {
    readonly config: EmbeddingModelConfig;
    embedDocuments(chunks: string[], options?: EmbedOptions): Promise<number[][]>;
    embedQuery(query: string, options?: EmbedOptions): Promise<number[]>;
}

export interface ChatProvider {
    readonly config: ChatModelConfig;
    generateReply(options: GenerateReplyOptions): Promise<string>;
}

export interface LLMClientBundle {
    /** Ingestion pool. */
    embedding: EmbeddingProvider;
    /** Interactive query pool. */
    queryEmbedding: EmbeddingProvider;
    chat: ChatProvider;
}
