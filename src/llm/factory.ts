import type { Logger } from "pino";
import type { LLMConfig, ChatModelConfig, EmbeddingModelConfig } from "../config/types";
import type { ChatProvider, EmbeddingProvider, LLMClientBundle } from "./types";
import { OpenAIChatProvider, OpenAIEmbeddingProvider } from "./providers/openai";
import { MistralChatProvider, MistralEmbeddingProvider } from "./providers/mistral";

function providerLogger(
    logger: Logger | undefined,
    scope: "chat" | "embedding" | "query-embedding",
    provider: string
): Logger | undefined {
    if (!logger) {
        return undefined;
    }

    return logger.child({ module: "llm", scope, provider });
}

export function createEmbeddingProvider(
    config: EmbeddingModelConfig,
    logger?: Logger,
    scope: "embedding" | "query-embedding" = "embedding"
): EmbeddingProvider {
    const scopedLogger = providerLogger(logger, scope, config.provider);

    switch (config.provider) {
        case "openai":
            return new OpenAIEmbeddingProvider(config, scopedLogger);
        case "mistral":
            return new MistralEmbeddingProvider(config, scopedLogger);
        default:
            throw new Error(`Embedding provider "${String(config.provider)}" is not supported.`);
    }
}

export function createChatProvider(config: ChatModelConfig, logger?: Logger): ChatProvider {
    const scopedLogger = providerLogger(logger, "chat", config.provider);

    switch (config.provider) {
        case "openai":
            return new OpenAIChatProvider(config, scopedLogger);
        case "mistral":
            return new MistralChatProvider(config, scopedLogger);
        default:
            throw new Error(`Chat provider "${String(config.provider)}" is not supported.`);
    }
}

/** Ingestion and query embeddings get separate provider instances, hence separate limiters. */
export function createLLMClient(config: LLMConfig, logger?: Logger): LLMClientBundle {
    return {
        embedding: createEmbeddingProvider(config.embedding, logger),
        queryEmbedding: createEmbeddingProvider(config.queryEmbedding, logger, "query-embedding"),
        chat: createChatProvider(config.chat, logger),
    };
}
