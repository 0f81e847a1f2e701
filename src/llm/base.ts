import Bottleneck from "bottleneck";
import pLimit from "p-limit";
import pRetry, { AbortError, type FailedAttemptError } from "p-retry";
import { APICallError } from "ai";
import type { Logger } from "pino";
import type { ChatModelConfig, EmbeddingModelConfig } from "../config/types";
import { EmbeddingError, getErrorMessage, throwIfAborted, toCancelledError } from "../errors";
import { linkSignal } from "../utils/abort";
import { batchChunks, type IndexedBatch } from "../utils/batchChunks";
import { createRateLimiter } from "../utils/rateLimiter";
import { countTokens, countTokensInBatch } from "../utils/tokenEncoder";
import type { ChatProvider, EmbedOptions, EmbeddingProvider, GenerateReplyOptions } from "./types";

export interface ProviderRateLimits {
    batchSize?: number;
    concurrency?: number;
    maxRequestsPerMinute?: number;
    maxTokensPerMinute?: number;
    retries?: number;
    minRetryDelayMs?: number;
    maxRetryDelayMs?: number;
}

interface ScheduleOptions {
    logPrefix: string;
    signal?: AbortSignal;
}

// Authentication, billing and malformed requests fail the same way on every attempt.
const NON_RETRYABLE_STATUS = new Set([400, 401, 402, 403, 404]);

export function isRetryableProviderError(error: unknown): boolean {
    if (APICallError.isInstance(error)) {
        const status = error.statusCode;
        return status === undefined || !NON_RETRYABLE_STATUS.has(status);
    }
    return true;
}

/**
 * Request limiter, optional token limiter and exponential-backoff retries
 * shared by every provider call.
 */
class ProviderScheduler {
    private readonly requestLimiter: Bottleneck;
    private readonly tokenLimiter?: Bottleneck;

    constructor(
        private readonly concurrency: number,
        private readonly limits: ProviderRateLimits,
        private readonly logger?: Logger
    ) {
        this.requestLimiter = createRateLimiter(concurrency, limits.maxRequestsPerMinute);

        if(limits.maxTokensPerMinute && Number.isFinite(limits.maxTokensPerMinute)) {
            const tokenConcurrency = Math.max(
                concurrency,
                Math.ceil(limits.maxTokensPerMinute)
            );
            this.tokenLimiter = createRateLimiter(tokenConcurrency, limits.maxTokensPerMinute);
        }
    }

    get retries(): number {
        return Math.max(0, this.limits.retries ?? 3);
    }

    async schedule<T>(estimateTokens: () => number, task: () => Promise<T>, { logPrefix, signal }: ScheduleOptions): Promise<T> {
        await this.reserveTokens(estimateTokens);
        return this.requestLimiter.schedule(() =>
            pRetry(
                async () => {
                    try {
                        return await task();
                    } catch (error) {
                        if (!isRetryableProviderError(error)) {
                            throw new AbortError(error instanceof Error ? error : new Error(String(error)));
                        }
                        throw error;
                    }
                },
                {
                    retries: this.retries,
                    factor: 2,
                    minTimeout: this.limits.minRetryDelayMs ?? 1_000,
                    maxTimeout: this.limits.maxRetryDelayMs ?? 30_000,
                    signal,
                    onFailedAttempt: (error: FailedAttemptError) => {
                        this.logger?.warn(
                            {
                                attemptNumber: error.attemptNumber,
                                retriesLeft: error.retriesLeft,
                                error: error.message,
                            },
                            `${logPrefix} failed attempt`
                        );
                    },
                }
            )
        );
    }

    private async reserveTokens(estimateTokens: () => number): Promise<void> {
        if(!this.tokenLimiter) {
            return;
        }

        const tokens = estimateTokens();
        if (tokens <= 0) {
            return;
        }

        const weight = Math.max(1, Math.ceil(tokens));
        await this.tokenLimiter.schedule({ weight }, async () => undefined);
    }
}

export abstract class BaseEmbeddingProvider implements EmbeddingProvider {
    protected readonly concurrencyLimit: number;
    protected readonly batchSize: number;

    private readonly scheduler: ProviderScheduler;

    constructor(
        public readonly config: EmbeddingModelConfig,
        limits: ProviderRateLimits,
        protected readonly logger?: Logger
    ) {
        this.batchSize = Math.max(1, Math.floor(limits.batchSize ?? 16));
        this.concurrencyLimit = Math.max(1, limits.concurrency ?? 3);
        this.scheduler = new ProviderScheduler(this.concurrencyLimit, limits, logger);
    }

    /**
     * Embeds `chunks` in batches of `batchSize`, at most `concurrency` batches
     * in flight. Output order always matches input order. The first batch to
     * exhaust its retries aborts the rest and surfaces as an EmbeddingError.
     */
    async embedDocuments(chunks: string[], options?: EmbedOptions): Promise<number[][]> {
        if(chunks.length === 0) {
            return [];
        }
        throwIfAborted(options?.signal);

        const batches = batchChunks(chunks, this.batchSize);
        const limit = pLimit(this.concurrencyLimit);
        const logPrefix = `${this.config.provider}:embed`;
        const linked = linkSignal(options?.signal);

        try {
            const results = await Promise.all(
                batches.map((batch) =>
                    limit(async () => {
                        const embeddings = await this.embedBatch(batch, linked.signal, logPrefix);
                        return { batchIndex: batch.batchIndex, embeddings };
                    }).catch((error: unknown) => {
                        linked.abort(error);
                        throw error;
                    })
                )
            );

            const ordered = results.sort((a, b) => a.batchIndex - b.batchIndex);
            return ordered.flatMap((entry) => entry.embeddings);
        } catch (error) {
            if (options?.signal?.aborted) {
                throw toCancelledError(options.signal);
            }
            throw error;
        } finally {
            linked.dispose();
        }
    }

    async embedQuery(query: string, options?: EmbedOptions): Promise<number[]> {
        const [embedding] = await this.embedDocuments([query], options);
        if (!embedding) {
            throw new EmbeddingError({ batchIndex: 0, startIndex: 0, endIndex: 1 }, "Provider returned no embedding for the query.");
        }
        return embedding;
    }

    protected abstract sendEmbeddingRequest(chunks: string[], options?: EmbedOptions): Promise<number[][]>;

    private async embedBatch(batch: IndexedBatch<string>, signal: AbortSignal, logPrefix: string): Promise<number[][]> {
        const location = {
            batchIndex: batch.batchIndex,
            startIndex: batch.startIndex,
            endIndex: batch.startIndex + batch.items.length,
        };

        try {
            throwIfAborted(signal);
            return await this.scheduler.schedule(
                () => countTokensInBatch(batch.items, this.config.model),
                async () => {
                    const embeddings = await this.sendEmbeddingRequest(batch.items, { signal });
                    if (embeddings.length !== batch.items.length) {
                        throw new Error(`Expected ${batch.items.length} embeddings, received ${embeddings.length}.`);
                    }
                    return embeddings;
                },
                { logPrefix, signal }
            );
        } catch (error) {
            throw new EmbeddingError(
                location,
                `Embedding batch ${location.batchIndex} (chunks ${location.startIndex}-${location.endIndex - 1}) failed: ${getErrorMessage(error)}`,
                { cause: error }
            );
        }
    }
}

export abstract class BaseChatProvider implements ChatProvider {
    protected readonly concurrencyLimit: number;

    private readonly scheduler: ProviderScheduler;

    constructor(
        public readonly config: ChatModelConfig,
        limits: ProviderRateLimits,
        protected readonly logger?: Logger
    ) {
        this.concurrencyLimit = Math.max(1, limits.concurrency ?? 4);
        this.scheduler = new ProviderScheduler(this.concurrencyLimit, limits, logger);
    }

    async generateReply(options: GenerateReplyOptions): Promise<string> {
        return this.scheduler.schedule(() => this.estimateChatTokens(options), () => this.complete(options), {
            logPrefix: `${this.config.provider}:chat`,
            signal: options.signal,
        });
    }

    protected estimateChatTokens(options: GenerateReplyOptions): number {
        const model = this.config.model;
        let tokens = countTokens(options.question, model) + countTokens(options.context, model);

        if(options.systemPrompt) {
            tokens += countTokens(options.systemPrompt, model);
        }

        tokens += options.history.reduce((sum, turn) => sum + countTokens(turn.content, model), 0);
        tokens += options.maxTokens ?? this.config.maxOutputTokens ?? 1000;
        return tokens;
    }

    protected abstract complete(options: GenerateReplyOptions): Promise<string>;
}
