import type { Logger } from "pino";
import { CancelledError, RetrievalError, ValidationError } from "../errors";
import type { ChatProvider, HistoryTurn } from "../llm/types";
import type { MessageRecord, MessageRepository, NotebookRepository, RetrievedChunk } from "../store/types";
import { createSilentLogger } from "../utils/logger";
import { ContextAssembler, type AssembledContext } from "./contextAssembler";
import type { RetrievalEngine } from "./retrieval";

export interface ChatServiceOptions {
    historyTurns: number;
    defaultContextTokens: number;
    retrievalShare: number;
}

export interface ChatServiceDeps {
    retrieval: RetrievalEngine;
    chat: ChatProvider;
    messages: MessageRepository;
    notebooks: NotebookRepository;
    assembler?: ContextAssembler;
    options?: Partial<ChatServiceOptions>;
    logger?: Logger;
}

export interface SendMessageRequest {
    notebookId: string;
    conversationId: string;
    message: string;
    sourceId?: string;
    signal?: AbortSignal;
}

export type RetrievalOutcome = "grounded" | "no_matches" | "failed";

export interface SendMessageResult {
    userMessage: MessageRecord;
    assistantMessage: MessageRecord;
    retrieval: RetrievalOutcome;
    sources: Array<Pick<RetrievedChunk, "id" | "sourceId" | "ordinal" | "similarity">>;
    context: Pick<AssembledContext, "tokenCount" | "truncated">;
}

export const DEFAULT_CHAT_OPTIONS: ChatServiceOptions = {
    historyTurns: 10,
    defaultContextTokens: 8000,
    retrievalShare: 0.6,
};

export const GENERATION_FALLBACK_REPLY =
    "Sorry, I couldn't generate a response right now. Please try again in a moment.";

export class ChatService {
    private readonly options: ChatServiceOptions;
    private readonly assembler: ContextAssembler;
    private readonly logger: Logger;

    constructor(private readonly deps: ChatServiceDeps) {
        this.options = { ...DEFAULT_CHAT_OPTIONS, ...deps.options };
        this.assembler = deps.assembler ?? new ContextAssembler();
        this.logger = deps.logger ?? createSilentLogger();
    }

    /**
     * Retrieves, assembles and generates a reply, then records both turns.
     * A retrieval failure degrades to an ungrounded reply flagged as such;
     * the assistant message always carries the chunk ids it was given.
     */
    async sendMessage(request: SendMessageRequest): Promise<SendMessageResult> {
        const message = request.message.trim();
        if (!message) {
            throw new ValidationError("Message must not be empty.");
        }

        const logger = this.logger.child({ notebookId: request.notebookId, conversationId: request.conversationId });
        const [recent, settings] = await Promise.all([
            this.deps.messages.listRecent(request.conversationId, this.options.historyTurns),
            this.deps.notebooks.getSettings(request.notebookId),
        ]);
        const history: HistoryTurn[] = recent.map((entry) => ({ role: entry.role, content: entry.content }));

        let chunks: RetrievedChunk[] = [];
        let retrieval: RetrievalOutcome;
        try {
            const result = await this.deps.retrieval.retrieve({
                query: message,
                notebookId: request.notebookId,
                sourceId: request.sourceId,
                signal: request.signal,
            });
            chunks = result.chunks;
            retrieval = chunks.length > 0 ? "grounded" : "no_matches";
        } catch (error) {
            if (!(error instanceof RetrievalError)) {
                throw error;
            }
            logger.warn({ err: error, stage: error.stage }, "Retrieval failed, answering without sources.");
            retrieval = "failed";
        }

        const assembled = this.assembler.assemble({
            chunks,
            history,
            budgetTokens: settings?.maxContextTokens ?? this.options.defaultContextTokens,
            retrievalShare: this.options.retrievalShare,
        });
        const grounded = assembled.chunkIds.length > 0;
        const usedChunks = chunks.filter((chunk) => assembled.chunkIds.includes(chunk.id));

        let reply: string;
        let generationFailed = false;
        try {
            reply = await this.deps.chat.generateReply({
                question: message,
                context: assembled.context,
                history: assembled.history,
                grounded,
                signal: request.signal,
            });
        } catch (error) {
            if (error instanceof CancelledError || request.signal?.aborted) {
                throw error;
            }
            logger.error({ err: error }, "Reply generation failed.");
            reply = GENERATION_FALLBACK_REPLY;
            generationFailed = true;
        }

        const userMessage = await this.deps.messages.append({
            conversationId: request.conversationId,
            notebookId: request.notebookId,
            role: "user",
            content: message,
            chunkIds: assembled.chunkIds,
            metadata: request.sourceId ? { sourceId: request.sourceId } : {},
        });

        const assistantMessage = await this.deps.messages.append({
            conversationId: request.conversationId,
            notebookId: request.notebookId,
            role: "assistant",
            content: reply,
            chunkIds: assembled.chunkIds,
            metadata: {
                retrieval,
                grounded,
                contextTokens: assembled.tokenCount,
                truncated: assembled.truncated,
                ...(generationFailed ? { generationFailed: true } : {}),
            },
        });

        logger.info({ retrieval, chunkCount: assembled.chunkIds.length, tokens: assembled.tokenCount }, "Chat reply recorded.");

        return {
            userMessage,
            assistantMessage,
            retrieval,
            sources: usedChunks.map(({ id, sourceId, ordinal, similarity }) => ({ id, sourceId, ordinal, similarity })),
            context: { tokenCount: assembled.tokenCount, truncated: assembled.truncated },
        };
    }
}
