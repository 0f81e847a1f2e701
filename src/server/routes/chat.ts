import type { Request, Response } from "express";
import type { Logger } from "pino";
import { z } from "zod";
import type { ChatService } from "../../query/chat";
import type { MessageRecord, MessageRepository } from "../../store/types";
import { sendError } from "../utils/errors";

export interface ChatRouteContext {
    chat: ChatService;
}

export interface MessageHistoryRouteContext {
    messages: MessageRepository;
}

const historyQuerySchema = z.object({
    skip: z.coerce.number().int().min(0).default(0),
    limit: z.coerce.number().int().min(1).max(500).default(100),
});

function toMessageView(message: MessageRecord) {
    return {
        id: message.id,
        role: message.role,
        content: message.content,
        chunkIds: message.chunkIds,
        createdAt: message.createdAt.toISOString(),
    };
}

const messageSchema = z.object({
    message: z.string().trim().min(1).max(20_000),
    sourceId: z.string().trim().min(1).optional(),
});

export async function handleChatMessageRequest(
    req: Request,
    res: Response,
    context: ChatRouteContext,
    logger: Logger
): Promise<void> {
    const { notebookId, conversationId } = req.params;
    const abortController = new AbortController();

    const closeHandler = (): void => {
        if (res.writableEnded) {
            return;
        }
        abortController.abort();
    };
    res.on("close", closeHandler);

    try {
        const body = messageSchema.parse(req.body ?? {});
        const result = await context.chat.sendMessage({
            notebookId,
            conversationId,
            message: body.message,
            sourceId: body.sourceId,
            signal: abortController.signal,
        });

        res.json({
            status: "ok",
            message: toMessageView(result.assistantMessage),
            retrieval: result.retrieval,
            sources: result.sources,
            context: result.context,
        });
    } catch (error) {
        if (abortController.signal.aborted) {
            logger.info({ notebookId, conversationId }, "Client disconnected before the reply was ready.");
            return;
        }
        sendError(res, error, logger, { notebookId, conversationId });
    } finally {
        res.off("close", closeHandler);
    }
}

export async function handleListMessagesRequest(
    req: Request,
    res: Response,
    context: MessageHistoryRouteContext,
    logger: Logger
): Promise<void> {
    const { notebookId, conversationId } = req.params;

    try {
        const query = historyQuerySchema.parse(req.query);
        const messages = await context.messages.listPage({
            notebookId,
            conversationId,
            offset: query.skip,
            limit: query.limit,
        });
        res.json({ status: "ok", messages: messages.map(toMessageView) });
    } catch (error) {
        sendError(res, error, logger, { notebookId, conversationId });
    }
}
