import type { Request, Response } from "express";
import type { Logger } from "pino";
import { z } from "zod";
import type { RetrievalEngine } from "../../query/retrieval";
import { sendError } from "../utils/errors";

export interface SearchRouteContext {
    retrieval: RetrievalEngine;
}

const searchSchema = z.object({
    query: z.string().trim().min(1),
    sourceId: z.string().trim().min(1).optional(),
    topK: z.number().int().min(1).optional(),
    minSimilarity: z.number().min(-1).max(1).optional(),
});

export async function handleSearchRequest(
    req: Request,
    res: Response,
    context: SearchRouteContext,
    logger: Logger
): Promise<void> {
    const { notebookId } = req.params;

    try {
        const body = searchSchema.parse(req.body ?? {});
        const result = await context.retrieval.retrieve({
            query: body.query,
            notebookId,
            sourceId: body.sourceId,
            topK: body.topK,
            minSimilarity: body.minSimilarity,
        });

        res.json({
            status: "ok",
            topK: result.topK,
            minSimilarity: result.minSimilarity,
            results: result.chunks.map((chunk) => ({
                chunkId: chunk.id,
                sourceId: chunk.sourceId,
                ordinal: chunk.ordinal,
                similarity: chunk.similarity,
                content: chunk.content,
                metadata: chunk.metadata,
            })),
        });
    } catch (error) {
        sendError(res, error, logger, { notebookId });
    }
}
