import type { Request, Response } from "express";
import type { Logger } from "pino";
import { z } from "zod";
import { NotFoundError, ValidationError } from "../../errors";
import { isSupportedFileType, parseHttpUrl } from "../../ingest/extractor";
import { guessContentType } from "../../ingest/objectStorage";
import type { IngestionRunner } from "../../ingest/runner";
import { toStatusView, type SourceInput } from "../../sources/types";
import type { ChunkStore, SourceRepository } from "../../store/types";
import { PayloadTooLargeError, sendError } from "../utils/errors";

export interface SourcesRouteContext {
    runner: IngestionRunner;
    sources: SourceRepository;
    chunks: ChunkStore;
    maxUploadBytes: number;
}

const BASE64_PATTERN = /^[A-Za-z0-9+/\r\n]*={0,2}$/;

const addSourceSchema = z
    .object({
        title: z.string().trim().max(255).optional(),
        text: z.string().optional(),
        url: z.string().trim().optional(),
        file: z
            .object({
                filename: z.string().trim().min(1).max(255),
                contentType: z.string().trim().optional(),
                contentBase64: z.string().min(1),
            })
            .optional(),
    })
    .refine(
        (body) => [body.text, body.url, body.file].filter((value) => value !== undefined).length === 1,
        { message: "Provide exactly one of text, url or file." }
    );

type AddSourceBody = z.infer<typeof addSourceSchema>;

export function toSourceInput(body: AddSourceBody, maxUploadBytes: number): SourceInput {
    if (body.text !== undefined) {
        if (!body.text.trim()) {
            throw new ValidationError("text must not be empty.");
        }
        return { kind: "text", text: body.text };
    }

    if (body.url !== undefined) {
        if (!parseHttpUrl(body.url)) {
            throw new ValidationError("Invalid URL. Only HTTP and HTTPS are supported.");
        }
        return { kind: "url", url: body.url };
    }

    if (body.file) {
        const { filename, contentBase64 } = body.file;
        const contentType = body.file.contentType || guessContentType(filename);

        if (!isSupportedFileType(contentType, filename)) {
            throw new ValidationError(`Unsupported file type "${contentType}". Upload PDF, text or markdown files.`);
        }
        if (!BASE64_PATTERN.test(contentBase64)) {
            throw new ValidationError("file.contentBase64 is not valid base64.");
        }

        const data = Buffer.from(contentBase64, "base64");
        if (data.length === 0) {
            throw new ValidationError("Uploaded file is empty.");
        }
        if (data.length > maxUploadBytes) {
            throw new PayloadTooLargeError(`File exceeds the ${Math.floor(maxUploadBytes / (1024 * 1024))} MB upload limit.`);
        }

        return { kind: "file", filename, contentType, data: new Uint8Array(data) };
    }

    throw new ValidationError("Provide exactly one of text, url or file.");
}

export async function handleAddSourceRequest(
    req: Request,
    res: Response,
    context: SourcesRouteContext,
    logger: Logger
): Promise<void> {
    const { notebookId } = req.params;

    try {
        const body = addSourceSchema.parse(req.body ?? {});
        const input = toSourceInput(body, context.maxUploadBytes);
        const source = await context.runner.submit(notebookId, input, { title: body.title });

        logger.info({ notebookId, sourceId: source.id, kind: source.kind }, "Source accepted for ingestion.");
        res.status(202).json({
            status: "accepted",
            message: "Source is being processed in the background.",
            source: toStatusView(source),
        });
    } catch (error) {
        sendError(res, error, logger, { notebookId });
    }
}

export async function handleListSourcesRequest(
    req: Request,
    res: Response,
    context: SourcesRouteContext,
    logger: Logger
): Promise<void> {
    const { notebookId } = req.params;

    try {
        const sources = await context.sources.listByNotebook(notebookId);
        res.json({ status: "ok", sources: sources.map(toStatusView) });
    } catch (error) {
        sendError(res, error, logger, { notebookId });
    }
}

export async function handleSourceStatusRequest(
    req: Request,
    res: Response,
    context: SourcesRouteContext,
    logger: Logger
): Promise<void> {
    const { sourceId } = req.params;

    try {
        const source = await context.sources.get(sourceId);
        if (!source) {
            throw new NotFoundError("Source", sourceId);
        }
        res.json({ status: "ok", source: toStatusView(source) });
    } catch (error) {
        sendError(res, error, logger, { sourceId });
    }
}

export async function handleDeleteSourceRequest(
    req: Request,
    res: Response,
    context: SourcesRouteContext,
    logger: Logger
): Promise<void> {
    const { sourceId } = req.params;

    try {
        const deleted = await context.sources.softDelete(sourceId);
        if (!deleted) {
            throw new NotFoundError("Source", sourceId);
        }

        context.runner.cancel(sourceId);
        const deletedChunks = await context.chunks.deleteBySource(sourceId);

        logger.info({ sourceId, deletedChunks }, "Source deleted.");
        res.json({ status: "ok", sourceId, deletedChunks });
    } catch (error) {
        sendError(res, error, logger, { sourceId });
    }
}

export async function handleDeleteNotebookSourcesRequest(
    req: Request,
    res: Response,
    context: SourcesRouteContext,
    logger: Logger
): Promise<void> {
    const { notebookId } = req.params;

    try {
        const deleted = await context.sources.softDeleteByNotebook(notebookId);
        for (const sourceId of deleted) {
            context.runner.cancel(sourceId);
        }

        logger.info({ notebookId, deletedSources: deleted.length }, "Notebook sources deleted.");
        res.json({ status: "ok", notebookId, deletedSources: deleted.length });
    } catch (error) {
        sendError(res, error, logger, { notebookId });
    }
}
