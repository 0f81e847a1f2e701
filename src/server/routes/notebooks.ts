import type { Request, Response } from "express";
import type { Logger } from "pino";
import { z } from "zod";
import type { NotebookRepository } from "../../store/types";
import { sendError } from "../utils/errors";

export interface NotebookRouteContext {
    notebooks: NotebookRepository;
    defaultContextTokens: number;
}

const settingsSchema = z.object({
    maxContextTokens: z.number().int().min(1000).max(32000),
});

export async function handleGetNotebookSettingsRequest(
    req: Request,
    res: Response,
    context: NotebookRouteContext,
    logger: Logger
): Promise<void> {
    const { notebookId } = req.params;

    try {
        const settings = await context.notebooks.getSettings(notebookId);
        res.json({
            status: "ok",
            settings: settings ?? { notebookId, maxContextTokens: context.defaultContextTokens },
        });
    } catch (error) {
        sendError(res, error, logger, { notebookId });
    }
}

export async function handleUpdateNotebookSettingsRequest(
    req: Request,
    res: Response,
    context: NotebookRouteContext,
    logger: Logger
): Promise<void> {
    const { notebookId } = req.params;

    try {
        const body = settingsSchema.parse(req.body ?? {});
        const settings = await context.notebooks.saveSettings({ notebookId, maxContextTokens: body.maxContextTokens });
        res.json({ status: "ok", settings });
    } catch (error) {
        sendError(res, error, logger, { notebookId });
    }
}
