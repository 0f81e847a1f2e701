import { Router } from "express";
import type { Logger } from "pino";
import type { AppServices } from "../../app";
import { handleChatMessageRequest, handleListMessagesRequest } from "../routes/chat";
import { handleHealthRequest } from "../routes/health";
import { handleGetNotebookSettingsRequest, handleUpdateNotebookSettingsRequest } from "../routes/notebooks";
import { handleSearchRequest } from "../routes/search";
import {
    handleAddSourceRequest,
    handleDeleteNotebookSourcesRequest,
    handleDeleteSourceRequest,
    handleListSourcesRequest,
    handleSourceStatusRequest,
    type SourcesRouteContext,
} from "../routes/sources";

export function createApiRouter(context: AppServices, logger: Logger): Router {
    const router = Router();

    const sourcesContext: SourcesRouteContext = {
        runner: context.runner,
        sources: context.repositories.sources,
        chunks: context.repositories.chunks,
        maxUploadBytes: context.config.server.maxUploadBytes,
    };
    const notebookContext = {
        notebooks: context.repositories.notebooks,
        defaultContextTokens: context.config.retrieval.defaultContextTokens,
    };

    router.get("/health", (req, res) => {
        handleHealthRequest(req, res, { activeIngestions: context.runner.activeCount });
    });

    router.post("/notebooks/:notebookId/sources", async (req, res) => {
        await handleAddSourceRequest(req, res, sourcesContext, logger);
    });

    router.get("/notebooks/:notebookId/sources", async (req, res) => {
        await handleListSourcesRequest(req, res, sourcesContext, logger);
    });

    router.delete("/notebooks/:notebookId/sources", async (req, res) => {
        await handleDeleteNotebookSourcesRequest(req, res, sourcesContext, logger);
    });

    router.get("/sources/:sourceId", async (req, res) => {
        await handleSourceStatusRequest(req, res, sourcesContext, logger);
    });

    router.delete("/sources/:sourceId", async (req, res) => {
        await handleDeleteSourceRequest(req, res, sourcesContext, logger);
    });

    router.get("/notebooks/:notebookId/settings", async (req, res) => {
        await handleGetNotebookSettingsRequest(req, res, notebookContext, logger);
    });

    router.put("/notebooks/:notebookId/settings", async (req, res) => {
        await handleUpdateNotebookSettingsRequest(req, res, notebookContext, logger);
    });

    router.post("/notebooks/:notebookId/search", async (req, res) => {
        await handleSearchRequest(req, res, { retrieval: context.retrieval }, logger);
    });

    router.post("/notebooks/:notebookId/conversations/:conversationId/messages", async (req, res) => {
        await handleChatMessageRequest(req, res, { chat: context.chat }, logger);
    });

    router.get("/notebooks/:notebookId/conversations/:conversationId/messages", async (req, res) => {
        await handleListMessagesRequest(req, res, { messages: context.repositories.messages }, logger);
    });

    return router;
}
