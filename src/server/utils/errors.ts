import type { Response } from "express";
import type { Logger } from "pino";
import { ZodError } from "zod";
import { CancelledError, NotFoundError, RetrievalError, ValidationError, getErrorMessage } from "../../errors";

export class PayloadTooLargeError extends ValidationError {}

export function statusForError(error: unknown): number {
    if (error instanceof PayloadTooLargeError) return 413;
    if (error instanceof ValidationError || error instanceof ZodError) return 400;
    if (error instanceof NotFoundError) return 404;
    if (error instanceof RetrievalError) return 502;
    if (error instanceof CancelledError) return 503;
    return 500;
}

function describeError(error: unknown): string {
    if (error instanceof ZodError) {
        const issue = error.issues[0];
        if (!issue) return "Invalid request body.";
        return issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message;
    }
    return getErrorMessage(error);
}

export function sendError(res: Response, error: unknown, logger: Logger, context: Record<string, unknown> = {}): void {
    const status = statusForError(error);
    if (status >= 500) {
        logger.error({ err: error, ...context }, "Request failed.");
    } else {
        logger.debug({ err: error, ...context }, "Request rejected.");
    }

    res.status(status).json({
        status: "error",
        message: describeError(error),
    });
}
