export type RagErrorCode =
    | "extraction_failed"
    | "no_content"
    | "embedding_failed"
    | "storage_failed"
    | "retrieval_failed"
    | "cancelled"
    | "invalid_transition"
    | "invalid_input"
    | "not_found";

export class RagError extends Error {
    constructor(message: string, public readonly code: RagErrorCode, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export type ExtractionFailureKind =
    | "unsupported_type"
    | "corrupted"
    | "empty"
    | "fetch_failed"
    | "storage_unavailable";

export class ExtractionError extends RagError {
    constructor(public readonly kind: ExtractionFailureKind, message: string, options?: { cause?: unknown }) {
        super(message, "extraction_failed", options);
    }
}

export class NoContentError extends RagError {
    constructor(message = "Extracted text produced no chunks.") {
        super(message, "no_content");
    }
}

export interface EmbeddingBatchLocation {
    batchIndex: number;
    /** First chunk index of the batch. */
    startIndex: number;
    /** Exclusive. */
    endIndex: number;
}

export class EmbeddingError extends RagError {
    public readonly batchIndex: number;
    public readonly startIndex: number;
    public readonly endIndex: number;

    constructor(location: EmbeddingBatchLocation, message: string, options?: { cause?: unknown }) {
        super(message, "embedding_failed", options);
        this.batchIndex = location.batchIndex;
        this.startIndex = location.startIndex;
        this.endIndex = location.endIndex;
    }
}

export class StorageError extends RagError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, "storage_failed", options);
    }
}

export type RetrievalFailureStage = "embedding" | "search";

export class RetrievalError extends RagError {
    constructor(public readonly stage: RetrievalFailureStage, message: string, options?: { cause?: unknown }) {
        super(message, "retrieval_failed", options);
    }
}

export type CancellationReason = "cancelled" | "timeout";

export class CancelledError extends RagError {
    constructor(public readonly reason: CancellationReason = "cancelled", message?: string) {
        super(message ?? (reason === "timeout" ? "Operation timed out." : "Operation was cancelled."), "cancelled");
    }
}

export class InvalidTransitionError extends RagError {
    constructor(public readonly from: string, public readonly to: string) {
        super(`Invalid source transition ${from} -> ${to}.`, "invalid_transition");
    }
}

export class ValidationError extends RagError {
    constructor(message: string) {
        super(message, "invalid_input");
    }
}

export class NotFoundError extends RagError {
    constructor(entity: string, id: string) {
        super(`${entity} "${id}" was not found.`, "not_found");
    }
}

export function getErrorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}

/** Resolves the error a signal was aborted with, normalised to a CancelledError. */
export function toCancelledError(signal: AbortSignal): CancelledError {
    const reason: unknown = signal.reason;
    if (reason instanceof CancelledError) {
        return reason;
    }
    if (reason instanceof Error && reason.name === "TimeoutError") {
        return new CancelledError("timeout");
    }
    return new CancelledError("cancelled");
}

export function throwIfAborted(signal?: AbortSignal): void {
    if (signal?.aborted) {
        throw toCancelledError(signal);
    }
}
