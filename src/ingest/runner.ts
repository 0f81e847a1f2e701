import pLimit, { type LimitFunction } from "p-limit";
import type { Logger } from "pino";
import { CancelledError } from "../errors";
import { sourceKindOf, type SourceInput, type SourceRecord } from "../sources/types";
import type { SourceRepository } from "../store/types";
import { linkSignal } from "../utils/abort";
import { createSilentLogger } from "../utils/logger";
import type { IngestionOutcome, IngestionPipeline } from "./pipeline";

export interface IngestionRunnerOptions {
    /** Sources ingested at the same time. */
    concurrency: number;
    /** Per-source wall clock limit, queueing excluded. */
    timeoutMs?: number;
}

export interface SubmitOptions {
    title?: string;
    metadata?: Record<string, unknown>;
}

const TITLE_MAX_LENGTH = 80;

export function deriveTitle(input: SourceInput, explicit?: string): string {
    const trimmed = explicit?.trim();
    if (trimmed) {
        return trimmed.slice(0, 255);
    }

    switch (input.kind) {
        case "file":
        case "stored":
            return input.filename?.trim() || (input.kind === "stored" ? input.key : "Untitled document");
        case "url":
            return input.url;
        case "text": {
            const firstLine = input.text.trim().split("\n")[0]?.trim() ?? "";
            if (!firstLine) return "Pasted text";
            return firstLine.length > TITLE_MAX_LENGTH ? `${firstLine.slice(0, TITLE_MAX_LENGTH - 3)}...` : firstLine;
        }
    }
}

/**
 * Runs pipelines in the background. `submit` records the source as
 * processing and returns at once; the outcome lands on the source record.
 */
export class IngestionRunner {
    private readonly limit: LimitFunction;
    private readonly logger: Logger;
    private readonly controllers = new Map<string, AbortController>();
    private readonly tasks = new Set<Promise<void>>();

    constructor(
        private readonly pipeline: IngestionPipeline,
        private readonly sources: SourceRepository,
        private readonly options: IngestionRunnerOptions,
        logger?: Logger
    ) {
        this.limit = pLimit(Math.max(1, options.concurrency));
        this.logger = (logger ?? createSilentLogger()).child({ module: "ingest" });
    }

    get activeCount(): number {
        return this.controllers.size;
    }

    isActive(sourceId: string): boolean {
        return this.controllers.has(sourceId);
    }

    async submit(notebookId: string, input: SourceInput, options: SubmitOptions = {}): Promise<SourceRecord> {
        const source = await this.sources.create({
            notebookId,
            kind: sourceKindOf(input),
            title: deriveTitle(input, options.title),
            metadata: {
                ...options.metadata,
                ...(input.kind === "url" ? { originalUrl: input.url } : {}),
                ...(input.kind === "file" || input.kind === "stored" ? { filename: input.filename } : {}),
            },
        });

        const controller = new AbortController();
        this.controllers.set(source.id, controller);
        const startedAt = Date.now();

        const task = this.limit(() => this.execute(source, input, controller.signal))
            .then((outcome) => {
                this.logger.info({ sourceId: source.id, outcome: outcome.stage, durationMs: Date.now() - startedAt }, "Ingestion finished.");
            })
            .catch((error: unknown) => {
                this.logger.error({ err: error, sourceId: source.id }, "Ingestion crashed.");
            })
            .finally(() => {
                this.controllers.delete(source.id);
                this.tasks.delete(task);
            });
        this.tasks.add(task);

        return source;
    }

    /** Aborts an in-flight or queued ingestion; the source ends failed/cancelled. */
    cancel(sourceId: string, reason: CancelledError = new CancelledError("cancelled")): boolean {
        const controller = this.controllers.get(sourceId);
        if (!controller) {
            return false;
        }
        controller.abort(reason);
        return true;
    }

    /** Resolves once every submitted source has settled. */
    async idle(): Promise<void> {
        while (this.tasks.size > 0) {
            await Promise.all([...this.tasks]);
        }
    }

    async shutdown(): Promise<void> {
        for (const controller of this.controllers.values()) {
            controller.abort(new CancelledError("cancelled", "Server is shutting down."));
        }
        await this.idle();
    }

    private async execute(source: SourceRecord, input: SourceInput, signal: AbortSignal): Promise<IngestionOutcome> {
        const linked = linkSignal(signal, this.options.timeoutMs);
        try {
            return await this.pipeline.run(source, input, { signal: linked.signal });
        } finally {
            linked.dispose();
        }
    }
}
