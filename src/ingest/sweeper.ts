import type { Logger } from "pino";
import { transition } from "../sources/stateMachine";
import type { SourceRepository } from "../store/types";
import { createSilentLogger } from "../utils/logger";

export interface StaleSourceSweeperOptions {
    /** Sources processing longer than this are failed with reason "timeout". */
    processingTimeoutMs: number;
    /** Skips sources this process is still working on. */
    isActive?: (sourceId: string) => boolean;
    now?: () => Date;
}

/**
 * Fails sources left in processing by a crashed or restarted worker.
 */
export class StaleSourceSweeper {
    private readonly logger: Logger;
    private timer: NodeJS.Timeout | null = null;
    private running: Promise<void> | null = null;

    constructor(
        private readonly sources: SourceRepository,
        private readonly options: StaleSourceSweeperOptions,
        logger?: Logger
    ) {
        this.logger = (logger ?? createSilentLogger()).child({ module: "sweeper" });
    }

    async sweep(): Promise<number> {
        const now = this.options.now?.() ?? new Date();
        const cutoff = new Date(now.getTime() - this.options.processingTimeoutMs);
        const stale = await this.sources.findStale(cutoff);

        let failed = 0;
        for (const source of stale) {
            if (this.options.isActive?.(source.id)) {
                continue;
            }

            const updated = await this.sources.applyTransition(source.id, {
                from: source.stage,
                to: transition(source.stage, "failed"),
                failureReason: "timeout",
                errorDetail: `Processing did not finish within ${Math.round(this.options.processingTimeoutMs / 60_000)} minutes.`,
                metadata: { failedAt: source.stage },
            });

            if (updated) {
                failed += 1;
                this.logger.warn({ sourceId: source.id, stage: source.stage }, "Marked stale source as failed.");
            }
        }

        return failed;
    }

    start(intervalMs: number): void {
        if (this.timer) {
            return;
        }

        this.timer = setInterval(() => {
            if (this.running) {
                return;
            }

            this.running = this.sweep()
                .then((count) => {
                    if (count > 0) {
                        this.logger.info({ count }, "Stale source sweep completed.");
                    }
                })
                .catch((error: unknown) => {
                    this.logger.error({ err: error }, "Stale source sweep failed.");
                })
                .finally(() => {
                    this.running = null;
                });
        }, intervalMs);
        this.timer.unref();
    }

    async stop(): Promise<void> {
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = null;
        }
        if (this.running) {
            await this.running;
        }
    }
}
