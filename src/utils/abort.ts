import { CancelledError } from "../errors";

export interface LinkedSignal {
    signal: AbortSignal;
    abort(reason?: unknown): void;
    dispose(): void;
}

/**
 * Signal that aborts when the parent aborts or after `timeoutMs`, whichever
 * comes first. A timeout aborts with `CancelledError("timeout")`.
 */
export function linkSignal(parent: AbortSignal | undefined, timeoutMs?: number): LinkedSignal {
    const controller = new AbortController();

    const onParentAbort = (): void => {
        controller.abort(parent?.reason);
    };

    if (parent?.aborted) {
        controller.abort(parent.reason);
    } else {
        parent?.addEventListener("abort", onParentAbort, { once: true });
    }

    const timer = timeoutMs && Number.isFinite(timeoutMs) && timeoutMs > 0
        ? setTimeout(() => controller.abort(new CancelledError("timeout")), timeoutMs)
        : undefined;
    timer?.unref();

    return {
        signal: controller.signal,
        abort: (reason?: unknown) => controller.abort(reason),
        dispose: () => {
            if (timer) clearTimeout(timer);
            parent?.removeEventListener("abort", onParentAbort);
        },
    };
}
