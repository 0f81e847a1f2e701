import { InvalidTransitionError } from "../errors";
import type { PipelineStage, SourceStatus } from "./types";

const TRANSITIONS: Record<PipelineStage, readonly PipelineStage[]> = {
    created: ["extracting", "failed"],
    extracting: ["chunking", "failed"],
    chunking: ["embedding", "failed"],
    embedding: ["storing", "failed"],
    storing: ["completed", "failed"],
    completed: [],
    failed: [],
};

export function isTerminal(stage: PipelineStage): boolean {
    return stage === "completed" || stage === "failed";
}

export function canTransition(from: PipelineStage, to: PipelineStage): boolean {
    return TRANSITIONS[from].includes(to);
}

/**
 * The only way a source moves between stages. Terminal stages accept nothing,
 * so a source can never be both completed and failed.
 */
export function transition(from: PipelineStage, to: PipelineStage): PipelineStage {
    if (!canTransition(from, to)) {
        throw new InvalidTransitionError(from, to);
    }
    return to;
}

export function statusForStage(stage: PipelineStage): SourceStatus {
    switch (stage) {
        case "completed":
            return "completed";
        case "failed":
            return "failed";
        default:
            return "processing";
    }
}
