export type SourceKind = "file" | "url" | "text";

/** Raw input accepted at upload time. */
export type SourceInput =
    | { kind: "file"; data: Uint8Array; contentType: string; filename?: string }
    | { kind: "stored"; key: string; filename?: string }
    | { kind: "url"; url: string }
    | { kind: "text"; text: string };

export function sourceKindOf(input: SourceInput): SourceKind {
    return input.kind === "stored" ? "file" : input.kind;
}

export type SourceStatus = "processing" | "completed" | "failed";

export type PipelineStage =
    | "created"
    | "extracting"
    | "chunking"
    | "embedding"
    | "storing"
    | "completed"
    | "failed";

export type FailureReason =
    | "extraction"
    | "no_content"
    | "embedding"
    | "storage"
    | "cancelled"
    | "timeout";

export interface SourceRecord {
    id: string;
    notebookId: string;
    kind: SourceKind;
    title: string;
    status: SourceStatus;
    stage: PipelineStage;
    failureReason?: FailureReason;
    errorDetail?: string;
    chunkCount: number;
    metadata: Record<string, unknown>;
    createdAt: Date;
    updatedAt: Date;
    deletedAt?: Date;
}

export interface NewSource {
    notebookId: string;
    kind: SourceKind;
    title: string;
    metadata?: Record<string, unknown>;
}

/** Compare-and-set update: applied only while the stored stage still equals `from`. */
export interface StageUpdate {
    from: PipelineStage;
    to: PipelineStage;
    title?: string;
    chunkCount?: number;
    failureReason?: FailureReason;
    errorDetail?: string;
    metadata?: Record<string, unknown>;
}

export interface SourceStatusView {
    id: string;
    notebookId: string;
    title: string;
    kind: SourceKind;
    status: SourceStatus;
    stage: PipelineStage;
    failureReason?: FailureReason;
    errorDetail?: string;
    chunkCount: number;
    createdAt: string;
    updatedAt: string;
}

export function toStatusView(source: SourceRecord): SourceStatusView {
    return {
        id: source.id,
        notebookId: source.notebookId,
        title: source.title,
        kind: source.kind,
        status: source.status,
        stage: source.stage,
        failureReason: source.failureReason,
        errorDetail: source.errorDetail,
        chunkCount: source.chunkCount,
        createdAt: source.createdAt.toISOString(),
        updatedAt: source.updatedAt.toISOString(),
    };
}
