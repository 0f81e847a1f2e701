import type { QueryResult } from "pg";
import type { ChatRole } from "../llm/types";
import type { FailureReason, PipelineStage, SourceKind, SourceStatus } from "../sources/types";
import type { ChunkMetadata } from "../store/types";

/** The slice of `pg` the stores rely on; `Pool` and `PoolClient` satisfy it. */
export interface Queryable {
    query(text: string, values?: unknown[]): Promise<QueryResult>;
}

export interface PooledClient extends Queryable {
    release(err?: Error | boolean): void;
}

export interface ConnectionPool extends Queryable {
    connect(): Promise<PooledClient>;
    end(): Promise<void>;
}

export interface TableNames {
    sources: string;
    chunks: string;
    messages: string;
    notebooks: string;
}

export const DEFAULT_TABLES: TableNames = {
    sources: "sources",
    chunks: "source_chunks",
    messages: "chat_messages",
    notebooks: "notebook_settings",
};

export interface SourceRow {
    id: string;
    notebook_id: string;
    kind: SourceKind;
    title: string;
    status: SourceStatus;
    stage: PipelineStage;
    failure_reason: FailureReason | null;
    error_detail: string | null;
    chunk_count: number;
    metadata: Record<string, unknown> | null;
    created_at: Date;
    updated_at: Date;
    deleted_at: Date | null;
}

export interface ChunkRow {
    id: string;
    source_id: string;
    notebook_id: string;
    ordinal: number;
    content: string;
    metadata: ChunkMetadata;
    similarity: number | string;
}

export interface MessageRow {
    id: string;
    conversation_id: string;
    notebook_id: string;
    role: ChatRole;
    content: string;
    chunk_ids: string[] | null;
    metadata: Record<string, unknown> | null;
    created_at: Date;
}

export interface NotebookSettingsRow {
    notebook_id: string;
    max_context_tokens: number;
}
