import type { ChatRole } from "../llm/types";
import type { NewSource, SourceRecord, StageUpdate } from "../sources/types";

export interface ChunkMetadata {
    /** Character offset of the chunk in the extracted text. */
    start: number;
    /** Exclusive. */
    end: number;
    [key: string]: unknown;
}

export interface NewChunk {
    sourceId: string;
    notebookId: string;
    ordinal: number;
    content: string;
    embedding: number[];
    metadata: ChunkMetadata;
}

export interface RetrievedChunk {
    id: string;
    sourceId: string;
    notebookId: string;
    ordinal: number;
    content: string;
    metadata: ChunkMetadata;
    similarity: number;
}

export interface ChunkSearchQuery {
    notebookId: string;
    /** Narrows the search within the notebook; never widens it. */
    sourceId?: string;
    embedding: number[];
    topK: number;
    minSimilarity: number;
}

export interface ChunkStore {
    readonly dimension: number;
    /** All-or-nothing write of one source's chunks. Returns the number stored. */
    putBatch(sourceId: string, chunks: NewChunk[]): Promise<number>;
    search(query: ChunkSearchQuery): Promise<RetrievedChunk[]>;
    deleteBySource(sourceId: string): Promise<number>;
    countBySource(sourceId: string): Promise<number>;
}

export interface SourceRepository {
    create(source: NewSource): Promise<SourceRecord>;
    get(id: string): Promise<SourceRecord | null>;
    listByNotebook(notebookId: string): Promise<SourceRecord[]>;
    /** Compare-and-set on the current stage; null when the source moved on or is deleted. */
    applyTransition(id: string, update: StageUpdate): Promise<SourceRecord | null>;
    softDelete(id: string): Promise<boolean>;
    /** Returns the ids of the sources that were deleted. */
    softDeleteByNotebook(notebookId: string): Promise<string[]>;
    /** Live sources still processing that were created before `cutoff`. */
    findStale(cutoff: Date): Promise<SourceRecord[]>;
}

export interface MessageRecord {
    id: string;
    conversationId: string;
    notebookId: string;
    role: ChatRole;
    content: string;
    /** Chunks that grounded this message, in context order. */
    chunkIds: string[];
    metadata: Record<string, unknown>;
    createdAt: Date;
}

export interface NewMessage {
    conversationId: string;
    notebookId: string;
    role: ChatRole;
    content: string;
    chunkIds?: string[];
    metadata?: Record<string, unknown>;
}

export interface MessagePageQuery {
    notebookId: string;
    conversationId: string;
    offset: number;
    limit: number;
}

export interface MessageRepository {
    append(message: NewMessage): Promise<MessageRecord>;
    /** Most recent `limit` messages of a conversation, oldest first. */
    listRecent(conversationId: string, limit: number): Promise<MessageRecord[]>;
    /** A conversation's messages within one notebook, oldest first. */
    listPage(query: MessagePageQuery): Promise<MessageRecord[]>;
}

export interface NotebookSettings {
    notebookId: string;
    maxContextTokens: number;
}

export interface NotebookRepository {
    getSettings(notebookId: string): Promise<NotebookSettings | null>;
    saveSettings(settings: NotebookSettings): Promise<NotebookSettings>;
}

export interface Repositories {
    chunks: ChunkStore;
    sources: SourceRepository;
    messages: MessageRepository;
    notebooks: NotebookRepository;
    verifyConnection(): Promise<void>;
    close(): Promise<void>;
}
