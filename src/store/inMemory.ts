import { randomUUID } from "node:crypto";
import { StorageError } from "../errors";
import { statusForStage } from "../sources/stateMachine";
import type { NewSource, SourceRecord, StageUpdate } from "../sources/types";
import { cosineSimilarity } from "../utils/vector";
import type {
    ChunkSearchQuery,
    ChunkStore,
    MessagePageQuery,
    MessageRecord,
    MessageRepository,
    NewChunk,
    NewMessage,
    NotebookRepository,
    NotebookSettings,
    Repositories,
    RetrievedChunk,
    SourceRepository,
} from "./types";
import { compareRetrieved, validateChunkBatch } from "./validateBatch";

interface StoredChunk extends NewChunk {
    id: string;
}

/** Shared between the in-memory repositories so search can see soft deletes. */
export interface InMemoryState {
    sources: Map<string, SourceRecord>;
    chunksBySource: Map<string, StoredChunk[]>;
    messages: MessageRecord[];
    notebooks: Map<string, NotebookSettings>;
}

export function createInMemoryState(): InMemoryState {
    return {
        sources: new Map(),
        chunksBySource: new Map(),
        messages: [],
        notebooks: new Map(),
    };
}

function cloneSource(source: SourceRecord): SourceRecord {
    return { ...source, metadata: { ...source.metadata } };
}

export class InMemoryChunkStore implements ChunkStore {
    constructor(
        public readonly dimension: number,
        private readonly state: InMemoryState = createInMemoryState()
    ) {}

    async putBatch(sourceId: string, chunks: NewChunk[]): Promise<number> {
        const ordered = validateChunkBatch(sourceId, chunks, this.dimension);
        if (ordered.length === 0) {
            return 0;
        }

        if (this.state.chunksBySource.has(sourceId)) {
            throw new StorageError(`Source "${sourceId}" already has stored chunks.`);
        }

        const stored = ordered.map((chunk) => ({
            ...chunk,
            id: randomUUID(),
            embedding: [...chunk.embedding],
            metadata: { ...chunk.metadata },
        }));
        this.state.chunksBySource.set(sourceId, stored);
        return stored.length;
    }

    async search(query: ChunkSearchQuery): Promise<RetrievedChunk[]> {
        const results: RetrievedChunk[] = [];

        for (const [sourceId, chunks] of this.state.chunksBySource) {
            if (query.sourceId && sourceId !== query.sourceId) continue;
            if (this.state.sources.get(sourceId)?.deletedAt) continue;

            for (const chunk of chunks) {
                if (chunk.notebookId !== query.notebookId) continue;

                const similarity = cosineSimilarity(query.embedding, chunk.embedding);
                if (similarity < query.minSimilarity) continue;

                results.push({
                    id: chunk.id,
                    sourceId: chunk.sourceId,
                    notebookId: chunk.notebookId,
                    ordinal: chunk.ordinal,
                    content: chunk.content,
                    metadata: { ...chunk.metadata },
                    similarity,
                });
            }
        }

        return results.sort(compareRetrieved).slice(0, Math.max(0, query.topK));
    }

    async deleteBySource(sourceId: string): Promise<number> {
        const count = this.state.chunksBySource.get(sourceId)?.length ?? 0;
        this.state.chunksBySource.delete(sourceId);
        return count;
    }

    async countBySource(sourceId: string): Promise<number> {
        return this.state.chunksBySource.get(sourceId)?.length ?? 0;
    }
}

export class InMemorySourceRepository implements SourceRepository {
    constructor(
        private readonly state: InMemoryState = createInMemoryState(),
        private readonly now: () => Date = () => new Date()
    ) {}

    async create(source: NewSource): Promise<SourceRecord> {
        const timestamp = this.now();
        const record: SourceRecord = {
            id: randomUUID(),
            notebookId: source.notebookId,
            kind: source.kind,
            title: source.title,
            status: "processing",
            stage: "created",
            chunkCount: 0,
            metadata: { ...source.metadata },
            createdAt: timestamp,
            updatedAt: timestamp,
        };
        this.state.sources.set(record.id, record);
        return cloneSource(record);
    }

    async get(id: string): Promise<SourceRecord | null> {
        const record = this.state.sources.get(id);
        return record && !record.deletedAt ? cloneSource(record) : null;
    }

    async listByNotebook(notebookId: string): Promise<SourceRecord[]> {
        return [...this.state.sources.values()]
            .filter((record) => record.notebookId === notebookId && !record.deletedAt)
            .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
            .map(cloneSource);
    }

    async applyTransition(id: string, update: StageUpdate): Promise<SourceRecord | null> {
        const record = this.state.sources.get(id);
        if (!record || record.deletedAt || record.stage !== update.from) {
            return null;
        }

        const next: SourceRecord = {
            ...record,
            stage: update.to,
            status: statusForStage(update.to),
            title: update.title ?? record.title,
            chunkCount: update.chunkCount ?? record.chunkCount,
            failureReason: update.failureReason ?? record.failureReason,
            errorDetail: update.errorDetail ?? record.errorDetail,
            metadata: update.metadata ? { ...record.metadata, ...update.metadata } : record.metadata,
            updatedAt: this.now(),
        };
        this.state.sources.set(id, next);
        return cloneSource(next);
    }

    async softDelete(id: string): Promise<boolean> {
        const record = this.state.sources.get(id);
        if (!record || record.deletedAt) {
            return false;
        }
        this.state.sources.set(id, { ...record, deletedAt: this.now(), updatedAt: this.now() });
        return true;
    }

    async softDeleteByNotebook(notebookId: string): Promise<string[]> {
        const deleted: string[] = [];
        for (const record of this.state.sources.values()) {
            if (record.notebookId === notebookId && !record.deletedAt) {
                this.state.sources.set(record.id, { ...record, deletedAt: this.now(), updatedAt: this.now() });
                deleted.push(record.id);
            }
        }
        return deleted;
    }

    async findStale(cutoff: Date): Promise<SourceRecord[]> {
        return [...this.state.sources.values()]
            .filter((record) => record.status === "processing" && !record.deletedAt && record.createdAt < cutoff)
            .map(cloneSource);
    }
}

export class InMemoryMessageRepository implements MessageRepository {
    constructor(
        private readonly state: InMemoryState = createInMemoryState(),
        private readonly now: () => Date = () => new Date()
    ) {}

    async append(message: NewMessage): Promise<MessageRecord> {
        const record: MessageRecord = {
            id: randomUUID(),
            conversationId: message.conversationId,
            notebookId: message.notebookId,
            role: message.role,
            content: message.content,
            chunkIds: [...(message.chunkIds ?? [])],
            metadata: { ...message.metadata },
            createdAt: this.now(),
        };
        this.state.messages.push(record);
        return { ...record, chunkIds: [...record.chunkIds] };
    }

    async listRecent(conversationId: string, limit: number): Promise<MessageRecord[]> {
        if (limit <= 0) {
            return [];
        }
        // Insertion order is chronological.
        return this.state.messages
            .filter((message) => message.conversationId === conversationId)
            .slice(-limit)
            .map((message) => ({ ...message, chunkIds: [...message.chunkIds] }));
    }

    async listPage(query: MessagePageQuery): Promise<MessageRecord[]> {
        if (query.limit <= 0) {
            return [];
        }
        return this.state.messages
            .filter((message) => message.conversationId === query.conversationId && message.notebookId === query.notebookId)
            .slice(query.offset, query.offset + query.limit)
            .map((message) => ({ ...message, chunkIds: [...message.chunkIds] }));
    }
}

export class InMemoryNotebookRepository implements NotebookRepository {
    constructor(private readonly state: InMemoryState = createInMemoryState()) {}

    async getSettings(notebookId: string): Promise<NotebookSettings | null> {
        const settings = this.state.notebooks.get(notebookId);
        return settings ? { ...settings } : null;
    }

    async saveSettings(settings: NotebookSettings): Promise<NotebookSettings> {
        this.state.notebooks.set(settings.notebookId, { ...settings });
        return { ...settings };
    }
}

export function createInMemoryRepositories(dimension: number, state: InMemoryState = createInMemoryState()): Repositories {
    return {
        chunks: new InMemoryChunkStore(dimension, state),
        sources: new InMemorySourceRepository(state),
        messages: new InMemoryMessageRepository(state),
        notebooks: new InMemoryNotebookRepository(state),
        verifyConnection: async () => undefined,
        close: async () => undefined,
    };
}
