import { Pool } from "pg";
import type { Logger } from "pino";
import type { DatabaseConfig } from "../config/types";
import type { NewSource, SourceRecord, StageUpdate } from "../sources/types";
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
} from "../store/types";
import { getErrorMessage } from "../errors";
import * as chunks from "./chunks";
import * as messages from "./messages";
import * as notebooks from "./notebooks";
import { ensureSchema } from "./schema";
import * as sources from "./sources";
import { DEFAULT_TABLES, type ConnectionPool, type TableNames } from "./types";

export class PostgresChunkStore implements ChunkStore {
    constructor(
        private readonly pool: ConnectionPool,
        private readonly logger: Logger,
        public readonly dimension: number,
        private readonly tables: TableNames = DEFAULT_TABLES
    ) {}

    async putBatch(sourceId: string, batch: NewChunk[]): Promise<number> {
        return chunks.putChunkBatch(this.pool, this.logger, this.tables.chunks, sourceId, batch, this.dimension);
    }

    async search(query: ChunkSearchQuery): Promise<RetrievedChunk[]> {
        return chunks.searchChunks(this.pool, this.tables, query);
    }

    async deleteBySource(sourceId: string): Promise<number> {
        return chunks.deleteChunksBySource(this.pool, this.logger, this.tables.chunks, sourceId);
    }

    async countBySource(sourceId: string): Promise<number> {
        return chunks.countChunksBySource(this.pool, this.tables.chunks, sourceId);
    }
}

export class PostgresSourceRepository implements SourceRepository {
    constructor(
        private readonly pool: ConnectionPool,
        private readonly logger: Logger,
        private readonly table: string = DEFAULT_TABLES.sources
    ) {}

    async create(source: NewSource): Promise<SourceRecord> {
        return sources.insertSource(this.pool, this.table, source);
    }

    async get(id: string): Promise<SourceRecord | null> {
        return sources.getSource(this.pool, this.table, id);
    }

    async listByNotebook(notebookId: string): Promise<SourceRecord[]> {
        return sources.listSources(this.pool, this.table, notebookId);
    }

    async applyTransition(id: string, update: StageUpdate): Promise<SourceRecord | null> {
        return sources.applyTransition(this.pool, this.logger, this.table, id, update);
    }

    async softDelete(id: string): Promise<boolean> {
        return sources.softDeleteSource(this.pool, this.table, id);
    }

    async softDeleteByNotebook(notebookId: string): Promise<string[]> {
        return sources.softDeleteNotebookSources(this.pool, this.table, notebookId);
    }

    async findStale(cutoff: Date): Promise<SourceRecord[]> {
        return sources.findStaleSources(this.pool, this.table, cutoff);
    }
}

export class PostgresMessageRepository implements MessageRepository {
    constructor(private readonly pool: ConnectionPool, private readonly table: string = DEFAULT_TABLES.messages) {}

    async append(message: NewMessage): Promise<MessageRecord> {
        return messages.appendMessage(this.pool, this.table, message);
    }

    async listRecent(conversationId: string, limit: number): Promise<MessageRecord[]> {
        return messages.listRecentMessages(this.pool, this.table, conversationId, limit);
    }

    async listPage(query: MessagePageQuery): Promise<MessageRecord[]> {
        return messages.listMessagePage(this.pool, this.table, query);
    }
}

export class PostgresNotebookRepository implements NotebookRepository {
    constructor(private readonly pool: ConnectionPool, private readonly table: string = DEFAULT_TABLES.notebooks) {}

    async getSettings(notebookId: string): Promise<NotebookSettings | null> {
        return notebooks.getNotebookSettings(this.pool, this.table, notebookId);
    }

    async saveSettings(settings: NotebookSettings): Promise<NotebookSettings> {
        return notebooks.saveNotebookSettings(this.pool, this.table, settings);
    }
}

export function createPostgresRepositories(
    pool: ConnectionPool,
    logger: Logger,
    dimension: number,
    tables: TableNames = DEFAULT_TABLES
): Repositories {
    return {
        chunks: new PostgresChunkStore(pool, logger, dimension, tables),
        sources: new PostgresSourceRepository(pool, logger, tables.sources),
        messages: new PostgresMessageRepository(pool, tables.messages),
        notebooks: new PostgresNotebookRepository(pool, tables.notebooks),
        verifyConnection: async () => {
            try {
                await ensureSchema(pool, logger, tables, dimension);
            } catch (error) {
                logger.error({ err: error }, "Failed to prepare PostgreSQL schema.");
                throw new Error(`Failed to prepare PostgreSQL schema: ${getErrorMessage(error)}`, { cause: error });
            }
        },
        close: () => pool.end(),
    };
}

export function createPostgresPool(config: DatabaseConfig, logger: Logger): Pool {
    if (!config.databaseUrl) {
        throw new Error("RAG_DATABASE_URL is required for the PostgreSQL store.");
    }

    const pool = new Pool({
        connectionString: config.databaseUrl,
        max: 20,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
    });

    pool.on("error", (err) => {
        logger.error({ err }, "Unexpected error on idle PostgreSQL client");
    });

    return pool;
}
