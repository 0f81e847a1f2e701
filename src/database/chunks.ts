import { randomUUID } from "node:crypto";
import type { Logger } from "pino";
import { getErrorMessage, StorageError } from "../errors";
import type { ChunkSearchQuery, NewChunk, RetrievedChunk } from "../store/types";
import { compareRetrieved, validateChunkBatch } from "../store/validateBatch";
import { toVectorLiteral } from "../utils/vector";
import type { ChunkRow, ConnectionPool, Queryable, TableNames } from "./types";

const INSERT_BATCH_SIZE = 100;
// Over-fetch before the exact threshold filter; the HNSW index is approximate.
// Distance is the only SQL sort key so the index applies; ties are ordered in JS.
const CANDIDATE_MULTIPLIER = 3;

export async function putChunkBatch(
    pool: ConnectionPool,
    logger: Logger,
    table: string,
    sourceId: string,
    chunks: NewChunk[],
    dimension: number
): Promise<number> {
    const ordered = validateChunkBatch(sourceId, chunks, dimension);
    if (ordered.length === 0) {
        return 0;
    }

    const client = await pool.connect();
    try {
        await client.query("BEGIN");

        for (let i = 0; i < ordered.length; i += INSERT_BATCH_SIZE) {
            const batch = ordered.slice(i, i + INSERT_BATCH_SIZE);
            const values: unknown[] = [];
            const placeholders = batch.map((chunk) => {
                const base = values.length;
                values.push(
                    randomUUID(),
                    chunk.sourceId,
                    chunk.notebookId,
                    chunk.ordinal,
                    chunk.content,
                    toVectorLiteral(chunk.embedding),
                    JSON.stringify(chunk.metadata)
                );
                return `($${base + 1}, $${base + 2}, $${base + 3}, $${base + 4}, $${base + 5}, $${base + 6}::vector, $${base + 7}::jsonb)`;
            });

            await client.query(
                `INSERT INTO ${table} (id, source_id, notebook_id, ordinal, content, embedding, metadata)
                 VALUES ${placeholders.join(", ")}`,
                values
            );
        }

        await client.query("COMMIT");
        logger.info({ sourceId, chunks: ordered.length }, `Stored ${ordered.length} chunk${ordered.length === 1 ? "" : "s"}.`);
        return ordered.length;
    } catch (error) {
        await client.query("ROLLBACK").catch((rollbackError: unknown) => {
            logger.error({ err: rollbackError, sourceId }, "Rollback failed.");
        });
        throw new StorageError(`Failed to store chunks for source "${sourceId}": ${getErrorMessage(error)}`, { cause: error });
    } finally {
        client.release();
    }
}

export async function searchChunks(
    db: Queryable,
    tables: TableNames,
    query: ChunkSearchQuery
): Promise<RetrievedChunk[]> {
    if (query.topK <= 0) {
        return [];
    }

    const values: unknown[] = [toVectorLiteral(query.embedding), query.notebookId, query.topK * CANDIDATE_MULTIPLIER];
    let sourceFilter = "";
    if (query.sourceId) {
        values.push(query.sourceId);
        sourceFilter = `AND c.source_id = $${values.length}`;
    }

    const result = await db.query(
        `SELECT c.id, c.source_id, c.notebook_id, c.ordinal, c.content, c.metadata,
                1 - (c.embedding <=> $1::vector) AS similarity
         FROM ${tables.chunks} c
         JOIN ${tables.sources} s ON s.id = c.source_id
         WHERE c.notebook_id = $2
           AND s.deleted_at IS NULL
           ${sourceFilter}
         ORDER BY c.embedding <=> $1::vector
         LIMIT $3`,
        values
    );

    return result.rows
        .map((row: ChunkRow): RetrievedChunk => ({
            id: row.id,
            sourceId: row.source_id,
            notebookId: row.notebook_id,
            ordinal: Number(row.ordinal),
            content: row.content,
            metadata: row.metadata,
            similarity: Number(row.similarity),
        }))
        .filter((chunk) => chunk.similarity >= query.minSimilarity)
        .sort(compareRetrieved)
        .slice(0, query.topK);
}

export async function deleteChunksBySource(db: Queryable, logger: Logger, table: string, sourceId: string): Promise<number> {
    const result = await db.query(`DELETE FROM ${table} WHERE source_id = $1`, [sourceId]);
    const deleted = result.rowCount ?? 0;
    logger.info({ sourceId, deleted }, "Deleted source chunks.");
    return deleted;
}

export async function countChunksBySource(db: Queryable, table: string, sourceId: string): Promise<number> {
    const result = await db.query(`SELECT COUNT(*)::int AS count FROM ${table} WHERE source_id = $1`, [sourceId]);
    return Number(result.rows[0]?.count ?? 0);
}
