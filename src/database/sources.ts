import { randomUUID } from "node:crypto";
import type { Logger } from "pino";
import { statusForStage } from "../sources/stateMachine";
import type { NewSource, SourceRecord, StageUpdate } from "../sources/types";
import type { Queryable, SourceRow } from "./types";

export function mapSourceRow(row: SourceRow): SourceRecord {
    return {
        id: row.id,
        notebookId: row.notebook_id,
        kind: row.kind,
        title: row.title,
        status: row.status,
        stage: row.stage,
        failureReason: row.failure_reason ?? undefined,
        errorDetail: row.error_detail ?? undefined,
        chunkCount: Number(row.chunk_count),
        metadata: row.metadata ?? {},
        createdAt: new Date(row.created_at),
        updatedAt: new Date(row.updated_at),
        deletedAt: row.deleted_at ? new Date(row.deleted_at) : undefined,
    };
}

export async function insertSource(db: Queryable, table: string, source: NewSource): Promise<SourceRecord> {
    const result = await db.query(
        `INSERT INTO ${table} (id, notebook_id, kind, title, status, stage, metadata)
         VALUES ($1, $2, $3, $4, 'processing', 'created', $5::jsonb)
         RETURNING *`,
        [randomUUID(), source.notebookId, source.kind, source.title, JSON.stringify(source.metadata ?? {})]
    );
    return mapSourceRow(result.rows[0]);
}

export async function getSource(db: Queryable, table: string, id: string): Promise<SourceRecord | null> {
    const result = await db.query(`SELECT * FROM ${table} WHERE id = $1 AND deleted_at IS NULL`, [id]);
    return result.rows.length > 0 ? mapSourceRow(result.rows[0]) : null;
}

export async function listSources(db: Queryable, table: string, notebookId: string): Promise<SourceRecord[]> {
    const result = await db.query(
        `SELECT * FROM ${table} WHERE notebook_id = $1 AND deleted_at IS NULL ORDER BY created_at ASC`,
        [notebookId]
    );
    return result.rows.map((row: SourceRow) => mapSourceRow(row));
}

/**
 * Conditional update keyed on the stage the caller believes is current. A
 * stale writer matches no row and gets null back.
 */
export async function applyTransition(
    db: Queryable,
    logger: Logger,
    table: string,
    id: string,
    update: StageUpdate
): Promise<SourceRecord | null> {
    const result = await db.query(
        `UPDATE ${table} SET
            stage = $3,
            status = $4,
            title = COALESCE($5, title),
            chunk_count = COALESCE($6, chunk_count),
            failure_reason = COALESCE($7, failure_reason),
            error_detail = COALESCE($8, error_detail),
            metadata = metadata || COALESCE($9::jsonb, '{}'::jsonb),
            updated_at = now()
         WHERE id = $1 AND stage = $2 AND deleted_at IS NULL
         RETURNING *`,
        [
            id,
            update.from,
            update.to,
            statusForStage(update.to),
            update.title ?? null,
            update.chunkCount ?? null,
            update.failureReason ?? null,
            update.errorDetail ?? null,
            update.metadata ? JSON.stringify(update.metadata) : null,
        ]
    );

    if (result.rows.length === 0) {
        logger.debug({ sourceId: id, from: update.from, to: update.to }, "Source transition did not apply.");
        return null;
    }
    return mapSourceRow(result.rows[0]);
}

export async function softDeleteSource(db: Queryable, table: string, id: string): Promise<boolean> {
    const result = await db.query(
        `UPDATE ${table} SET deleted_at = now(), updated_at = now() WHERE id = $1 AND deleted_at IS NULL RETURNING id`,
        [id]
    );
    return result.rows.length > 0;
}

export async function softDeleteNotebookSources(db: Queryable, table: string, notebookId: string): Promise<string[]> {
    const result = await db.query(
        `UPDATE ${table} SET deleted_at = now(), updated_at = now() WHERE notebook_id = $1 AND deleted_at IS NULL RETURNING id`,
        [notebookId]
    );
    return result.rows.map((row: { id: string }) => row.id);
}

export async function findStaleSources(db: Queryable, table: string, cutoff: Date): Promise<SourceRecord[]> {
    const result = await db.query(
        `SELECT * FROM ${table} WHERE status = 'processing' AND deleted_at IS NULL AND created_at < $1 ORDER BY created_at ASC`,
        [cutoff]
    );
    return result.rows.map((row: SourceRow) => mapSourceRow(row));
}
