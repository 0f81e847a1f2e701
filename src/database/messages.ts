import { randomUUID } from "node:crypto";
import type { MessagePageQuery, MessageRecord, NewMessage } from "../store/types";
import type { MessageRow, Queryable } from "./types";

function mapMessageRow(row: MessageRow): MessageRecord {
    return {
        id: row.id,
        conversationId: row.conversation_id,
        notebookId: row.notebook_id,
        role: row.role,
        content: row.content,
        chunkIds: row.chunk_ids ?? [],
        metadata: row.metadata ?? {},
        createdAt: new Date(row.created_at),
    };
}

export async function appendMessage(db: Queryable, table: string, message: NewMessage): Promise<MessageRecord> {
    const result = await db.query(
        `INSERT INTO ${table} (id, conversation_id, notebook_id, role, content, chunk_ids, metadata)
         VALUES ($1, $2, $3, $4, $5, $6::text[], $7::jsonb)
         RETURNING id, conversation_id, notebook_id, role, content, chunk_ids, metadata, created_at`,
        [
            randomUUID(),
            message.conversationId,
            message.notebookId,
            message.role,
            message.content,
            message.chunkIds ?? [],
            JSON.stringify(message.metadata ?? {}),
        ]
    );
    return mapMessageRow(result.rows[0]);
}

export async function listRecentMessages(db: Queryable, table: string, conversationId: string, limit: number): Promise<MessageRecord[]> {
    if (limit <= 0) {
        return [];
    }

    const result = await db.query(
        `SELECT id, conversation_id, notebook_id, role, content, chunk_ids, metadata, created_at
         FROM ${table}
         WHERE conversation_id = $1
         ORDER BY seq DESC
         LIMIT $2`,
        [conversationId, limit]
    );
    return result.rows.map((row: MessageRow) => mapMessageRow(row)).reverse();
}

export async function listMessagePage(db: Queryable, table: string, query: MessagePageQuery): Promise<MessageRecord[]> {
    if (query.limit <= 0) {
        return [];
    }

    const result = await db.query(
        `SELECT id, conversation_id, notebook_id, role, content, chunk_ids, metadata, created_at
         FROM ${table}
         WHERE conversation_id = $1 AND notebook_id = $2
         ORDER BY seq ASC
         OFFSET $3
         LIMIT $4`,
        [query.conversationId, query.notebookId, query.offset, query.limit]
    );
    return result.rows.map((row: MessageRow) => mapMessageRow(row));
}
