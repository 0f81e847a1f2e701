import type { NotebookSettings } from "../store/types";
import type { NotebookSettingsRow, Queryable } from "./types";

export async function getNotebookSettings(db: Queryable, table: string, notebookId: string): Promise<NotebookSettings | null> {
    const result = await db.query(`SELECT notebook_id, max_context_tokens FROM ${table} WHERE notebook_id = $1`, [notebookId]);
    if (result.rows.length === 0) {
        return null;
    }

    const row: NotebookSettingsRow = result.rows[0];
    return { notebookId: row.notebook_id, maxContextTokens: Number(row.max_context_tokens) };
}

export async function saveNotebookSettings(db: Queryable, table: string, settings: NotebookSettings): Promise<NotebookSettings> {
    await db.query(
        `INSERT INTO ${table} (notebook_id, max_context_tokens)
         VALUES ($1, $2)
         ON CONFLICT (notebook_id) DO UPDATE SET
            max_context_tokens = EXCLUDED.max_context_tokens,
            updated_at = now()`,
        [settings.notebookId, settings.maxContextTokens]
    );
    return { ...settings };
}
