import { readFile } from "node:fs/promises";
import type { Logger } from "pino";
import type { Queryable, TableNames } from "./types";

const SCHEMA_URL = new URL("./schema.sql", import.meta.url);
const IDENTIFIER = /^[a-z_][a-z0-9_]*$/;

export function renderSchema(template: string, tables: TableNames, dimension: number): string {
    for (const name of Object.values(tables)) {
        if (!IDENTIFIER.test(name)) {
            throw new Error(`Invalid table name "${name}".`);
        }
    }
    if (!Number.isInteger(dimension) || dimension <= 0) {
        throw new Error(`Invalid vector dimension ${dimension}.`);
    }

    return template
        .replace(/\{\{sources\}\}/g, tables.sources)
        .replace(/\{\{chunks\}\}/g, tables.chunks)
        .replace(/\{\{messages\}\}/g, tables.messages)
        .replace(/\{\{notebooks\}\}/g, tables.notebooks)
        .replace(/\{\{dimension\}\}/g, String(dimension));
}

export async function ensureSchema(db: Queryable, logger: Logger, tables: TableNames, dimension: number): Promise<void> {
    const template = await readFile(SCHEMA_URL, "utf-8");
    await db.query(renderSchema(template, tables, dimension));
    logger.info({ tables, dimension }, "Database schema is up to date.");
}
