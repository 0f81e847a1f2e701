import { StorageError } from "../errors";
import { isValidVector } from "../utils/vector";
import type { NewChunk } from "./types";

/**
 * Rejects the whole batch when any chunk belongs to another source, carries a
 * vector of the wrong dimension, or breaks the 0..n-1 ordinal sequence.
 */
export function validateChunkBatch(sourceId: string, chunks: NewChunk[], dimension: number): NewChunk[] {
    const ordered = [...chunks].sort((a, b) => a.ordinal - b.ordinal);
    const notebookId = ordered[0]?.notebookId;

    ordered.forEach((chunk, index) => {
        if (chunk.sourceId !== sourceId) {
            throw new StorageError(`Chunk ${chunk.ordinal} belongs to source "${chunk.sourceId}", expected "${sourceId}".`);
        }
        if (chunk.notebookId !== notebookId) {
            throw new StorageError(`Chunks of source "${sourceId}" span more than one notebook.`);
        }
        if (chunk.ordinal !== index) {
            throw new StorageError(`Chunk ordinals for source "${sourceId}" must be contiguous from 0; found ${chunk.ordinal} at position ${index}.`);
        }
        if (!isValidVector(chunk.embedding, dimension)) {
            throw new StorageError(`Chunk ${chunk.ordinal} of source "${sourceId}" has an invalid embedding (expected dimension ${dimension}, got ${chunk.embedding.length}).`);
        }
    });

    return ordered;
}

export function compareRetrieved(
    a: { similarity: number; ordinal: number; id: string },
    b: { similarity: number; ordinal: number; id: string }
): number {
    if (b.similarity !== a.similarity) {
        return b.similarity - a.similarity;
    }
    if (a.ordinal !== b.ordinal) {
        return a.ordinal - b.ordinal;
    }
    return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}
