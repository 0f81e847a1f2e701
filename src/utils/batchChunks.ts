export interface IndexedBatch<T> {
    batchIndex: number;
    startIndex: number;
    items: T[];
}

export function batchChunks<T>(chunks: T[], batchSize: number): IndexedBatch<T>[] {
    if (!Number.isInteger(batchSize) || batchSize <= 0) throw new Error("batchSize must be a positive integer");

    const batches: IndexedBatch<T>[] = [];
    for (let i = 0; i < chunks.length; i += batchSize) {
        batches.push({
            batchIndex: batches.length,
            startIndex: i,
            items: chunks.slice(i, i + batchSize),
        });
    }
    return batches;
}
