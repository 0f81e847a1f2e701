/** Dense embedding vector. */
export type Vector = readonly number[];

export function isValidVector(vector: Vector, dimension: number): boolean {
    if (vector.length !== dimension) {
        return false;
    }
    return vector.every((value) => Number.isFinite(value));
}

export function cosineSimilarity(a: Vector, b: Vector): number {
    if (a.length !== b.length) {
        throw new RangeError(`Cannot compare vectors of dimension ${a.length} and ${b.length}.`);
    }

    let dot = 0;
    let normA = 0;
    let normB = 0;
    for (let i = 0; i < a.length; i += 1) {
        dot += a[i] * b[i];
        normA += a[i] * a[i];
        normB += b[i] * b[i];
    }

    if (normA === 0 || normB === 0) {
        return 0;
    }
    return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/** pgvector text literal, e.g. `[0.1,0.2]`. */
export function toVectorLiteral(vector: Vector): string {
    return `[${vector.join(",")}]`;
}
