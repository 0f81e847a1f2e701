import { beforeEach, describe, expect, it } from "vitest";
import { StorageError } from "../src/errors";
import {
    createInMemoryState,
    InMemoryChunkStore,
    InMemoryMessageRepository,
    InMemorySourceRepository,
    type InMemoryState,
} from "../src/store/inMemory";
import { makeChunks } from "./helpers";

describe("InMemoryChunkStore", () => {
    let state: InMemoryState;
    let store: InMemoryChunkStore;
    let sources: InMemorySourceRepository;

    beforeEach(() => {
        state = createInMemoryState();
        store = new InMemoryChunkStore(2, state);
        sources = new InMemorySourceRepository(state);
    });

    async function addSource(notebookId: string, embeddings: number[][]): Promise<string> {
        const source = await sources.create({ notebookId, kind: "text", title: "Notes" });
        await store.putBatch(source.id, makeChunks(source.id, notebookId, embeddings));
        return source.id;
    }

    it("returns only chunks at or above the threshold, most similar first", async () => {
        const sourceId = await addSource("nb-1", [[0, 1], [0.6, 0.8], [1, 0], [0.8, 0.6]]);

        const results = await store.search({ notebookId: "nb-1", embedding: [1, 0], topK: 5, minSimilarity: 0.7 });

        expect(results.map((chunk) => chunk.ordinal)).toEqual([2, 3]);
        expect(results[0]?.similarity).toBeCloseTo(1);
        expect(results[1]?.similarity).toBeCloseTo(0.8);
        expect(results.every((chunk) => chunk.sourceId === sourceId)).toBe(true);
    });

    it("returns an empty list when nothing clears the threshold", async () => {
        await addSource("nb-1", [[0, 1]]);
        await expect(store.search({ notebookId: "nb-1", embedding: [1, 0], topK: 5, minSimilarity: 0.7 })).resolves.toEqual([]);
    });

    it("breaks similarity ties by ordinal", async () => {
        await addSource("nb-1", [[1, 1], [1, 1], [1, 1]]);

        const results = await store.search({ notebookId: "nb-1", embedding: [1, 1], topK: 2, minSimilarity: 0 });

        expect(results.map((chunk) => chunk.ordinal)).toEqual([0, 1]);
    });

    it("never returns chunks from another notebook", async () => {
        await addSource("nb-1", [[1, 0]]);
        const otherSource = await addSource("nb-2", [[1, 0], [0.9, 0.1]]);

        const results = await store.search({ notebookId: "nb-2", embedding: [1, 0], topK: 10, minSimilarity: -1 });

        expect(results).toHaveLength(2);
        expect(results.every((chunk) => chunk.notebookId === "nb-2" && chunk.sourceId === otherSource)).toBe(true);
    });

    it("narrows the search to one source", async () => {
        const first = await addSource("nb-1", [[1, 0]]);
        await addSource("nb-1", [[1, 0]]);

        const results = await store.search({ notebookId: "nb-1", sourceId: first, embedding: [1, 0], topK: 10, minSimilarity: 0 });

        expect(results.map((chunk) => chunk.sourceId)).toEqual([first]);
    });

    it("hides chunks of soft-deleted sources", async () => {
        const sourceId = await addSource("nb-1", [[1, 0]]);
        await sources.softDelete(sourceId);

        await expect(store.search({ notebookId: "nb-1", embedding: [1, 0], topK: 5, minSimilarity: 0 })).resolves.toEqual([]);
        await expect(store.deleteBySource(sourceId)).resolves.toBe(1);
        await expect(store.countBySource(sourceId)).resolves.toBe(0);
    });

    it("keeps re-ingested copies of a document independent", async () => {
        const first = await addSource("nb-1", [[1, 0], [0.9, 0.1]]);
        const second = await addSource("nb-1", [[1, 0], [0.9, 0.1]]);

        await store.deleteBySource(first);

        const results = await store.search({ notebookId: "nb-1", embedding: [1, 0], topK: 10, minSimilarity: 0 });
        expect(results.map((chunk) => [chunk.sourceId, chunk.ordinal])).toEqual([[second, 0], [second, 1]]);
    });

    it("never leaks chunks across notebooks for random fixtures", async () => {
        let seed = 42;
        const random = (): number => {
            seed = (seed * 16807) % 2147483647;
            return seed / 2147483647;
        };
        const notebooks = ["nb-a", "nb-b", "nb-c"];

        for (let round = 0; round < 20; round += 1) {
            state = createInMemoryState();
            store = new InMemoryChunkStore(2, state);
            sources = new InMemorySourceRepository(state);
            const expected = new Map<string, number>();

            for (let i = 0; i < 6; i += 1) {
                const notebookId = notebooks[Math.floor(random() * notebooks.length)] ?? "nb-a";
                const count = 1 + Math.floor(random() * 4);
                await addSource(notebookId, Array.from({ length: count }, () => [random() * 2 - 1, random() * 2 - 1]));
                expected.set(notebookId, (expected.get(notebookId) ?? 0) + count);
            }

            for (const notebookId of notebooks) {
                const query = [random() * 2 - 1, random() * 2 - 1];
                const results = await store.search({ notebookId, embedding: query, topK: 100, minSimilarity: -1 });

                expect(results.every((chunk) => chunk.notebookId === notebookId)).toBe(true);
                expect(results).toHaveLength(expected.get(notebookId) ?? 0);
            }
        }
    });

    it("rejects the whole batch when one vector has the wrong dimension", async () => {
        const chunks = makeChunks("src-1", "nb-1", [[1, 0], [1, 0, 0]]);

        await expect(store.putBatch("src-1", chunks)).rejects.toBeInstanceOf(StorageError);
        await expect(store.countBySource("src-1")).resolves.toBe(0);
    });

    it("rejects gaps in the ordinal sequence", async () => {
        const chunks = makeChunks("src-1", "nb-1", [[1, 0], [0, 1]]).map((chunk) => ({ ...chunk, ordinal: chunk.ordinal * 2 }));

        await expect(store.putBatch("src-1", chunks)).rejects.toThrow(
            'Chunk ordinals for source "src-1" must be contiguous from 0; found 2 at position 1.'
        );
    });

    it("rejects chunks that belong to another source", async () => {
        await expect(store.putBatch("src-1", makeChunks("src-2", "nb-1", [[1, 0]]))).rejects.toBeInstanceOf(StorageError);
    });

    it("accepts a source's chunks only once", async () => {
        await store.putBatch("src-1", makeChunks("src-1", "nb-1", [[1, 0]]));
        await expect(store.putBatch("src-1", makeChunks("src-1", "nb-1", [[1, 0]]))).rejects.toBeInstanceOf(StorageError);
        await expect(store.countBySource("src-1")).resolves.toBe(1);
    });
});

describe("InMemorySourceRepository", () => {
    it("applies a transition only from the expected stage", async () => {
        const sources = new InMemorySourceRepository();
        const source = await sources.create({ notebookId: "nb-1", kind: "url", title: "Page" });

        const moved = await sources.applyTransition(source.id, { from: "created", to: "extracting" });
        expect(moved?.stage).toBe("extracting");
        expect(moved?.status).toBe("processing");

        await expect(sources.applyTransition(source.id, { from: "created", to: "extracting" })).resolves.toBeNull();
    });

    it("merges metadata and records failures", async () => {
        const sources = new InMemorySourceRepository();
        const source = await sources.create({ notebookId: "nb-1", kind: "text", title: "Notes", metadata: { origin: "paste" } });

        const failed = await sources.applyTransition(source.id, {
            from: "created",
            to: "failed",
            failureReason: "extraction",
            errorDetail: "boom",
            metadata: { failedAt: "created" },
        });

        expect(failed).toMatchObject({
            status: "failed",
            failureReason: "extraction",
            errorDetail: "boom",
            metadata: { origin: "paste", failedAt: "created" },
        });
    });

    it("hides soft-deleted sources and refuses to move them", async () => {
        const sources = new InMemorySourceRepository();
        const source = await sources.create({ notebookId: "nb-1", kind: "text", title: "Notes" });

        await expect(sources.softDelete(source.id)).resolves.toBe(true);
        await expect(sources.softDelete(source.id)).resolves.toBe(false);
        await expect(sources.get(source.id)).resolves.toBeNull();
        await expect(sources.listByNotebook("nb-1")).resolves.toEqual([]);
        await expect(sources.applyTransition(source.id, { from: "created", to: "extracting" })).resolves.toBeNull();
    });

    it("soft-deletes every live source of a notebook", async () => {
        const sources = new InMemorySourceRepository();
        const first = await sources.create({ notebookId: "nb-1", kind: "text", title: "One" });
        const second = await sources.create({ notebookId: "nb-1", kind: "text", title: "Two" });
        const other = await sources.create({ notebookId: "nb-2", kind: "text", title: "Other" });

        const deleted = await sources.softDeleteByNotebook("nb-1");

        expect(deleted.sort()).toEqual([first.id, second.id].sort());
        await expect(sources.get(other.id)).resolves.not.toBeNull();
    });
});

describe("InMemoryMessageRepository", () => {
    it("lists the most recent messages oldest first", async () => {
        const messages = new InMemoryMessageRepository();
        for (const content of ["one", "two", "three"]) {
            await messages.append({ conversationId: "conv-1", notebookId: "nb-1", role: "user", content });
        }
        await messages.append({ conversationId: "conv-2", notebookId: "nb-1", role: "user", content: "elsewhere" });

        const recent = await messages.listRecent("conv-1", 2);

        expect(recent.map((message) => message.content)).toEqual(["two", "three"]);
        await expect(messages.listRecent("conv-1", 0)).resolves.toEqual([]);
    });
});
