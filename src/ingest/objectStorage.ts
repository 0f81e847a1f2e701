import { readFile } from "node:fs/promises";
import path from "node:path";

export interface StoredObject {
    data: Uint8Array;
    contentType: string;
}

/** Raw upload bytes kept outside the database. */
export interface ObjectStorage {
    fetch(key: string): Promise<StoredObject>;
}

const CONTENT_TYPES: Record<string, string> = {
    ".pdf": "application/pdf",
    ".txt": "text/plain",
    ".md": "text/markdown",
    ".markdown": "text/markdown",
    ".html": "text/html",
    ".htm": "text/html",
};

export function guessContentType(filename: string): string {
    return CONTENT_TYPES[path.extname(filename).toLowerCase()] ?? "application/octet-stream";
}

/** Objects addressed by path relative to a root directory. */
export class FileSystemObjectStorage implements ObjectStorage {
    private readonly root: string;

    constructor(root: string) {
        this.root = path.resolve(root);
    }

    async fetch(key: string): Promise<StoredObject> {
        const resolved = path.resolve(this.root, key);
        if (resolved !== this.root && !resolved.startsWith(`${this.root}${path.sep}`)) {
            throw new Error(`Object key "${key}" escapes the storage root.`);
        }

        const data = await readFile(resolved);
        return { data: new Uint8Array(data), contentType: guessContentType(resolved) };
    }
}
