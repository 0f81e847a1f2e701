export interface ChunkerOptions {
    /** Window length in characters. */
    chunkSize: number;
    /** Characters shared by consecutive windows; must be smaller than chunkSize. */
    overlap: number;
}

export interface TextChunk {
    ordinal: number;
    content: string;
    start: number;
    end: number;
}

export const DEFAULT_CHUNKER_OPTIONS: ChunkerOptions = {
    chunkSize: 512,
    overlap: 100,
};

export function validateChunkerOptions({ chunkSize, overlap }: ChunkerOptions): void {
    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
        throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}.`);
    }
    if (!Number.isInteger(overlap) || overlap < 0 || overlap >= chunkSize) {
        throw new RangeError(`overlap must be an integer in [0, ${chunkSize}), got ${overlap}.`);
    }
}

/**
 * Fixed-size character windows: window i starts at i * (chunkSize - overlap).
 * Whitespace-only windows are dropped and ordinals renumbered from 0; offsets
 * keep pointing into the original text.
 */
export function chunkText(text: string, options: ChunkerOptions = DEFAULT_CHUNKER_OPTIONS): TextChunk[] {
    validateChunkerOptions(options);

    const { chunkSize, overlap } = options;
    const stride = chunkSize - overlap;
    const chunks: TextChunk[] = [];

    for (let start = 0; start < text.length; start += stride) {
        const end = Math.min(start + chunkSize, text.length);
        const content = text.slice(start, end);

        if (content.trim()) {
            chunks.push({ ordinal: chunks.length, content, start, end });
        }

        if (end >= text.length) {
            break;
        }
    }

    return chunks;
}

export class Chunker {
    constructor(private readonly options: ChunkerOptions = DEFAULT_CHUNKER_OPTIONS) {
        validateChunkerOptions(options);
    }

    get chunkSize(): number {
        return this.options.chunkSize;
    }

    get overlap(): number {
        return this.options.overlap;
    }

    chunk(text: string): TextChunk[] {
        return chunkText(text, this.options);
    }
}
