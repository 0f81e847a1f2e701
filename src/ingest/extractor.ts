import type { Logger } from "pino";
import { ExtractionError, getErrorMessage, RagError, throwIfAborted, toCancelledError } from "../errors";
import type { SourceInput } from "../sources/types";
import { linkSignal } from "../utils/abort";
import { createSilentLogger } from "../utils/logger";
import { extractHtmlContent } from "./html";
import type { ObjectStorage, StoredObject } from "./objectStorage";
import { openPdfDocument, type PdfDocument, type PdfOpener } from "./pdf";

export interface ExtractedText {
    text: string;
    title?: string;
    contentType: string;
    pageCount?: number;
    skippedPages: number[];
    truncated: boolean;
}

export interface ExtractOptions {
    signal?: AbortSignal;
}

export interface TextExtractorOptions {
    logger?: Logger;
    objectStorage?: ObjectStorage;
    openPdf?: PdfOpener;
    fetch?: typeof fetch;
    fetchTimeoutMs?: number;
    maxChars?: number;
    /** Minimum non-whitespace characters for pasted text. */
    minTextChars?: number;
    /** Minimum characters for a fetched web page. */
    minUrlChars?: number;
}

const DEFAULT_FETCH_TIMEOUT_MS = 30_000;
const DEFAULT_MAX_CHARS = 10 * 1024 * 1024;
const TEXT_EXTENSIONS = [".txt", ".md", ".markdown"];
const HTML_EXTENSIONS = [".html", ".htm"];
const REQUEST_HEADERS = {
    "User-Agent": "Mozilla/5.0 (compatible; notebook-rag/0.1; +https://example.com/bot)",
    Accept: "text/html,application/xhtml+xml,text/plain;q=0.9,application/pdf;q=0.8,*/*;q=0.5",
    "Accept-Language": "en-US,en;q=0.5",
};

export function normalizeText(text: string): string {
    return text
        .replace(/\r\n?/g, "\n")
        .replace(/\t/g, " ")
        .replace(/\u0000/g, "")
        .replace(/[ \u00a0]+\n/g, "\n")
        .replace(/\n{3,}/g, "\n\n")
        .trim();
}

function countVisible(text: string): number {
    return text.replace(/\s+/g, "").length;
}

function hasExtension(filename: string | undefined, extensions: string[]): boolean {
    const lowered = filename?.toLowerCase();
    return Boolean(lowered && extensions.some((ext) => lowered.endsWith(ext)));
}

function baseContentType(contentType: string | null | undefined): string {
    return (contentType ?? "").split(";")[0].trim().toLowerCase();
}

function describeHttpFailure(status: number, statusText: string): string {
    switch (status) {
        case 404:
            return "The URL was not found (404). Check that the URL is correct and accessible.";
        case 403:
            return "Access to this URL is forbidden (403). The site may require authentication or block automated access.";
        case 401:
            return "This URL requires authentication (401). Make sure it is publicly accessible.";
        default:
            return `Failed to fetch URL: ${status} ${statusText}`.trim();
    }
}

export function isSupportedFileType(contentType: string, filename?: string): boolean {
    const type = baseContentType(contentType);
    return type === "application/pdf"
        || type === "application/xhtml+xml"
        || type.startsWith("text/")
        || hasExtension(filename, [".pdf", ...HTML_EXTENSIONS, ...TEXT_EXTENSIONS]);
}

export function parseHttpUrl(value: string): URL | null {
    try {
        const url = new URL(value);
        return url.protocol === "http:" || url.protocol === "https:" ? url : null;
    } catch {
        return null;
    }
}

/**
 * Turns any accepted source input into one normalized text blob.
 */
export class TextExtractor {
    private readonly logger: Logger;
    private readonly openPdf: PdfOpener;
    private readonly fetchImpl: typeof fetch;
    private readonly fetchTimeoutMs: number;
    private readonly maxChars: number;
    private readonly minTextChars: number;
    private readonly minUrlChars: number;

    constructor(private readonly options: TextExtractorOptions = {}) {
        this.logger = options.logger ?? createSilentLogger();
        this.openPdf = options.openPdf ?? openPdfDocument;
        this.fetchImpl = options.fetch ?? fetch;
        this.fetchTimeoutMs = options.fetchTimeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
        this.maxChars = options.maxChars ?? DEFAULT_MAX_CHARS;
        this.minTextChars = options.minTextChars ?? 10;
        this.minUrlChars = options.minUrlChars ?? 50;
    }

    async extract(input: SourceInput, options: ExtractOptions = {}): Promise<ExtractedText> {
        throwIfAborted(options.signal);

        switch (input.kind) {
            case "file":
                return this.extractFile(input.data, input.contentType, input.filename);
            case "stored":
                return this.extractStored(input.key, input.filename);
            case "url":
                return this.extractUrl(input.url, options.signal);
            case "text":
                return this.extractText(input.text);
        }
    }

    private async extractStored(key: string, filename?: string): Promise<ExtractedText> {
        if (!this.options.objectStorage) {
            throw new ExtractionError("storage_unavailable", "No object storage is configured for stored uploads.");
        }

        let object: StoredObject;
        try {
            object = await this.options.objectStorage.fetch(key);
        } catch (error) {
            throw new ExtractionError("storage_unavailable", `Failed to read stored object "${key}": ${getErrorMessage(error)}`, { cause: error });
        }

        return this.extractFile(object.data, object.contentType, filename ?? key);
    }

    private async extractFile(data: Uint8Array, contentType: string, filename?: string): Promise<ExtractedText> {
        const type = baseContentType(contentType);

        if (type === "application/pdf" || hasExtension(filename, [".pdf"])) {
            return this.extractPdf(data);
        }

        if (type === "text/html" || type === "application/xhtml+xml" || hasExtension(filename, HTML_EXTENSIONS)) {
            const html = this.decodeUtf8(data);
            const content = extractHtmlContent(html);
            return this.finish(content.text, { contentType: "text/html", title: content.title }, this.minTextChars);
        }

        if (type.startsWith("text/") || hasExtension(filename, TEXT_EXTENSIONS)) {
            return this.finish(this.decodeUtf8(data), { contentType: type.startsWith("text/") ? type : "text/plain" }, this.minTextChars);
        }

        throw new ExtractionError("unsupported_type", `Unsupported file type "${contentType || "unknown"}".`);
    }

    private extractText(text: string): ExtractedText {
        return this.finish(text, { contentType: "text/plain" }, this.minTextChars);
    }

    private async extractPdf(data: Uint8Array): Promise<ExtractedText> {
        let document: PdfDocument;
        try {
            document = await this.openPdf(data);
        } catch (error) {
            throw new ExtractionError("corrupted", `Unable to open PDF: ${getErrorMessage(error)}`, { cause: error });
        }

        const pages: string[] = [];
        const skippedPages: number[] = [];

        try {
            for (let pageNumber = 1; pageNumber <= document.pageCount; pageNumber += 1) {
                try {
                    const pageText = normalizeText(await document.readPage(pageNumber));
                    if (pageText) {
                        pages.push(pageText);
                    }
                } catch (error) {
                    skippedPages.push(pageNumber);
                    this.logger.warn({ err: error, pageNumber }, "Skipping unreadable PDF page.");
                }
            }
        } finally {
            await document.close().catch((error: unknown) => {
                this.logger.warn({ err: error }, "Failed to release PDF document.");
            });
        }

        if (pages.length === 0) {
            throw new ExtractionError("empty", "PDF contains no extractable text.");
        }

        return this.finish(pages.join("\n\n"), {
            contentType: "application/pdf",
            pageCount: document.pageCount,
            skippedPages,
        }, 1);
    }

    private async extractUrl(rawUrl: string, signal?: AbortSignal): Promise<ExtractedText> {
        const url = parseHttpUrl(rawUrl);
        if (!url) {
            throw new ExtractionError("fetch_failed", "Invalid URL. Only HTTP and HTTPS are supported.");
        }

        const linked = linkSignal(signal, this.fetchTimeoutMs);
        try {
            const response = await this.fetchImpl(url, {
                headers: REQUEST_HEADERS,
                redirect: "follow",
                signal: linked.signal,
            });

            if (!response.ok) {
                throw new ExtractionError("fetch_failed", describeHttpFailure(response.status, response.statusText));
            }

            const type = baseContentType(response.headers.get("content-type"));

            if (type === "application/pdf") {
                const data = new Uint8Array(await response.arrayBuffer());
                const extracted = await this.extractPdf(data);
                return { ...extracted, title: extracted.title ?? url.toString() };
            }

            if (type && !type.startsWith("text/") && type !== "application/xhtml+xml") {
                throw new ExtractionError("fetch_failed", `URL returned unsupported content type "${type}".`);
            }

            const body = await response.text();
            const isHtml = !type || type === "text/html" || type === "application/xhtml+xml";
            const content = isHtml ? extractHtmlContent(body, url.toString()) : { text: body, title: undefined };

            return this.finish(content.text, {
                contentType: type || "text/html",
                title: content.title ?? url.toString(),
            }, this.minUrlChars);
        } catch (error) {
            if (signal?.aborted) {
                throw toCancelledError(signal);
            }
            // fetch rejects with the signal's reason, so the timeout shows up as a CancelledError
            if (linked.signal.aborted) {
                throw new ExtractionError("fetch_failed", `Fetching URL timed out after ${Math.round(this.fetchTimeoutMs / 1000)}s.`, { cause: error });
            }
            if (error instanceof RagError) {
                throw error;
            }
            throw new ExtractionError("fetch_failed", `Failed to fetch URL: ${getErrorMessage(error)}`, { cause: error });
        } finally {
            linked.dispose();
        }
    }

    private decodeUtf8(data: Uint8Array): string {
        try {
            return new TextDecoder("utf-8", { fatal: true }).decode(data);
        } catch (error) {
            throw new ExtractionError("corrupted", "File is not valid UTF-8 text.", { cause: error });
        }
    }

    private finish(
        raw: string,
        details: { contentType: string; title?: string; pageCount?: number; skippedPages?: number[] },
        minChars: number
    ): ExtractedText {
        let text = normalizeText(raw);

        if (countVisible(text) < minChars) {
            throw new ExtractionError("empty", `Extracted content is too short (minimum ${minChars} characters).`);
        }

        let truncated = false;
        if (text.length > this.maxChars) {
            this.logger.warn({ length: text.length, maxChars: this.maxChars }, "Extracted text exceeds limit, truncating.");
            text = text.slice(0, this.maxChars);
            truncated = true;
        }

        return {
            text,
            title: details.title,
            contentType: details.contentType,
            pageCount: details.pageCount,
            skippedPages: details.skippedPages ?? [],
            truncated,
        };
    }
}
