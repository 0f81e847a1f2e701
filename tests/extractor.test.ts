import { describe, expect, it } from "vitest";
import { CancelledError, ExtractionError } from "../src/errors";
import { normalizeText, TextExtractor } from "../src/ingest/extractor";
import type { ObjectStorage } from "../src/ingest/objectStorage";
import type { PdfDocument, PdfOpener } from "../src/ingest/pdf";

const encoder = new TextEncoder();

function fakePdf(pages: Array<string | Error>): { opener: PdfOpener; closed: () => boolean } {
    let closed = false;
    const document: PdfDocument = {
        pageCount: pages.length,
        readPage: async (pageNumber) => {
            const page = pages[pageNumber - 1];
            if (page instanceof Error) {
                throw page;
            }
            return page ?? "";
        },
        close: async () => {
            closed = true;
        },
    };
    return { opener: async () => document, closed: () => closed };
}

function respondWith(body: string, init: ResponseInit): typeof fetch {
    return async () => new Response(body, init);
}

async function extractionFailure(promise: Promise<unknown>): Promise<ExtractionError> {
    const error = await promise.catch((reason: unknown) => reason);
    if (!(error instanceof ExtractionError)) {
        throw new Error(`Expected an ExtractionError, got ${String(error)}`);
    }
    return error;
}

const ARTICLE_HTML = `<!doctype html>
<html>
  <head><title>Tide Tables</title><script>var tracking = true;</script></head>
  <body>
    <nav><a href="/">Home</a></nav>
    <article>
      <h1>Understanding tides</h1>
      <p>Tides are the regular rise and fall of sea level caused by the gravitational pull of the moon and the sun.</p>
      <p>Most coastlines see two high tides and two low tides every lunar day.</p>
    </article>
  </body>
</html>`;

describe("normalizeText", () => {
    it("normalizes line endings, tabs and blank runs", () => {
        expect(normalizeText("a\r\nb\t c  \n\n\n\nd\u0000")).toBe("a\nb  c\n\nd");
    });
});

describe("TextExtractor", () => {
    it("accepts pasted text", async () => {
        const result = await new TextExtractor().extract({ kind: "text", text: "  Plain notes about tides.  " });

        expect(result).toEqual({
            text: "Plain notes about tides.",
            title: undefined,
            contentType: "text/plain",
            pageCount: undefined,
            skippedPages: [],
            truncated: false,
        });
    });

    it("rejects text with too few visible characters", async () => {
        const error = await extractionFailure(new TextExtractor().extract({ kind: "text", text: " a b c \n d " }));
        expect(error.kind).toBe("empty");
    });

    it("truncates text over the size limit", async () => {
        const result = await new TextExtractor({ maxChars: 20 }).extract({ kind: "text", text: "x".repeat(30) });

        expect(result.text).toBe("x".repeat(20));
        expect(result.truncated).toBe(true);
    });

    it("reads PDFs page by page and skips unreadable pages", async () => {
        const pdf = fakePdf(["Page one text", new Error("bad xref"), "Page three"]);
        const extractor = new TextExtractor({ openPdf: pdf.opener });

        const result = await extractor.extract({ kind: "file", data: new Uint8Array([1]), contentType: "application/pdf", filename: "a.pdf" });

        expect(result.text).toBe("Page one text\n\nPage three");
        expect(result.pageCount).toBe(3);
        expect(result.skippedPages).toEqual([2]);
        expect(pdf.closed()).toBe(true);
    });

    it("fails on a PDF without text", async () => {
        const pdf = fakePdf(["", "   "]);
        const error = await extractionFailure(
            new TextExtractor({ openPdf: pdf.opener }).extract({ kind: "file", data: new Uint8Array([1]), contentType: "application/pdf" })
        );

        expect(error.kind).toBe("empty");
        expect(error.message).toBe("PDF contains no extractable text.");
    });

    it("fails on a PDF that cannot be opened", async () => {
        const extractor = new TextExtractor({
            openPdf: async () => {
                throw new Error("Invalid PDF structure");
            },
        });

        const error = await extractionFailure(extractor.extract({ kind: "file", data: new Uint8Array([1]), contentType: "application/pdf" }));
        expect(error.kind).toBe("corrupted");
    });

    it("decodes markdown files by extension", async () => {
        const result = await new TextExtractor().extract({
            kind: "file",
            data: encoder.encode("# Heading\n\nSome markdown body."),
            contentType: "application/octet-stream",
            filename: "notes.md",
        });

        expect(result.text).toBe("# Heading\n\nSome markdown body.");
        expect(result.contentType).toBe("text/plain");
    });

    it("rejects invalid UTF-8", async () => {
        const error = await extractionFailure(
            new TextExtractor().extract({ kind: "file", data: new Uint8Array([0xff, 0xfe, 0xfd]), contentType: "text/plain" })
        );
        expect(error.kind).toBe("corrupted");
    });

    it("rejects unsupported file types", async () => {
        const error = await extractionFailure(
            new TextExtractor().extract({ kind: "file", data: new Uint8Array([1]), contentType: "application/zip", filename: "a.zip" })
        );
        expect(error.kind).toBe("unsupported_type");
        expect(error.message).toBe('Unsupported file type "application/zip".');
    });

    it("reads stored uploads through object storage", async () => {
        const objectStorage: ObjectStorage = {
            fetch: async () => ({ data: encoder.encode("Stored notes about the moon."), contentType: "text/plain" }),
        };

        const result = await new TextExtractor({ objectStorage }).extract({ kind: "stored", key: "uploads/moon.txt" });
        expect(result.text).toBe("Stored notes about the moon.");
    });

    it("fails stored uploads without object storage", async () => {
        const error = await extractionFailure(new TextExtractor().extract({ kind: "stored", key: "uploads/moon.txt" }));
        expect(error.kind).toBe("storage_unavailable");
    });

    it("extracts the readable part of a web page", async () => {
        const extractor = new TextExtractor({
            fetch: respondWith(ARTICLE_HTML, { status: 200, headers: { "content-type": "text/html; charset=utf-8" } }),
        });

        const result = await extractor.extract({ kind: "url", url: "https://example.com/tides" });

        expect(result.title).toBe("Tide Tables");
        expect(result.contentType).toBe("text/html");
        expect(result.text).toContain("Most coastlines see two high tides and two low tides every lunar day.");
        expect(result.text).not.toContain("var tracking");
    });

    it("explains missing pages", async () => {
        const extractor = new TextExtractor({ fetch: respondWith("", { status: 404, statusText: "Not Found" }) });

        const error = await extractionFailure(extractor.extract({ kind: "url", url: "https://example.com/missing" }));

        expect(error.kind).toBe("fetch_failed");
        expect(error.message).toBe("The URL was not found (404). Check that the URL is correct and accessible.");
    });

    it("rejects pages with too little content", async () => {
        const extractor = new TextExtractor({
            fetch: respondWith("Just a few words.", { status: 200, headers: { "content-type": "text/plain" } }),
        });

        const error = await extractionFailure(extractor.extract({ kind: "url", url: "https://example.com/short" }));
        expect(error.kind).toBe("empty");
        expect(error.message).toBe("Extracted content is too short (minimum 50 characters).");
    });

    it("rejects non-text responses", async () => {
        const extractor = new TextExtractor({
            fetch: respondWith("binary", { status: 200, headers: { "content-type": "image/png" } }),
        });

        const error = await extractionFailure(extractor.extract({ kind: "url", url: "https://example.com/a.png" }));
        expect(error.message).toBe('URL returned unsupported content type "image/png".');
    });

    it("rejects non-http URLs", async () => {
        const error = await extractionFailure(new TextExtractor().extract({ kind: "url", url: "file:///etc/hosts" }));
        expect(error.message).toBe("Invalid URL. Only HTTP and HTTPS are supported.");
    });

    it("wraps network failures", async () => {
        const extractor = new TextExtractor({
            fetch: async () => {
                throw new TypeError("fetch failed");
            },
        });

        const error = await extractionFailure(extractor.extract({ kind: "url", url: "https://example.com" }));
        expect(error.message).toBe("Failed to fetch URL: fetch failed");
    });

    it("reports a slow fetch as a timeout", async () => {
        const extractor = new TextExtractor({
            fetchTimeoutMs: 10,
            fetch: (_input: RequestInfo | URL, init?: RequestInit) =>
                new Promise((_resolve, reject) => {
                    const signal = init?.signal;
                    if (signal) {
                        signal.addEventListener("abort", () => reject(signal.reason), { once: true });
                    }
                }),
        });

        const error = await extractionFailure(extractor.extract({ kind: "url", url: "https://example.com/slow" }));
        expect(error.kind).toBe("fetch_failed");
        expect(error.message).toBe("Fetching URL timed out after 0s.");
    });

    it("surfaces caller cancellation", async () => {
        const controller = new AbortController();
        const extractor = new TextExtractor({
            fetch: async () => {
                controller.abort();
                throw new Error("aborted");
            },
        });

        await expect(
            extractor.extract({ kind: "url", url: "https://example.com" }, { signal: controller.signal })
        ).rejects.toBeInstanceOf(CancelledError);
    });
});
