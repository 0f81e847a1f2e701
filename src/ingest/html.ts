import { JSDOM } from "jsdom";
import { Readability } from "@mozilla/readability";

export interface HtmlContent {
    title?: string;
    text: string;
}

const SKIPPED_TAGS = new Set(["SCRIPT", "STYLE", "NOSCRIPT", "TEMPLATE", "SVG", "IFRAME"]);
const BOILERPLATE_SELECTOR = "nav, header, footer, aside, form, [role=navigation], [aria-hidden=true]";
const BLOCK_TAGS = new Set([
    "ADDRESS", "ARTICLE", "BLOCKQUOTE", "BR", "DD", "DIV", "DL", "DT", "FIGCAPTION", "FIGURE",
    "H1", "H2", "H3", "H4", "H5", "H6", "HR", "LI", "MAIN", "OL", "P", "PRE", "SECTION",
    "TABLE", "TD", "TH", "TR", "UL",
]);

function collectText(node: Node, parts: string[]): void {
    if (node.nodeType === node.TEXT_NODE) {
        parts.push(node.textContent ?? "");
        return;
    }

    if (node.nodeType !== node.ELEMENT_NODE && node.nodeType !== node.DOCUMENT_FRAGMENT_NODE) {
        return;
    }

    const tag = node.nodeName.toUpperCase();
    if (SKIPPED_TAGS.has(tag)) {
        return;
    }

    const isBlock = BLOCK_TAGS.has(tag);
    if (isBlock) parts.push("\n");
    node.childNodes.forEach((child) => collectText(child, parts));
    if (isBlock) parts.push("\n");
}

function renderText(root: Node): string {
    const parts: string[] = [];
    collectText(root, parts);
    return parts
        .join("")
        .split("\n")
        .map((line) => line.replace(/\s+/g, " ").trim())
        .join("\n")
        .replace(/\n{3,}/g, "\n\n")
        .trim();
}

/**
 * Reduces an HTML page to its primary readable content. Falls back to the
 * page body minus navigation chrome when Readability finds no article.
 */
export function extractHtmlContent(html: string, url?: string): HtmlContent {
    const options = url ? { url } : undefined;
    const dom = new JSDOM(html, options);

    try {
        const { document } = dom.window;
        const pageTitle = document.querySelector("title")?.textContent?.trim() || undefined;

        // Readability mutates the document it is given.
        const article = new Readability(document).parse();
        if (article?.content) {
            const text = renderText(JSDOM.fragment(article.content));
            if (text) {
                return { title: pageTitle ?? (article.title?.trim() || undefined), text };
            }
        }
    } finally {
        dom.window.close();
    }

    const fallback = new JSDOM(html, options);
    try {
        const { document } = fallback.window;
        const pageTitle = document.querySelector("title")?.textContent?.trim() || undefined;
        document.querySelectorAll(BOILERPLATE_SELECTOR).forEach((element) => element.remove());
        return { title: pageTitle, text: document.body ? renderText(document.body) : "" };
    } finally {
        fallback.window.close();
    }
}
