import { get_encoding, encoding_for_model, Tiktoken, type TiktokenModel } from "tiktoken";

const TOKENIZER_FALLBACK = "cl100k_base";
const encoderCache = new Map<string, Tiktoken>();

/**
 * Special tokens tiktoken refuses to encode when they appear in plain input.
 */
const SPECIAL_TOKENS = [
    "<|endoftext|>",
    "<|endofprompt|>",
    "<|fim_prefix|>",
    "<|fim_middle|>",
    "<|fim_suffix|>",
] as const;

function sanitizeSpecialTokens(text: string): string {
    let sanitized = text;
    for (const token of SPECIAL_TOKENS) {
        if (!sanitized.includes(token)) continue;
        const placeholder = token
            .replace(/</g, "&lt;")
            .replace(/>/g, "&gt;")
            .replace(/\|/g, "&#124;");
        sanitized = sanitized.split(token).join(placeholder);
    }
    return sanitized;
}

export function getEncoder(model?: string): Tiktoken {
    const key = (model ?? TOKENIZER_FALLBACK).toLocaleLowerCase();
    const cached = encoderCache.get(key);
    if (cached) {
        return cached;
    }

    let encoder: Tiktoken;
    try {
        encoder = encoding_for_model(key as TiktokenModel);
    } catch {
        encoder = get_encoding(TOKENIZER_FALLBACK);
    }

    encoderCache.set(key, encoder);
    return encoder;
}

export function countTokens(text: string, model?: string): number {
    if(!text) return 0;
    try {
        return getEncoder(model).encode(sanitizeSpecialTokens(text)).length;
    } catch {
        // ~4 characters per token when the encoder rejects the input.
        return Math.ceil(text.length / 4);
    }
}

export function countTokensInBatch(chunks: string[], model?: string): number {
    return chunks.reduce((sum, current) => sum + countTokens(current, model), 0);
}

export type TokenCounter = (text: string) => number;

export function createTokenCounter(model?: string): TokenCounter {
    return (text: string) => countTokens(text, model);
}
