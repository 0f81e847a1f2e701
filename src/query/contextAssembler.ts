import type { HistoryTurn } from "../llm/types";
import type { RetrievedChunk } from "../store/types";
import { countTokens, type TokenCounter } from "../utils/tokenEncoder";

export interface AssembleInput {
    /** Ranked, most relevant first. */
    chunks: RetrievedChunk[];
    /** Chronological, oldest first. */
    history: HistoryTurn[];
    budgetTokens: number;
    /** Share of the budget reserved for retrieved chunks. */
    retrievalShare?: number;
}

export interface AssembledContext {
    /** Rendered chunk block, each chunk tagged with its id. */
    context: string;
    chunkIds: string[];
    /** Selected turns, oldest first. */
    history: HistoryTurn[];
    /** Context plus history, exactly as counted against the budget. */
    text: string;
    tokenCount: number;
    truncated: boolean;
}

export const DEFAULT_RETRIEVAL_SHARE = 0.6;

const SECTION_SEPARATOR = "\n\n";

export function formatChunk(chunk: Pick<RetrievedChunk, "id" | "content">): string {
    return `[chunk:${chunk.id}]\n${chunk.content.trim()}`;
}

export function formatTurn(turn: HistoryTurn): string {
    return `${turn.role}: ${turn.content.trim()}`;
}

function renderChunks(chunks: RetrievedChunk[]): string {
    return chunks.map(formatChunk).join(SECTION_SEPARATOR);
}

function renderHistory(history: HistoryTurn[]): string {
    return history.map(formatTurn).join("\n");
}

function combine(context: string, history: string): string {
    if (!context) return history;
    if (!history) return context;
    return `${context}${SECTION_SEPARATOR}${history}`;
}

/**
 * Fits ranked chunks and recent history into a token budget.
 *
 * Chunks go first, in rank order, into `floor(budget * retrievalShare)`;
 * filling stops at the first chunk that does not fit. History then takes
 * what is left of the whole budget, newest turn first, and is rendered
 * oldest first. Every check counts the full rendered text, so the result
 * never exceeds the budget. Same input, same output.
 */
export class ContextAssembler {
    constructor(private readonly count: TokenCounter = (text) => countTokens(text)) {}

    assemble(input: AssembleInput): AssembledContext {
        const budget = Math.max(0, Math.floor(input.budgetTokens));
        const share = Math.min(1, Math.max(0, input.retrievalShare ?? DEFAULT_RETRIEVAL_SHARE));
        const retrievalBudget = Math.floor(budget * share);

        const selectedChunks: RetrievedChunk[] = [];
        for (const chunk of input.chunks) {
            const candidate = renderChunks([...selectedChunks, chunk]);
            if (this.count(candidate) > retrievalBudget) {
                break;
            }
            selectedChunks.push(chunk);
        }

        const context = renderChunks(selectedChunks);

        let selectedHistory: HistoryTurn[] = [];
        for (let i = input.history.length - 1; i >= 0; i -= 1) {
            const candidate = [input.history[i], ...selectedHistory];
            if (this.count(combine(context, renderHistory(candidate))) > budget) {
                break;
            }
            selectedHistory = candidate;
        }

        const text = combine(context, renderHistory(selectedHistory));

        return {
            context,
            chunkIds: selectedChunks.map((chunk) => chunk.id),
            history: selectedHistory,
            text,
            tokenCount: this.count(text),
            truncated: selectedChunks.length < input.chunks.length || selectedHistory.length < input.history.length,
        };
    }
}
