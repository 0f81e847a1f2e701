import type { GenerateReplyOptions, HistoryTurn } from "./types";

const GROUNDED_SYSTEM_PROMPT = [
    "You are a study assistant answering questions about the user's notebook sources.",
    "Use the provided source excerpts as your primary evidence.",
    "Each excerpt is tagged with its chunk id, e.g. [chunk:abc].",
    "",
    "When answering:",
    "- Answer directly and concisely from the excerpts.",
    "- Quote or paraphrase the relevant passage when it helps.",
    "- If the excerpts do not cover the question, say so clearly instead of guessing.",
    "- Do not invent facts, figures or citations that are not in the excerpts.",
].join("\n");

const UNGROUNDED_SYSTEM_PROMPT = [
    "You are a study assistant answering questions about the user's notebook.",
    "No source excerpts are available for this question.",
    "Answer from general knowledge, and say plainly that the answer is not based on the notebook's sources.",
].join("\n");

export interface PromptMessages {
    system: string;
    user: string;
}

function formatHistory(history: HistoryTurn[]): string {
    return history
        .map((turn) => `${turn.role === "assistant" ? "Assistant" : turn.role === "system" ? "System" : "User"}: ${turn.content.trim()}`)
        .join("\n");
}

export function buildPromptMessages(options: GenerateReplyOptions): PromptMessages {
    const system = options.systemPrompt ?? (options.grounded ? GROUNDED_SYSTEM_PROMPT : UNGROUNDED_SYSTEM_PROMPT);
    const sections: string[] = [];

    if (options.grounded && options.context.trim()) {
        sections.push(`Source excerpts:\n${options.context.trim()}`);
    }

    if (options.history.length > 0) {
        sections.push(`Conversation so far:\n${formatHistory(options.history)}`);
    }

    sections.push(`Question:\n${options.question.trim()}`);

    return {
        system,
        user: sections.join("\n\n---\n\n"),
    };
}
