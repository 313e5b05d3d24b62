/**
 * Prompt construction for retrieval-augmented chat.
 *
 * buildContext() renders retrieved fragments into one annotated context block;
 * buildMessages() wraps it in the assistant's system prompt, followed by at most
 * MAX_HISTORY_TURNS turns of caller-supplied history and the new user turn.
 */
import type { ChatTurn } from "@domain/llm/ports";

import type { RetrievedFragment } from "./types";

export const NO_CONTEXT_SENTINEL = "No relevant context found.";

export const MAX_HISTORY_TURNS = 10;

export const PLAIN_SYSTEM_PROMPT =
  "You are a helpful assistant for a software developer's portfolio website.";

export function buildSystemPrompt(context: string): string {
  return `You are a helpful assistant for a software developer's portfolio website.
You have access to relevant context from the developer's knowledge base.

Use the following context to answer the user's question. If the context doesn't contain
relevant information, you can still provide a helpful response based on your general knowledge,
but mention that you don't have specific information from the developer's materials.

Context:
${context}

Instructions:
- Provide accurate, helpful responses
- Reference the context when relevant
- Be conversational and engaging
- If asked about the developer's work, projects, or experience, use the provided context
- Keep responses concise but informative`;
}

/** Relevance as shown to the model. Exact halves round up (0.125 -> "0.13"). */
export function formatRelevance(score: number): string {
  return score.toFixed(2);
}

export function buildContext(fragments: RetrievedFragment[]): string {
  if (fragments.length === 0) {
    return NO_CONTEXT_SENTINEL;
  }

  return fragments
    .map(
      (fragment, i) =>
        `Context ${i + 1} (relevance: ${formatRelevance(fragment.score)}):\n${fragment.text}`
    )
    .join("\n\n");
}

export function buildMessages(
  userMessage: string,
  context: string,
  history: ChatTurn[] = []
): ChatTurn[] {
  const recent = history
    .slice(-MAX_HISTORY_TURNS)
    .map((turn): ChatTurn => ({ role: turn.role, content: turn.content }));

  return [
    { role: "system", content: buildSystemPrompt(context) },
    ...recent,
    { role: "user", content: userMessage },
  ];
}

/** Single-turn prompt without retrieval, for the non-RAG fallback path. */
export function buildPlainMessages(userMessage: string): ChatTurn[] {
  return [
    { role: "system", content: PLAIN_SYSTEM_PROMPT },
    { role: "user", content: userMessage },
  ];
}
