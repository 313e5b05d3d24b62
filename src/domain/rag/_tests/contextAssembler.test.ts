import type { ChatTurn } from "@domain/llm/ports";
import { describe, expect, it } from "vitest";

import {
  buildContext,
  buildMessages,
  buildPlainMessages,
  buildSystemPrompt,
  formatRelevance,
  MAX_HISTORY_TURNS,
  NO_CONTEXT_SENTINEL,
  PLAIN_SYSTEM_PROMPT,
} from "../contextAssembler";
import type { RetrievedFragment } from "../types";

function fragment(id: string, score: number, text: string): RetrievedFragment {
  return { id, score, text, metadata: {} };
}

describe("buildContext", () => {
  it("returns the sentinel when nothing was retrieved", () => {
    expect(buildContext([])).toBe("No relevant context found.");
    expect(NO_CONTEXT_SENTINEL).toBe("No relevant context found.");
  });

  it("numbers fragments and rounds their relevance to two decimals", () => {
    const context = buildContext([
      fragment("a_chunk_0", 0.876, "First passage."),
      fragment("b_chunk_2", 0.5, "Second passage."),
    ]);

    expect(context).toBe(
      "Context 1 (relevance: 0.88):\nFirst passage.\n\n" +
        "Context 2 (relevance: 0.50):\nSecond passage."
    );
  });
});

describe("formatRelevance", () => {
  it("rounds exact halves up", () => {
    expect(formatRelevance(0.125)).toBe("0.13");
    expect(formatRelevance(0.5)).toBe("0.50");
    expect(formatRelevance(1)).toBe("1.00");
  });
});

describe("buildMessages", () => {
  it("puts the system prompt first and the user turn last", () => {
    const messages = buildMessages("What do you build?", "Context 1 (relevance: 0.90):\nTools.");

    expect(messages).toEqual([
      { role: "system", content: buildSystemPrompt("Context 1 (relevance: 0.90):\nTools.") },
      { role: "user", content: "What do you build?" },
    ]);
    expect(messages[0]?.content).toContain("Context:\nContext 1 (relevance: 0.90):\nTools.\n\nInstructions:");
  });

  it("keeps only the most recent history turns", () => {
    const history: ChatTurn[] = Array.from({ length: 15 }, (_, i) => ({
      role: i % 2 === 0 ? "user" : "assistant",
      content: `turn ${i}`,
    }));

    const messages = buildMessages("latest", NO_CONTEXT_SENTINEL, history);

    expect(messages).toHaveLength(MAX_HISTORY_TURNS + 2);
    expect(messages[1]).toEqual({ role: "assistant", content: "turn 5" });
    expect(messages[10]).toEqual({ role: "user", content: "turn 14" });
    expect(messages[11]).toEqual({ role: "user", content: "latest" });
  });

  it("passes short history through unchanged", () => {
    const history: ChatTurn[] = [
      { role: "user", content: "Hi" },
      { role: "assistant", content: "Hello!" },
    ];

    const messages = buildMessages("Tell me more", NO_CONTEXT_SENTINEL, history);

    expect(messages.slice(1, 3)).toEqual(history);
    expect(messages).toHaveLength(4);
  });
});

describe("buildPlainMessages", () => {
  it("builds a single-turn prompt without context", () => {
    expect(buildPlainMessages("Hi")).toEqual([
      { role: "system", content: PLAIN_SYSTEM_PROMPT },
      { role: "user", content: "Hi" },
    ]);
  });
});
