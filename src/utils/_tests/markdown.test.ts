import { describe, expect, it } from "vitest";

import { markdownTitle, normalizeMarkdown } from "../markdown";

describe("normalizeMarkdown", () => {
  it("reduces Markdown to paragraphs of plain text", () => {
    const raw = [
      "# Title",
      "",
      "Hello **world** & friends.",
      "",
      "- one",
      "- two",
      "",
      "```js",
      "code",
      "```",
    ].join("\n");

    expect(normalizeMarkdown(raw)).toBe("Title\n\nHello world & friends.\n\none\n\ntwo");
  });

  it("returns an empty string for whitespace", () => {
    expect(normalizeMarkdown("  \n\n ")).toBe("");
  });
});

describe("markdownTitle", () => {
  it("finds the first level-one heading", () => {
    expect(markdownTitle("Intro\n\n# Projects\n\n## Portfolio")).toBe("Projects");
  });

  it("ignores deeper headings", () => {
    expect(markdownTitle("## Skills")).toBeUndefined();
  });
});
