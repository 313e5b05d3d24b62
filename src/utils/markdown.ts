/**
 * Markdown to plain text conversion for knowledge-base ingestion.
 *
 * The document is rendered to HTML with markdown-it and then reduced to text
 * with one paragraph per block element, so the chunker sees sentence and
 * paragraph structure rather than Markdown syntax.
 */
import MarkdownIt from "markdown-it";

const md = new MarkdownIt();

const HTML_ENTITIES: Record<string, string> = {
  "&amp;": "&",
  "&lt;": "<",
  "&gt;": ">",
  "&quot;": '"',
  "&#39;": "'",
};

export function normalizeMarkdown(raw: string): string {
  const rendered = md.render(raw);

  return rendered
    .replace(/<pre><code[^>]*>[\s\S]*?<\/code><\/pre>/g, "")
    .replace(/<\/(p|h[1-6]|li|blockquote|tr)>/g, "\n\n")
    .replace(/<br\s*\/?>/g, "\n")
    .replace(/<[^>]+>/g, "")
    .replace(/&(amp|lt|gt|quot|#39);/g, (entity) => HTML_ENTITIES[entity] ?? entity)
    .split("\n")
    .map((line) => line.trim())
    .join("\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

/** First level-one heading of a Markdown document, if any. */
export function markdownTitle(raw: string): string | undefined {
  const match = /^#\s+(.+)$/m.exec(raw);
  return match?.[1]?.trim();
}
