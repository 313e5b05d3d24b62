/**
 * Character-window chunker with sentence-boundary preference.
 *
 * Windows are `chunkSize` characters long. When a window stops short of the end
 * of the text and its last "." sits at or beyond 70% of the window, the window
 * is shortened to end just after that period. Consecutive windows overlap by
 * `chunkOverlap` characters.
 *
 * chunkOverlap < chunkSize is the caller's responsibility (the config layer
 * validates it). If a window would not advance, the overlap is dropped for that
 * step so the loop always terminates.
 */
import type { Chunk, Metadata } from "./types";

export interface ChunkerOptions {
  chunkSize: number;
  chunkOverlap: number;
}

const SENTENCE_TERMINATOR = ".";
const SENTENCE_BOUNDARY_RATIO = 0.7;

export function chunkId(documentId: string, chunkNumber: number): string {
  return `${documentId}_chunk_${chunkNumber}`;
}

export class Chunker {
  private readonly chunkSize: number;
  private readonly chunkOverlap: number;

  constructor(options: ChunkerOptions) {
    this.chunkSize = options.chunkSize;
    this.chunkOverlap = options.chunkOverlap;
  }

  split(text: string, documentId: string, metadata: Metadata = {}): Chunk[] {
    const chunks: Chunk[] = [];
    let start = 0;

    while (start < text.length) {
      let end = Math.min(start + this.chunkSize, text.length);

      if (end < text.length) {
        const window = text.slice(start, end);
        const lastPeriod = window.lastIndexOf(SENTENCE_TERMINATOR);

        if (
          lastPeriod !== -1 &&
          lastPeriod >= this.chunkSize * SENTENCE_BOUNDARY_RATIO
        ) {
          end = start + lastPeriod + 1;
        }
      }

      const chunkText = text.slice(start, end).trim();

      if (chunkText) {
        const chunkNumber = chunks.length;
        chunks.push({
          id: chunkId(documentId, chunkNumber),
          text: chunkText,
          metadata: {
            ...metadata,
            parent_document_id: documentId,
            chunk_number: chunkNumber,
            chunk_start_offset: start,
            chunk_end_offset: end,
          },
        });
      }

      if (end >= text.length) {
        break;
      }

      const next = end - this.chunkOverlap;
      start = next > start ? next : end;
    }

    return chunks;
  }
}
