import { Chunk } from "../domain/types.js";

export const DEFAULT_CHUNK_SIZE = 1000;
export const DEFAULT_CHUNK_OVERLAP = 200;

// Strongest first: a window only falls back to a weaker separator when no stronger one
// lies far enough into the window.
const BOUNDARY_SEPARATORS = ["\n\n", "\n", ". ", "! ", "? ", "; ", " "];
const MIN_BOUNDARY_RATIO = 0.55;

export function createChunkId(documentId: string, sequenceIndex: number): string {
  return `${documentId}:${sequenceIndex}`;
}

/**
 * Splits extracted text into windows of at most `targetSize` characters. Consecutive
 * windows share `overlap` characters, and their ranges together cover the whole input.
 * Window edges never fall inside a surrogate pair; with `targetSize` 1 a pair is kept
 * whole in a window of two.
 */
export function chunkText(
  documentId: string,
  text: string,
  targetSize: number = DEFAULT_CHUNK_SIZE,
  overlap: number = DEFAULT_CHUNK_OVERLAP,
): Chunk[] {
  if (!Number.isInteger(targetSize) || targetSize <= 0) {
    throw new RangeError(`targetSize must be a positive integer, got ${targetSize}.`);
  }
  if (!Number.isInteger(overlap) || overlap < 0 || overlap >= targetSize) {
    throw new RangeError(`overlap must be in [0, ${targetSize}), got ${overlap}.`);
  }
  if (!text.trim()) {
    return [];
  }

  const chunks: Chunk[] = [];
  const minBoundary = Math.floor(targetSize * MIN_BOUNDARY_RATIO);
  let start = 0;

  while (start < text.length) {
    const hardEnd = Math.min(start + targetSize, text.length);
    let end = hardEnd;

    if (hardEnd < text.length) {
      const boundary = findLastBoundary(text.slice(start, hardEnd), minBoundary);
      if (boundary > 0) {
        end = start + boundary;
      } else if (splitsSurrogatePair(text, end)) {
        end = end - 1 > start ? end - 1 : end + 1;
      }
    }

    chunks.push({
      chunkId: createChunkId(documentId, chunks.length),
      documentId,
      sequenceIndex: chunks.length,
      text: text.slice(start, end),
      charStart: start,
      charEnd: end,
    });

    if (end >= text.length) {
      break;
    }

    let nextStart = end - overlap;
    if (splitsSurrogatePair(text, nextStart)) {
      nextStart -= 1;
    }
    start = nextStart > start ? nextStart : end;
  }

  return chunks;
}

function splitsSurrogatePair(text: string, index: number): boolean {
  if (index <= 0 || index >= text.length) {
    return false;
  }
  const before = text.charCodeAt(index - 1);
  const after = text.charCodeAt(index);
  return before >= 0xd800 && before <= 0xdbff && after >= 0xdc00 && after <= 0xdfff;
}

/** Position just past the strongest separator at or beyond `minBoundary`, or -1. */
function findLastBoundary(window: string, minBoundary: number): number {
  for (const separator of BOUNDARY_SEPARATORS) {
    const index = window.lastIndexOf(separator);
    if (index < 0) {
      continue;
    }
    const boundary = index + separator.length;
    if (boundary >= minBoundary) {
      return boundary;
    }
  }
  return -1;
}
