/**
 * Prose chunking for textbook blocks.
 *
 * A block arrives as the wrapped lines of one PDF paragraph. Lines are
 * re-joined (undoing end-of-line hyphenation), and anything longer than
 * `maxChars` is packed sentence by sentence, falling back to word boundaries
 * for a single oversized sentence.
 */

export const DEFAULT_MAX_CHUNK_CHARS = 1500;

export function unwrapLines(block: string): string {
  return block
    .replace(/(\p{L})-\n(\p{Ll})/gu, "$1$2")
    .replace(/\s*\n\s*/g, " ")
    .replace(/[ \t]+/g, " ")
    .trim();
}

function splitAtWordBoundary(sentence: string, maxChars: number): string[] {
  const pieces: string[] = [];
  let buffer = "";
  for (const word of sentence.split(/\s+/)) {
    const next = buffer ? `${buffer} ${word}` : word;
    if (next.length <= maxChars || !buffer) {
      buffer = next;
    } else {
      pieces.push(buffer);
      buffer = word;
    }
  }
  if (buffer) pieces.push(buffer);
  return pieces;
}

export function chunkProse(block: string, maxChars = DEFAULT_MAX_CHUNK_CHARS): string[] {
  const text = unwrapLines(block);
  if (!text) return [];
  if (text.length <= maxChars) return [text];

  const chunks: string[] = [];
  let current = "";
  for (const sentence of text.split(/(?<=[.!?])\s+/)) {
    const candidate = current ? `${current} ${sentence}` : sentence;
    if (candidate.length <= maxChars) {
      current = candidate;
      continue;
    }

    if (current) chunks.push(current);
    if (sentence.length > maxChars) {
      const pieces = splitAtWordBoundary(sentence, maxChars);
      current = pieces.pop() ?? "";
      chunks.push(...pieces);
    } else {
      current = sentence;
    }
  }

  if (current) chunks.push(current);
  return chunks;
}
