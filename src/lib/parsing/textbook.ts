import { isMathBlock, normalizeSurfaceText } from "../study/text-filter";
import { Chunk } from "../study/types";
import { chunkProse, DEFAULT_MAX_CHUNK_CHARS } from "./chunker";

const MIN_BLOCK_CHARS = 25;
const MIN_RUNNING_LINE_CHARS = 6;
const MAX_RUNNING_LINE_CHARS = 80;
const RUNNING_LINE_REPEATS = 3;
const PAGE_NUMBER_PATTERN = /^\d{1,3}$/;

/** Lines that repeat on many pages: running headers, footers, book titles. */
export function findRunningLines(lines: string[]): Set<string> {
  const counts = new Map<string, number>();
  for (const line of lines) {
    if (line.length < MIN_RUNNING_LINE_CHARS || line.length > MAX_RUNNING_LINE_CHARS) continue;
    counts.set(line, (counts.get(line) ?? 0) + 1);
  }

  const repeated = new Set<string>();
  for (const [line, count] of counts) {
    if (count >= RUNNING_LINE_REPEATS) repeated.add(line);
  }
  return repeated;
}

/**
 * Splits the extracted text of one textbook into typed chunks. Running
 * headers and footers are kept once each as `excluded`, formula and exercise
 * blocks become `math`, and prose is chunked into `text`.
 */
export function extractTextbookChunks(
  text: string,
  chapter: string,
  maxChunkChars = DEFAULT_MAX_CHUNK_CHARS,
): Chunk[] {
  const lines = normalizeSurfaceText(text)
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => !PAGE_NUMBER_PATTERN.test(line));
  const runningLines = findRunningLines(lines);

  const chunks: Chunk[] = [];
  const seenRunningLines = new Set<string>();
  let block: string[] = [];

  const flush = () => {
    const body = block.join("\n").trim();
    block = [];
    if (body.length < MIN_BLOCK_CHARS) return;

    if (isMathBlock(body)) {
      chunks.push({ chapter, text: body, type: "math" });
      return;
    }
    for (const piece of chunkProse(body, maxChunkChars)) {
      if (piece.length >= MIN_BLOCK_CHARS) {
        chunks.push({ chapter, text: piece, type: "text" });
      }
    }
  };

  for (const line of lines) {
    if (!line) {
      flush();
      continue;
    }

    if (runningLines.has(line)) {
      flush();
      if (!seenRunningLines.has(line)) {
        seenRunningLines.add(line);
        chunks.push({ chapter, text: line, type: "excluded" });
      }
      continue;
    }

    block.push(line);
  }
  flush();

  return chunks;
}
