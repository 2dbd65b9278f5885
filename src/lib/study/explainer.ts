import { DEFAULT_EXPLAIN_MAX_CHARS, DEFAULT_EXPLAIN_TOP_K, FALLBACK_MESSAGE } from "./constants";
import { NullRetriever } from "./retriever";
import { Explanation, Retriever } from "./types";

const ELLIPSIS = "...";

/** Cuts `text` to at most `maxChars` without splitting a word, marking the cut. */
export function truncateAtWordBoundary(text: string, maxChars: number): string {
  if (text.length <= maxChars) {
    return text;
  }

  let cut = text.slice(0, maxChars);
  const endsInsideWord = /\S/.test(text.charAt(maxChars)) && /\S$/.test(cut);
  if (endsInsideWord) {
    const lastSpace = cut.search(/\s\S*$/);
    if (lastSpace > 0) {
      cut = cut.slice(0, lastSpace);
    }
  }

  return `${cut.trimEnd()}${ELLIPSIS}`;
}

export class Explainer {
  constructor(private readonly retriever: Retriever = new NullRetriever()) {}

  async explain(
    topic: string,
    topK = DEFAULT_EXPLAIN_TOP_K,
    maxChars = DEFAULT_EXPLAIN_MAX_CHARS,
  ): Promise<Explanation> {
    const chunks = await this.retriever.retrieve(topic, topK);
    if (!chunks.length) {
      return { topic, explanation: FALLBACK_MESSAGE, chapter: null, sources: [] };
    }

    const parts: string[] = [];
    const sources: string[] = [];
    for (const chunk of chunks.slice(0, topK)) {
      const text = chunk.text.trim();
      if (!text) {
        continue;
      }
      parts.push(text);
      if (chunk.chapter) {
        sources.push(chunk.chapter);
      }
    }

    return {
      topic,
      explanation: truncateAtWordBoundary(parts.join("\n\n"), maxChars),
      chapter: sources[0] ?? null,
      sources,
    };
  }
}
