import { DEDUP_PREFIX_CHARS, MIN_CHUNK_CHARS } from "./constants";
import { CorpusIndex } from "./corpus-index";
import { EmbeddingError, toErrorMessage } from "./errors";
import { cleanChunkText, isMathBlock } from "./text-filter";
import { Chunk, Embedder, Retriever } from "./types";

export const DEFAULT_RETRIEVE_TOP_K = 3;

/** Retriever that never finds anything; the default collaborator in tests. */
export class NullRetriever implements Retriever {
  async retrieve(): Promise<Chunk[]> {
    return [];
  }
}

export class CorpusRetriever implements Retriever {
  private modelChecked = false;

  constructor(
    private readonly index: CorpusIndex,
    private readonly embedder: Embedder,
  ) {}

  async retrieve(query: string, topK = DEFAULT_RETRIEVE_TOP_K): Promise<Chunk[]> {
    const corpus = await this.index.load();
    if (!this.modelChecked) {
      this.modelChecked = true;
      if (corpus.model !== this.embedder.model) {
        console.warn("[retriever] index and query embedders differ", {
          indexModel: corpus.model,
          queryModel: this.embedder.model,
        });
      }
    }

    const queryVector = await this.embedQuery(query);
    const positions = await this.index.search(queryVector, topK);

    const results: Chunk[] = [];
    const seen = new Set<string>();
    for (const position of positions) {
      const chunk = await this.index.chunkAt(position);
      if (!chunk || chunk.type !== "text") {
        continue;
      }
      if (isMathBlock(chunk.text)) {
        continue;
      }

      const cleaned = cleanChunkText(chunk.text);
      if (cleaned.length < MIN_CHUNK_CHARS || isMathBlock(cleaned)) {
        continue;
      }

      const key = JSON.stringify([chunk.chapter, cleaned.slice(0, DEDUP_PREFIX_CHARS)]);
      if (seen.has(key)) {
        continue;
      }
      seen.add(key);
      results.push({ chapter: chunk.chapter, text: cleaned, type: "text" });
    }

    console.log("[retriever] retrieved", {
      query,
      topK,
      candidates: positions.length,
      kept: results.length,
    });
    return results;
  }

  private async embedQuery(query: string): Promise<number[]> {
    try {
      return await this.embedder.embed(query);
    } catch (error) {
      if (error instanceof EmbeddingError) {
        throw error;
      }
      throw new EmbeddingError("unknown_provider_error", toErrorMessage(error));
    }
  }
}
