import { EmbeddingError, EmbeddingErrorCode } from "../../study/errors";
import { Embedder } from "../../study/types";

export const DEFAULT_EMBEDDING_MODEL = "text-embedding-004";

const GEMINI_API_BASE = "https://generativelanguage.googleapis.com/v1beta";
const BATCH_LIMIT = 100;

type GeminiProviderErrorCode = Exclude<EmbeddingErrorCode, "dimension_mismatch" | "unknown_provider_error">;

function createGeminiError(code: GeminiProviderErrorCode, message: string): EmbeddingError {
  const error = new EmbeddingError(code, message);
  error.name = "GeminiProviderError";
  return error;
}

type GeminiEmbedderOptions = {
  apiKey?: string;
  model?: string;
  fetchImpl?: typeof fetch;
};

type EmbedContentResponse = {
  embedding?: { values?: number[] };
};

type BatchEmbedContentsResponse = {
  embeddings?: Array<{ values?: number[] }>;
};

function toContent(text: string) {
  return { parts: [{ text }] };
}

function hasValues(values: number[] | undefined): values is number[] {
  return Array.isArray(values) && values.length > 0 && values.every((value) => typeof value === "number");
}

/** Gemini embedding endpoint client; the same model must build and query an index. */
export class GeminiEmbedder implements Embedder {
  readonly model: string;
  private readonly apiKey?: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: GeminiEmbedderOptions = {}) {
    this.model = options.model ?? DEFAULT_EMBEDDING_MODEL;
    this.apiKey = options.apiKey;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async embed(text: string): Promise<number[]> {
    const data = await this.post<EmbedContentResponse>("embedContent", {
      content: toContent(text),
    });

    const values = data.embedding?.values;
    if (!hasValues(values)) {
      throw createGeminiError("empty_response", "Gemini returned an empty embedding");
    }
    return values;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    const vectors: number[][] = [];
    for (let index = 0; index < texts.length; index += BATCH_LIMIT) {
      const slice = texts.slice(index, index + BATCH_LIMIT);
      const data = await this.post<BatchEmbedContentsResponse>("batchEmbedContents", {
        requests: slice.map((text) => ({
          model: `models/${this.model}`,
          content: toContent(text),
        })),
      });

      const embeddings = data.embeddings ?? [];
      if (embeddings.length !== slice.length) {
        throw createGeminiError(
          "empty_response",
          `Gemini returned ${embeddings.length} embeddings for ${slice.length} inputs`,
        );
      }
      for (const embedding of embeddings) {
        if (!hasValues(embedding.values)) {
          throw createGeminiError("empty_response", "Gemini returned an empty embedding");
        }
        vectors.push(embedding.values);
      }
    }
    return vectors;
  }

  private async post<T>(method: "embedContent" | "batchEmbedContents", body: unknown): Promise<T> {
    if (!this.apiKey) {
      throw createGeminiError("missing_api_key", "Missing GEMINI_API_KEY");
    }

    let response: Response;
    try {
      response = await this.fetchImpl(`${GEMINI_API_BASE}/models/${this.model}:${method}?key=${this.apiKey}`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(body),
      });
    } catch (error) {
      throw createGeminiError(
        "request_failed",
        `Gemini request failed: ${error instanceof Error ? error.message : "network error"}`,
      );
    }

    if (!response.ok) {
      const errorText = await response.text();
      throw createGeminiError("request_failed", `Gemini request failed: ${response.status} ${errorText}`);
    }

    return (await response.json()) as T;
  }
}
