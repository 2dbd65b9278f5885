import { mkdir, readFile, writeFile } from "fs/promises";
import path from "path";

import { EmbeddingError, MissingIndexError } from "./errors";
import { Chunk, ChunkType } from "./types";

export const CHUNKS_FILE = "kb_chunks.json";
export const INDEX_FILE = "kb_index.json";
export const INDEX_FORMAT_VERSION = 1;

export type VectorIndexFile = {
  version: number;
  model: string;
  dim: number;
  createdAt: string;
  vectors: number[][];
};

export type CorpusArtifacts = {
  index: VectorIndexFile;
  /** Chunk entries as stored; older builds wrote bare strings. */
  chunks: unknown[];
};

export type CorpusLoader = () => Promise<CorpusArtifacts>;

export type LoadedCorpus = {
  model: string;
  dim: number;
  vectors: number[][];
  chunks: Chunk[];
};

function isChunkType(value: unknown): value is ChunkType {
  return value === "text" || value === "math" || value === "excluded";
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((item) => typeof item === "number");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Maps any stored chunk entry onto a Chunk. Unusable entries become empty
 * `excluded` chunks so positions stay aligned with the vector artifact.
 */
export function normalizeChunkRecord(record: unknown): Chunk {
  if (typeof record === "string") {
    return { chapter: "unknown", text: record, type: "text" };
  }

  if (!isRecord(record)) {
    return { chapter: "unknown", text: "", type: "excluded" };
  }

  const chapter = typeof record.chapter === "string" && record.chapter.trim() ? record.chapter : "unknown";
  const text = typeof record.text === "string" ? record.text : "";
  const type = isChunkType(record.type) ? record.type : "text";
  return { chapter, text, type };
}

function parseVectorIndex(raw: unknown): VectorIndexFile {
  if (!isRecord(raw) || !Array.isArray(raw.vectors)) {
    throw new MissingIndexError("invalid_index", `${INDEX_FILE} is not a vector index`);
  }

  const vectors: number[][] = [];
  raw.vectors.forEach((vector: unknown, position: number) => {
    if (!isNumberArray(vector)) {
      throw new MissingIndexError("invalid_index", `${INDEX_FILE} has a malformed vector at position ${position}`);
    }
    vectors.push(vector);
  });

  const dim = typeof raw.dim === "number" ? raw.dim : (vectors[0]?.length ?? 0);
  return {
    version: typeof raw.version === "number" ? raw.version : INDEX_FORMAT_VERSION,
    model: typeof raw.model === "string" ? raw.model : "unknown",
    dim,
    createdAt: typeof raw.createdAt === "string" ? raw.createdAt : "",
    vectors,
  };
}

async function readJsonArtifact(filePath: string): Promise<unknown> {
  let contents: string;
  try {
    contents = await readFile(filePath, "utf8");
  } catch (error) {
    const code = isRecord(error) ? error.code : undefined;
    if (code === "ENOENT") {
      throw new MissingIndexError("missing_index", `${path.basename(filePath)} missing; run build-index first.`);
    }
    throw new MissingIndexError(
      "missing_index",
      `Could not read ${filePath}: ${error instanceof Error ? error.message : "unknown error"}`,
    );
  }

  try {
    return JSON.parse(contents) as unknown;
  } catch {
    throw new MissingIndexError("invalid_index", `${path.basename(filePath)} is not valid JSON`);
  }
}

export async function readCorpusArtifacts(dir: string): Promise<CorpusArtifacts> {
  const [rawChunks, rawIndex] = await Promise.all([
    readJsonArtifact(path.join(dir, CHUNKS_FILE)),
    readJsonArtifact(path.join(dir, INDEX_FILE)),
  ]);

  if (!Array.isArray(rawChunks)) {
    throw new MissingIndexError("invalid_index", `${CHUNKS_FILE} must hold an array of chunks`);
  }

  return { chunks: rawChunks, index: parseVectorIndex(rawIndex) };
}

export async function writeCorpusArtifacts(
  dir: string,
  chunks: Chunk[],
  index: VectorIndexFile,
): Promise<{ chunksPath: string; indexPath: string }> {
  await mkdir(dir, { recursive: true });
  const chunksPath = path.join(dir, CHUNKS_FILE);
  const indexPath = path.join(dir, INDEX_FILE);
  await writeFile(chunksPath, JSON.stringify(chunks), "utf8");
  await writeFile(indexPath, JSON.stringify(index), "utf8");
  return { chunksPath, indexPath };
}

function squaredDistance(a: number[], b: number[]): number {
  let sum = 0;
  for (let index = 0; index < a.length; index += 1) {
    const delta = a[index] - b[index];
    sum += delta * delta;
  }
  return sum;
}

/**
 * Read-only exact nearest-neighbour index over the textbook corpus.
 *
 * Artifacts load on first use. Concurrent cold callers share the same pending
 * load; a failed load is forgotten so the next call tries again.
 */
export class CorpusIndex {
  private loaded?: LoadedCorpus;
  private pending?: Promise<LoadedCorpus>;

  constructor(private readonly loader: CorpusLoader) {}

  static fromDirectory(dir: string): CorpusIndex {
    return new CorpusIndex(() => readCorpusArtifacts(dir));
  }

  async load(): Promise<LoadedCorpus> {
    if (this.loaded) {
      return this.loaded;
    }

    if (!this.pending) {
      this.pending = this.loader()
        .then((artifacts) => {
          const corpus = this.toLoadedCorpus(artifacts);
          this.loaded = corpus;
          return corpus;
        })
        .finally(() => {
          this.pending = undefined;
        });
    }

    return this.pending;
  }

  /** Positions of the `k` nearest vectors, closest first. */
  async search(query: number[], k: number): Promise<number[]> {
    const corpus = await this.load();
    if (k <= 0 || !corpus.vectors.length) {
      return [];
    }

    if (query.length !== corpus.dim) {
      throw new EmbeddingError(
        "dimension_mismatch",
        `Query embedding has ${query.length} dimensions but the index (${corpus.model}) expects ${corpus.dim}`,
      );
    }

    return corpus.vectors
      .map((vector, position) => ({ position, distance: squaredDistance(query, vector) }))
      .sort((a, b) => a.distance - b.distance || a.position - b.position)
      .slice(0, k)
      .map((item) => item.position);
  }

  async chunkAt(position: number): Promise<Chunk | undefined> {
    const corpus = await this.load();
    if (!Number.isInteger(position) || position < 0 || position >= corpus.chunks.length) {
      return undefined;
    }
    return corpus.chunks[position];
  }

  private toLoadedCorpus(artifacts: CorpusArtifacts): LoadedCorpus {
    const { index } = artifacts;
    if (index.vectors.length !== artifacts.chunks.length) {
      throw new MissingIndexError(
        "misaligned_index",
        `Index holds ${index.vectors.length} vectors but ${artifacts.chunks.length} chunks`,
      );
    }

    const mismatched = index.vectors.findIndex((vector) => vector.length !== index.dim);
    if (mismatched >= 0) {
      throw new MissingIndexError(
        "misaligned_index",
        `Vector ${mismatched} has ${index.vectors[mismatched].length} dimensions, expected ${index.dim}`,
      );
    }

    return {
      model: index.model,
      dim: index.dim,
      vectors: index.vectors,
      chunks: artifacts.chunks.map(normalizeChunkRecord),
    };
  }
}
