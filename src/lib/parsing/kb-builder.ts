import { access } from "fs/promises";
import path from "path";

import { INDEX_FORMAT_VERSION, writeCorpusArtifacts } from "../study/corpus-index";
import { toErrorMessage } from "../study/errors";
import { Chunk, Embedder } from "../study/types";
import { parsePdfFile } from "./parse-pdf";
import { extractTextbookChunks } from "./textbook";

type PdfTextReader = (filePath: string) => Promise<string>;

export type BuildCorpusIndexOptions = {
  pdfPaths: string[];
  outDir: string;
  embedder: Embedder;
  readPdf?: PdfTextReader;
};

export type BuildCorpusIndexResult = {
  chunksPath: string;
  indexPath: string;
  chunkCount: number;
  skipped: string[];
  dim: number;
};

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Rebuilds both corpus artifacts from scratch. Each PDF's file name becomes
 * the chapter of its chunks; every chunk is embedded, including `math` and
 * `excluded` ones, so positions in the two files line up.
 */
export async function buildCorpusIndex(options: BuildCorpusIndexOptions): Promise<BuildCorpusIndexResult> {
  const readPdf = options.readPdf ?? parsePdfFile;
  const chunks: Chunk[] = [];
  const skipped: string[] = [];

  for (const pdfPath of options.pdfPaths) {
    if (!(await fileExists(pdfPath))) {
      console.warn("[kb-builder] missing PDF, skipping", { pdfPath });
      skipped.push(pdfPath);
      continue;
    }

    let text: string;
    try {
      text = await readPdf(pdfPath);
    } catch (error) {
      console.warn("[kb-builder] could not read PDF, skipping", { pdfPath, message: toErrorMessage(error) });
      skipped.push(pdfPath);
      continue;
    }

    const extracted = extractTextbookChunks(text, path.basename(pdfPath));
    console.log("[kb-builder] extracted", {
      pdfPath,
      chunks: extracted.length,
      text: extracted.filter((chunk) => chunk.type === "text").length,
    });
    chunks.push(...extracted);
  }

  const vectors = await options.embedder.embedBatch(chunks.map((chunk) => chunk.text));
  const dim = vectors[0]?.length ?? 0;
  const written = await writeCorpusArtifacts(options.outDir, chunks, {
    version: INDEX_FORMAT_VERSION,
    model: options.embedder.model,
    dim,
    createdAt: new Date().toISOString(),
    vectors,
  });

  console.log("[kb-builder] wrote corpus", { outDir: options.outDir, chunks: chunks.length, dim });
  return { ...written, chunkCount: chunks.length, skipped, dim };
}
