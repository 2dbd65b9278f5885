import { readFile } from "fs/promises";

export async function parsePdf(buffer: Buffer): Promise<string> {
  // Loaded on first use: the package runs a self-test when it is the entry module.
  const { default: pdfParse } = await import("pdf-parse");
  const parsed = await pdfParse(buffer);
  return parsed.text?.trim() ?? "";
}

export async function parsePdfFile(filePath: string): Promise<string> {
  return parsePdf(await readFile(filePath));
}
