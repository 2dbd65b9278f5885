export { DEFAULT_EMBEDDING_MODEL, GeminiEmbedder } from "./lib/ai/providers/gemini";
export { loadTutorConfig } from "./lib/config";
export type { FirebaseCredentialsConfig, TutorConfig } from "./lib/config";
export { FirestoreProgressStore, sanitizeForFirestore } from "./lib/firestore/progress-store";
export { chunkProse, unwrapLines } from "./lib/parsing/chunker";
export { buildCorpusIndex } from "./lib/parsing/kb-builder";
export type { BuildCorpusIndexOptions, BuildCorpusIndexResult } from "./lib/parsing/kb-builder";
export { parsePdf, parsePdfFile } from "./lib/parsing/parse-pdf";
export { extractTextbookChunks, findRunningLines } from "./lib/parsing/textbook";
export * from "./lib/study/constants";
export {
  CHUNKS_FILE,
  CorpusIndex,
  INDEX_FILE,
  INDEX_FORMAT_VERSION,
  normalizeChunkRecord,
  readCorpusArtifacts,
  writeCorpusArtifacts,
} from "./lib/study/corpus-index";
export type { CorpusArtifacts, CorpusLoader, LoadedCorpus, VectorIndexFile } from "./lib/study/corpus-index";
export * from "./lib/study/errors";
export { Explainer, truncateAtWordBoundary } from "./lib/study/explainer";
export { Planner, resolveAction, resolveTopic } from "./lib/study/planner";
export { classifyStrength, summarizeAttempts } from "./lib/study/progress";
export { QuizGenerator } from "./lib/study/quiz-generator";
export { CorpusRetriever, NullRetriever } from "./lib/study/retriever";
export { cleanChunkText, isMathBlock, normalizeSurfaceText } from "./lib/study/text-filter";
export { isCorrectAnswer, TutorService } from "./lib/study/tutor";
export type {
  AnswerResult,
  AnswerSubmission,
  AskResponse,
  ExplainResponse,
  IndependentQuizResponse,
  QuizRequestDifficulty,
  QuizResponse,
  TutorServiceOptions,
} from "./lib/study/tutor";
export type * from "./lib/study/types";
export { createEmbedder, createTutorService } from "./lib/tutor-runtime";
export type { TutorRuntimeOverrides } from "./lib/tutor-runtime";
