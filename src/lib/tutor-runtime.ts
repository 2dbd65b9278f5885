import { GeminiEmbedder } from "./ai/providers/gemini";
import { TutorConfig } from "./config";
import { FirestoreProgressStore } from "./firestore/progress-store";
import { CorpusIndex } from "./study/corpus-index";
import { Explainer } from "./study/explainer";
import { Planner } from "./study/planner";
import { QuizGenerator } from "./study/quiz-generator";
import { CorpusRetriever } from "./study/retriever";
import { TutorService } from "./study/tutor";
import { Embedder, ProgressStore, Retriever } from "./study/types";

export type TutorRuntimeOverrides = {
  embedder?: Embedder;
  retriever?: Retriever;
  store?: ProgressStore;
};

export function createEmbedder(config: TutorConfig): Embedder {
  return new GeminiEmbedder({ apiKey: config.geminiApiKey, model: config.embeddingModel });
}

/** Wires one long-lived tutor: the corpus loads once and is shared by every request. */
export function createTutorService(config: TutorConfig, overrides: TutorRuntimeOverrides = {}): TutorService {
  const store = overrides.store ?? FirestoreProgressStore.fromConfig(config.firebase);
  const retriever =
    overrides.retriever ??
    new CorpusRetriever(CorpusIndex.fromDirectory(config.kbDir), overrides.embedder ?? createEmbedder(config));

  return new TutorService({
    planner: new Planner(store),
    explainer: new Explainer(retriever),
    quizGenerator: new QuizGenerator(retriever),
    store,
    explainTopK: config.explainTopK,
    explainMaxChars: config.explainMaxChars,
    quizQuestions: config.quizQuestions,
  });
}
