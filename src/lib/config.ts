import path from "path";

import { DEFAULT_EMBEDDING_MODEL } from "./ai/providers/gemini";
import { DEFAULT_EXPLAIN_MAX_CHARS, DEFAULT_EXPLAIN_TOP_K, DEFAULT_QUIZ_QUESTIONS } from "./study/constants";

export type FirebaseCredentialsConfig = {
  serviceAccountKey?: string;
  projectId?: string;
  clientEmail?: string;
  privateKey?: string;
  production: boolean;
};

export type TutorConfig = {
  geminiApiKey?: string;
  embeddingModel: string;
  kbDir: string;
  explainTopK: number;
  explainMaxChars: number;
  quizQuestions: number;
  firebase: FirebaseCredentialsConfig;
};

function readPositiveInt(value: string | undefined, fallback: number, name: string): number {
  if (value === undefined || !value.trim()) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    console.warn(`[config] ignoring ${name}, expected a positive integer`, { value });
    return fallback;
  }
  return parsed;
}

function readOptional(value: string | undefined): string | undefined {
  return value?.trim() ? value : undefined;
}

export function loadTutorConfig(env: NodeJS.ProcessEnv = process.env): TutorConfig {
  return {
    geminiApiKey: readOptional(env.GEMINI_API_KEY),
    embeddingModel: readOptional(env.GEMINI_EMBEDDING_MODEL) ?? DEFAULT_EMBEDDING_MODEL,
    kbDir: path.resolve(readOptional(env.TUTOR_KB_DIR) ?? "kb"),
    explainTopK: readPositiveInt(env.TUTOR_EXPLAIN_TOP_K, DEFAULT_EXPLAIN_TOP_K, "TUTOR_EXPLAIN_TOP_K"),
    explainMaxChars: readPositiveInt(
      env.TUTOR_EXPLAIN_MAX_CHARS,
      DEFAULT_EXPLAIN_MAX_CHARS,
      "TUTOR_EXPLAIN_MAX_CHARS",
    ),
    quizQuestions: readPositiveInt(env.TUTOR_QUIZ_QUESTIONS, DEFAULT_QUIZ_QUESTIONS, "TUTOR_QUIZ_QUESTIONS"),
    firebase: {
      serviceAccountKey: readOptional(env.FIREBASE_SERVICE_ACCOUNT_KEY),
      projectId: readOptional(env.FIREBASE_PROJECT_ID),
      clientEmail: readOptional(env.FIREBASE_CLIENT_EMAIL),
      privateKey: readOptional(env.FIREBASE_PRIVATE_KEY),
      production: env.NODE_ENV === "production",
    },
  };
}
