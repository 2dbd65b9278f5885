import { FieldValue, type DocumentData, type Firestore } from "firebase-admin/firestore";

import type { FirebaseCredentialsConfig } from "../config";
import { getAdminFirestore } from "../firebase-admin";
import {
  DEFAULT_INTERACTION_LIMIT,
  INTERACTION_RESPONSE_LIMIT,
  INTERACTION_RETRIEVED_LIMIT,
  summarizeAttempts,
  truncateForLog,
} from "../study/progress";
import {
  Attempt,
  Difficulty,
  InteractionInput,
  InteractionRecord,
  PlanLogEntry,
  ProgressStore,
  QuizMeta,
  RegistrationResult,
  Strength,
  StudentProgress,
} from "../study/types";

function sanitizeValue(value: unknown): unknown {
  if (value === undefined) return null;
  if (value === null) return value;
  if (Array.isArray(value)) return value.map(sanitizeValue);
  if (typeof value === "object") return sanitizeForFirestore(value);
  return value;
}

/**
 * Recursively replaces every `undefined` value with `null` so that Firestore
 * never rejects the payload with "Unsupported field value: undefined".
 */
export function sanitizeForFirestore(value: object): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, item] of Object.entries(value)) {
    out[key] = sanitizeValue(item);
  }
  return out;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function asString(value: unknown, fallback = ""): string {
  return typeof value === "string" ? value : fallback;
}

function asDifficulty(value: unknown): Difficulty | undefined {
  return value === "easy" || value === "medium" || value === "hard" ? value : undefined;
}

function toPlanEntries(value: unknown): PlanLogEntry[] {
  if (!Array.isArray(value)) {
    return [];
  }

  return value
    .filter(isRecord)
    .map((item) => ({
      action: asString(item.action, "unknown"),
      topic: typeof item.topic === "string" ? item.topic : undefined,
      difficulty: asDifficulty(item.difficulty),
      quizSuggestion: typeof item.quizSuggestion === "boolean" ? item.quizSuggestion : undefined,
    }));
}

function toQuizMeta(value: unknown): QuizMeta {
  if (!isRecord(value)) {
    return {};
  }

  return {
    numQuestions: typeof value.numQuestions === "number" ? value.numQuestions : undefined,
    difficulty: asDifficulty(value.difficulty),
  };
}

function toInteractionRecord(id: string, studentId: string, data: DocumentData): InteractionRecord {
  return {
    id,
    studentId,
    query: asString(data.query),
    plan: toPlanEntries(data.plan),
    retrieved: asString(data.retrieved),
    quizMeta: toQuizMeta(data.quizMeta),
    response: asString(data.response),
    timestamp: asString(data.timestamp),
  };
}

/** Student registry, quiz attempts and interaction log kept in Firestore. */
export class FirestoreProgressStore implements ProgressStore {
  constructor(private readonly db: Firestore) {}

  static fromConfig(config: FirebaseCredentialsConfig): FirestoreProgressStore {
    return new FirestoreProgressStore(getAdminFirestore(config));
  }

  private studentRef(studentId: string) {
    return this.db.collection("students").doc(studentId);
  }

  /** Id and name uniqueness are checked and claimed in one transaction. */
  async registerStudent(studentId: string, name = ""): Promise<RegistrationResult> {
    const ref = this.studentRef(studentId);
    return this.db.runTransaction(async (transaction) => {
      const existing = await transaction.get(ref);
      if (existing.exists) {
        return { success: false, message: `Student ID '${studentId}' is already registered!` };
      }

      if (name) {
        const sameName = await transaction.get(this.db.collection("students").where("name", "==", name).limit(1));
        if (!sameName.empty) {
          return { success: false, message: `Student name '${name}' is already registered!` };
        }
      }

      transaction.create(ref, {
        name,
        createdAt: FieldValue.serverTimestamp(),
      });
      return { success: true, message: `Student '${name}' registered successfully.` };
    });
  }

  async recordAttempt(attempt: Omit<Attempt, "timestamp">): Promise<void> {
    await this.studentRef(attempt.studentId)
      .collection("attempts")
      .add({
        topic: attempt.topic,
        question: attempt.question,
        isCorrect: attempt.isCorrect,
        difficulty: attempt.difficulty,
        timestamp: new Date().toISOString(),
      });
  }

  async getProgress(studentId: string): Promise<StudentProgress> {
    const snapshot = await this.studentRef(studentId).collection("attempts").get();
    const attempts = snapshot.docs.map((item) => {
      const data = item.data();
      return { topic: asString(data.topic), isCorrect: data.isCorrect === true };
    });
    return summarizeAttempts(attempts);
  }

  async topicStrength(studentId: string, topic: string): Promise<Strength> {
    const snapshot = await this.studentRef(studentId).collection("attempts").where("topic", "==", topic).get();
    const attempts = snapshot.docs.map((item) => ({ topic, isCorrect: item.data().isCorrect === true }));
    return summarizeAttempts(attempts)[topic]?.strength ?? "medium";
  }

  async logInteraction(entry: InteractionInput): Promise<void> {
    await this.studentRef(entry.studentId)
      .collection("interactions")
      .add(
        sanitizeForFirestore({
          query: entry.query,
          plan: entry.plan,
          retrieved: truncateForLog(entry.retrieved, INTERACTION_RETRIEVED_LIMIT),
          quizMeta: entry.quizMeta,
          response: truncateForLog(entry.response, INTERACTION_RESPONSE_LIMIT),
          timestamp: new Date().toISOString(),
        }),
      );
  }

  async getInteractions(studentId: string, limit = DEFAULT_INTERACTION_LIMIT): Promise<InteractionRecord[]> {
    const snapshot = await this.studentRef(studentId)
      .collection("interactions")
      .orderBy("timestamp", "desc")
      .limit(limit)
      .get();
    return snapshot.docs.map((item) => toInteractionRecord(item.id, studentId, item.data()));
  }
}
