import { Attempt, Strength, StudentProgress } from "./types";

export const INTERACTION_RETRIEVED_LIMIT = 250;
export const INTERACTION_RESPONSE_LIMIT = 500;
export const DEFAULT_INTERACTION_LIMIT = 100;

/**
 * Mastery bands used to bias difficulty:
 * strong needs 3+ attempts at 80%+, weak needs 2+ attempts at 50% or less.
 */
export function classifyStrength(attempts: number, accuracy: number): Strength {
  if (attempts >= 3 && accuracy >= 0.8) {
    return "strong";
  }
  if (attempts >= 2 && accuracy <= 0.5) {
    return "weak";
  }
  return "medium";
}

export function summarizeAttempts(attempts: Array<Pick<Attempt, "topic" | "isCorrect">>): StudentProgress {
  const totals = new Map<string, { correct: number; attempts: number }>();
  for (const attempt of attempts) {
    const current = totals.get(attempt.topic) ?? { correct: 0, attempts: 0 };
    current.attempts += 1;
    current.correct += attempt.isCorrect ? 1 : 0;
    totals.set(attempt.topic, current);
  }

  const progress: StudentProgress = {};
  for (const [topic, total] of totals) {
    const accuracy = total.attempts ? total.correct / total.attempts : 0;
    progress[topic] = {
      accuracy: Math.round(accuracy * 1000) / 10,
      attempts: total.attempts,
      strength: classifyStrength(total.attempts, accuracy),
    };
  }
  return progress;
}

export function truncateForLog(value: string, maxChars: number): string {
  return value.length > maxChars ? value.slice(0, maxChars) : value;
}
