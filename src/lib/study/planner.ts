import { CANONICAL_TOPICS } from "./constants";
import { toErrorMessage } from "./errors";
import { Difficulty, Plan, PlanAction, Strength, StudentProfileProvider } from "./types";

const QUIZ_INTENT_PATTERN = /\b(?:quiz|practice|test|exercise|questions|mcq|solve)/;
const EXPLAIN_INTENT_PATTERN = /\b(?:explain|understand|stuck|help|why|how|define|what is)\b/;
const EASY_OVERRIDE_PATTERN = /\beasy\b/;
const HARD_OVERRIDE_PATTERN = /\b(?:hard|difficult)\b/;

function normalizeTopic(value: string): string {
  return value.trim().toLowerCase();
}

function matchCanonicalTopic(text: string): string {
  const lower = text.toLowerCase();
  const matched = CANONICAL_TOPICS.filter((topic) => lower.includes(topic)).sort((a, b) => b.length - a.length);
  if (matched.length) {
    return matched[0];
  }

  if (lower.includes("matrix") || lower.includes("matrices")) {
    return "matrices";
  }
  if (lower.includes("probability")) {
    return "probability";
  }
  return "";
}

export function resolveTopic(query: string, explicitTopic?: string): string {
  if (explicitTopic?.trim()) {
    return normalizeTopic(explicitTopic);
  }
  return matchCanonicalTopic(query) || normalizeTopic(query);
}

export function resolveAction(query: string): PlanAction {
  const lower = query.toLowerCase();
  if (QUIZ_INTENT_PATTERN.test(lower)) {
    return "generate_quiz";
  }
  // Explain intent currently lands on the same action as the default.
  if (EXPLAIN_INTENT_PATTERN.test(lower)) {
    return "retrieve_and_explain";
  }
  return "retrieve_and_explain";
}

export function difficultyForStrength(strength: Strength): Difficulty {
  if (strength === "weak") {
    return "easy";
  }
  if (strength === "strong") {
    return "hard";
  }
  return "medium";
}

export function applyDifficultyOverrides(query: string, difficulty: Difficulty): Difficulty {
  const lower = query.toLowerCase();
  let resolved = difficulty;
  if (EASY_OVERRIDE_PATTERN.test(lower)) {
    resolved = "easy";
  }
  if (HARD_OVERRIDE_PATTERN.test(lower)) {
    resolved = "hard";
  }
  return resolved;
}

/**
 * Deterministic rules mapping a student query onto what to do next, the topic
 * it concerns, and how hard the material should be.
 */
export class Planner {
  constructor(private readonly profiles?: StudentProfileProvider) {}

  async decide(studentId: string, query: string, explicitTopic?: string): Promise<Plan> {
    const trimmedQuery = query.trim();
    const topic = resolveTopic(trimmedQuery, explicitTopic);
    const action = resolveAction(trimmedQuery);
    const strength = await this.lookupStrength(studentId, topic);
    const difficulty = applyDifficultyOverrides(trimmedQuery, difficultyForStrength(strength));

    return {
      action,
      topic,
      difficulty,
      quizSuggestion: action === "retrieve_and_explain",
    };
  }

  private async lookupStrength(studentId: string, topic: string): Promise<Strength> {
    if (!studentId || !this.profiles) {
      return "medium";
    }

    try {
      return await this.profiles.topicStrength(studentId, topic);
    } catch (error) {
      console.warn("[planner] topic strength lookup failed", {
        studentId,
        topic,
        message: toErrorMessage(error),
      });
      return "medium";
    }
  }
}
