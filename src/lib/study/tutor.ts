import { DEFAULT_EXPLAIN_MAX_CHARS, DEFAULT_EXPLAIN_TOP_K, DEFAULT_QUIZ_QUESTIONS, FALLBACK_MESSAGE } from "./constants";
import { toErrorMessage } from "./errors";
import { Explainer } from "./explainer";
import { Planner } from "./planner";
import { DEFAULT_INTERACTION_LIMIT } from "./progress";
import { QuizGenerator } from "./quiz-generator";
import {
  Difficulty,
  InteractionInput,
  InteractionRecord,
  MultipleChoiceQuestion,
  ProgressStore,
  RegistrationResult,
  StudentProgress,
} from "./types";

export type ExplainResponse = {
  action: "explain";
  topic: string;
  difficulty: Difficulty;
  answer: string;
  chapter: string | null;
  sources: string[];
  quizSuggestion: boolean;
};

export type QuizResponse = {
  action: "quiz";
  topic: string;
  difficulty: Difficulty;
  quiz: MultipleChoiceQuestion[];
};

export type AskResponse = ExplainResponse | QuizResponse;

export type QuizRequestDifficulty = Difficulty | "auto";

export type IndependentQuizResponse = {
  topic: string;
  difficulty: Difficulty;
  quiz: MultipleChoiceQuestion[];
};

export type AnswerSubmission = {
  studentId: string;
  topic: string;
  question: string;
  selectedOption?: string;
  correctOption?: string;
  difficulty?: Difficulty;
};

export type AnswerResult = {
  studentId: string;
  topic: string;
  question: string;
  selected: string;
  correct: string;
  isCorrect: boolean;
  difficulty: Difficulty;
  recorded: boolean;
};

export type TutorServiceOptions = {
  planner: Planner;
  explainer: Explainer;
  quizGenerator: QuizGenerator;
  store: ProgressStore;
  explainTopK?: number;
  explainMaxChars?: number;
  quizQuestions?: number;
};

export function isCorrectAnswer(selected = "", correct = ""): boolean {
  const picked = selected.trim();
  const expected = correct.trim();
  return Boolean(picked) && Boolean(expected) && picked === expected;
}

/**
 * Request-level orchestration: plan, explain or quiz, and keep the student's
 * record. Interaction logging and attempt recording never fail a request.
 */
export class TutorService {
  private readonly planner: Planner;
  private readonly explainer: Explainer;
  private readonly quizGenerator: QuizGenerator;
  private readonly store: ProgressStore;
  private readonly explainTopK: number;
  private readonly explainMaxChars: number;
  private readonly quizQuestions: number;

  constructor(options: TutorServiceOptions) {
    this.planner = options.planner;
    this.explainer = options.explainer;
    this.quizGenerator = options.quizGenerator;
    this.store = options.store;
    this.explainTopK = options.explainTopK ?? DEFAULT_EXPLAIN_TOP_K;
    this.explainMaxChars = options.explainMaxChars ?? DEFAULT_EXPLAIN_MAX_CHARS;
    this.quizQuestions = options.quizQuestions ?? DEFAULT_QUIZ_QUESTIONS;
  }

  async ask(studentId: string, query: string): Promise<AskResponse> {
    const plan = await this.planner.decide(studentId, query);

    if (plan.action === "generate_quiz") {
      const quiz = await this.quizGenerator.generate(plan.topic, this.quizQuestions, plan.difficulty);
      await this.logSafely({
        studentId,
        query,
        plan: [plan],
        retrieved: "none",
        quizMeta: { numQuestions: quiz.length, difficulty: plan.difficulty },
        response: "quiz generated",
      });
      return { action: "quiz", topic: plan.topic, difficulty: plan.difficulty, quiz };
    }

    const explanation = await this.explainer.explain(plan.topic, this.explainTopK, this.explainMaxChars);
    const found = explanation.explanation !== FALLBACK_MESSAGE;
    await this.logSafely({
      studentId,
      query,
      plan: [plan],
      retrieved: found ? explanation.explanation : "None",
      quizMeta: {},
      response: explanation.explanation,
    });

    return {
      action: "explain",
      topic: plan.topic,
      difficulty: plan.difficulty,
      answer: explanation.explanation,
      chapter: explanation.chapter,
      sources: explanation.sources,
      quizSuggestion: found && plan.quizSuggestion,
    };
  }

  async quiz(studentId: string, topic: string, difficulty: QuizRequestDifficulty = "auto"): Promise<IndependentQuizResponse> {
    const resolved = difficulty === "auto" ? await this.autoDifficulty(studentId, topic) : difficulty;
    const quiz = await this.quizGenerator.generate(topic, this.quizQuestions, resolved);

    await this.logSafely({
      studentId,
      query: `[independent quiz] ${topic}`,
      plan: [{ action: "independent_quiz", difficulty: resolved }],
      retrieved: "none",
      quizMeta: { numQuestions: quiz.length, difficulty: resolved },
      response: "Generated independent quiz",
    });
    return { topic, difficulty: resolved, quiz };
  }

  async submitAnswer(submission: AnswerSubmission): Promise<AnswerResult> {
    const selected = submission.selectedOption ?? "";
    const correct = submission.correctOption ?? "";
    const difficulty = submission.difficulty ?? "medium";
    const isCorrect = isCorrectAnswer(selected, correct);

    let recorded = true;
    try {
      await this.store.recordAttempt({
        studentId: submission.studentId,
        topic: submission.topic,
        question: submission.question,
        isCorrect,
        difficulty,
      });
    } catch (error) {
      recorded = false;
      console.warn("[tutor] recording attempt failed", {
        studentId: submission.studentId,
        topic: submission.topic,
        message: toErrorMessage(error),
      });
    }

    return {
      studentId: submission.studentId,
      topic: submission.topic,
      question: submission.question,
      selected,
      correct,
      isCorrect,
      difficulty,
      recorded,
    };
  }

  registerStudent(studentId: string, name?: string): Promise<RegistrationResult> {
    return this.store.registerStudent(studentId, name);
  }

  progress(studentId: string): Promise<StudentProgress> {
    return this.store.getProgress(studentId);
  }

  interactions(studentId: string, limit = DEFAULT_INTERACTION_LIMIT): Promise<InteractionRecord[]> {
    return this.store.getInteractions(studentId, limit);
  }

  private async autoDifficulty(studentId: string, topic: string): Promise<Difficulty> {
    try {
      const plan = await this.planner.decide(studentId, topic, topic);
      return plan.difficulty;
    } catch (error) {
      console.warn("[tutor] planner failed, using medium difficulty", { studentId, topic, message: toErrorMessage(error) });
      return "medium";
    }
  }

  private async logSafely(entry: InteractionInput): Promise<void> {
    try {
      await this.store.logInteraction(entry);
    } catch (error) {
      console.warn("[tutor] logging interaction failed", {
        studentId: entry.studentId,
        message: toErrorMessage(error),
      });
    }
  }
}
