import { ACADEMIC_DISTRACTORS, DEFAULT_QUIZ_QUESTIONS, QUIZ_RETRIEVAL_TOP_K } from "./constants";
import { NullRetriever } from "./retriever";
import { AnswerLetter, Chunk, Difficulty, MultipleChoiceQuestion, Retriever } from "./types";

type RandomSource = () => number;

type DefinitionMatch = {
  concept: string;
  definition: string;
};

// Most specific first; the first accepted match wins.
const DEFINITION_PATTERNS: RegExp[] = [
  /\b([A-Za-z][A-Za-z\s]{2,50}) is defined as (.+)/i,
  /\b([A-Za-z][A-Za-z\s]{2,50}) is ((?:an|a)\s.+)/i,
  /\bThe definition of ([A-Za-z][A-Za-z\s]{1,50}) is (.+)/i,
  /\b([A-Za-z][A-Za-z\s]{2,50}) refers to (.+)/i,
];

const SIMPLE_DEFINITION_PATTERN = /^([A-Za-z][A-Za-z\s]{1,40}) is (.+)/i;

const NON_CONCEPT_WORDS = new Set(["what", "which", "this", "that", "how", "why", "where", "when"]);
const LEADING_ARTICLE_PATTERN = /^(?:the|an|a)\s+/i;
const ANSWER_LETTERS: AnswerLetter[] = ["A", "B", "C", "D"];

const MIN_SENTENCE_CHARS = 20;
const MAX_SENTENCE_CHARS = 300;
const MIN_DEFINITION_CHARS = 13;

export const NO_MCQ_EXPLANATION = "No definitional or formula-based content detected.";

function stripFigureCaptions(text: string): string {
  return text
    .replace(/\bFig\b.*/g, "")
    .replace(/\s{2,}/g, " ")
    .trim();
}

export function extractCandidateSentences(text: string): string[] {
  return text
    .split(/(?<=[.!?])\s+/)
    .map(stripFigureCaptions)
    .filter((sentence) => sentence.length > MIN_SENTENCE_CHARS && sentence.length < MAX_SENTENCE_CHARS);
}

function normalizeConcept(raw: string): string {
  return raw.replace(/\s+/g, " ").trim().replace(LEADING_ARTICLE_PATTERN, "");
}

export function isDegenerateConcept(concept: string): boolean {
  const lower = concept.toLowerCase().trim();
  if (lower.length < 3 || /\d/.test(lower)) {
    return true;
  }

  const words = lower.split(/\s+/);
  return words.length > 5 || words.some((word) => NON_CONCEPT_WORDS.has(word));
}

function acceptMatch(match: RegExpMatchArray | null): DefinitionMatch | null {
  if (!match) {
    return null;
  }

  const concept = normalizeConcept(match[1] ?? "");
  const definition = (match[2] ?? "").trim();
  if (isDegenerateConcept(concept) || definition.length < MIN_DEFINITION_CHARS) {
    return null;
  }
  return { concept, definition };
}

export function extractDefinition(sentence: string): DefinitionMatch | null {
  for (const pattern of DEFINITION_PATTERNS) {
    const accepted = acceptMatch(sentence.match(pattern));
    if (accepted) {
      return accepted;
    }
  }
  return acceptMatch(sentence.match(SIMPLE_DEFINITION_PATTERN));
}

function shuffle<T>(items: T[], random: RandomSource): T[] {
  const result = [...items];
  for (let index = result.length - 1; index > 0; index -= 1) {
    const swap = Math.floor(random() * (index + 1));
    [result[index], result[swap]] = [result[swap], result[index]];
  }
  return result;
}

/**
 * Multiple-choice questions built from definitional sentences in the
 * retrieved textbook passages, with generic and placeholder fallbacks so a
 * request always yields at least one question.
 */
export class QuizGenerator {
  constructor(
    private readonly retriever: Retriever = new NullRetriever(),
    private readonly random: RandomSource = Math.random,
  ) {}

  async generate(
    topic: string,
    nQuestions = DEFAULT_QUIZ_QUESTIONS,
    difficulty?: Difficulty,
  ): Promise<MultipleChoiceQuestion[]> {
    const requested = Number.isFinite(nQuestions) ? nQuestions : DEFAULT_QUIZ_QUESTIONS;
    const target = Math.max(1, Math.floor(requested));
    const chunks = await this.retriever.retrieve(topic, QUIZ_RETRIEVAL_TOP_K);

    if (!chunks.length) {
      this.report(topic, difficulty, "placeholder", 1);
      return [this.placeholder(topic)];
    }

    const mcqs = this.fromDefinitions(chunks, target);
    if (mcqs.length) {
      this.report(topic, difficulty, "definitions", mcqs.length);
      return mcqs;
    }

    const fallback = Array.from({ length: target }, () => this.fallbackQuestion(topic, chunks[0].chapter));
    this.report(topic, difficulty, "fallback", fallback.length);
    return fallback;
  }

  distractorsFor(concept: string, correct: string): string[] {
    const excluded = new Set([concept.toLowerCase(), correct.toLowerCase()]);
    const picks = shuffle<string>(
      ACADEMIC_DISTRACTORS.filter((term) => !excluded.has(term.toLowerCase())),
      this.random,
    ).slice(0, 3);

    while (picks.length < 3) {
      const label = `Option ${10 + Math.floor(this.random() * 90)}`;
      if (!picks.includes(label) && !excluded.has(label.toLowerCase())) {
        picks.push(label);
      }
    }
    return picks;
  }

  private fromDefinitions(chunks: Chunk[], target: number): MultipleChoiceQuestion[] {
    const mcqs: MultipleChoiceQuestion[] = [];
    for (const chunk of chunks) {
      for (const sentence of extractCandidateSentences(stripFigureCaptions(chunk.text))) {
        const match = extractDefinition(sentence);
        if (!match) {
          continue;
        }
        mcqs.push(this.buildQuestion(chunk.chapter, `What is ${match.concept}?`, match.concept, match.definition));
        if (mcqs.length >= target) {
          return mcqs;
        }
      }
    }
    return mcqs;
  }

  private fallbackQuestion(topic: string, chapter: string): MultipleChoiceQuestion {
    const words = topic.match(/[A-Za-z]{3,}/g) ?? [];
    const guess = words.length ? words.slice(0, 3).join(" ") : topic;
    const concept = guess.split(/\s+/).slice(0, 3).join(" ").trim() || "the topic";
    const correct = `A brief description of ${concept}.`;
    return this.buildQuestion(chapter, `Which of the following best describes ${concept}?`, concept, correct);
  }

  private buildQuestion(
    chapter: string,
    question: string,
    concept: string,
    correct: string,
  ): MultipleChoiceQuestion {
    const shuffled = shuffle([...this.distractorsFor(concept, correct), correct], this.random);
    const options: MultipleChoiceQuestion["options"] = [shuffled[0], shuffled[1], shuffled[2], shuffled[3]];
    return {
      chapter,
      question,
      options,
      answer: ANSWER_LETTERS[options.indexOf(correct)],
      explanation: correct,
    };
  }

  private placeholder(topic: string): MultipleChoiceQuestion {
    return {
      chapter: "",
      question: `No clear MCQs found for '${topic}'.`,
      options: ["-", "-", "-", "-"],
      answer: "A",
      explanation: NO_MCQ_EXPLANATION,
    };
  }

  private report(topic: string, difficulty: Difficulty | undefined, source: string, count: number): void {
    console.log("[quiz] generated", { topic, difficulty: difficulty ?? "unspecified", source, count });
  }
}
