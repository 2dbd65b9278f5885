export type ChunkType = "text" | "math" | "excluded";

export type Chunk = {
  chapter: string;
  text: string;
  type: ChunkType;
};

export type PlanAction = "retrieve_and_explain" | "generate_quiz";
export type Difficulty = "easy" | "medium" | "hard";
export type Strength = "weak" | "medium" | "strong";

export type Plan = {
  action: PlanAction;
  topic: string;
  difficulty: Difficulty;
  /** Hint for the caller to offer a quiz after an explanation. */
  quizSuggestion: boolean;
};

export type AnswerLetter = "A" | "B" | "C" | "D";

export type MultipleChoiceQuestion = {
  chapter: string;
  question: string;
  options: [string, string, string, string];
  answer: AnswerLetter;
  explanation: string;
};

export type Explanation = {
  topic: string;
  explanation: string;
  chapter: string | null;
  sources: string[];
};

export type TopicProfile = {
  /** Percent correct, rounded to one decimal. */
  accuracy: number;
  attempts: number;
  strength: Strength;
};

export type StudentProgress = Record<string, TopicProfile>;

export type Attempt = {
  studentId: string;
  topic: string;
  question: string;
  isCorrect: boolean;
  difficulty: string;
  timestamp: string;
};

export type QuizMeta = {
  numQuestions?: number;
  difficulty?: Difficulty;
};

export type PlanLogEntry = {
  action: string;
  topic?: string;
  difficulty?: Difficulty;
  quizSuggestion?: boolean;
};

export type InteractionInput = {
  studentId: string;
  query: string;
  plan: PlanLogEntry[];
  retrieved: string;
  quizMeta: QuizMeta;
  response: string;
};

export type InteractionRecord = InteractionInput & {
  id: string;
  timestamp: string;
};

export type RegistrationResult = {
  success: boolean;
  message: string;
};

/** Semantic embedding shared by the index builder and the retriever. */
export interface Embedder {
  readonly model: string;
  embed(text: string): Promise<number[]>;
  embedBatch(texts: string[]): Promise<number[][]>;
}

export interface Retriever {
  retrieve(query: string, topK?: number): Promise<Chunk[]>;
}

export interface StudentProfileProvider {
  topicStrength(studentId: string, topic: string): Promise<Strength>;
}

export interface InteractionLogger {
  logInteraction(entry: InteractionInput): Promise<void>;
}

export interface ProgressStore extends StudentProfileProvider, InteractionLogger {
  registerStudent(studentId: string, name?: string): Promise<RegistrationResult>;
  recordAttempt(attempt: Omit<Attempt, "timestamp">): Promise<void>;
  getProgress(studentId: string): Promise<StudentProgress>;
  getInteractions(studentId: string, limit?: number): Promise<InteractionRecord[]>;
}
