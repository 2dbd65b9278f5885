import { MemoryProgressStore } from "../testing/memory-progress-store";
import { FALLBACK_MESSAGE } from "./constants";
import { Explainer } from "./explainer";
import { Planner } from "./planner";
import { QuizGenerator } from "./quiz-generator";
import { isCorrectAnswer, TutorService } from "./tutor";
import { Chunk, Retriever } from "./types";

const MATRIX_TEXT = "A matrix is an ordered rectangular array of numbers or functions.";

function buildTutor(chunks: Chunk[], store = new MemoryProgressStore()) {
  const retriever: Retriever = { retrieve: async () => chunks };
  const tutor = new TutorService({
    planner: new Planner(store),
    explainer: new Explainer(retriever),
    quizGenerator: new QuizGenerator(retriever, () => 0),
    store,
  });
  return { tutor, store };
}

describe("isCorrectAnswer", () => {
  it("compares trimmed, non-blank options", () => {
    expect(isCorrectAnswer(" B ", "B")).toBe(true);
    expect(isCorrectAnswer("A", "B")).toBe(false);
    expect(isCorrectAnswer("", "")).toBe(false);
    expect(isCorrectAnswer("  ", "  ")).toBe(false);
  });
});

describe("TutorService", () => {
  let warn: jest.SpyInstance;

  beforeEach(() => {
    jest.spyOn(console, "log").mockImplementation(() => undefined);
    warn = jest.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("explains a topic and logs the interaction", async () => {
    const { tutor, store } = buildTutor([{ chapter: "3.pdf", text: MATRIX_TEXT, type: "text" }]);

    await expect(tutor.ask("s1", "explain matrices")).resolves.toEqual({
      action: "explain",
      topic: "matrices",
      difficulty: "medium",
      answer: MATRIX_TEXT,
      chapter: "3.pdf",
      sources: ["3.pdf"],
      quizSuggestion: true,
    });
    expect(store.interactions).toEqual([
      {
        id: "interaction-1",
        studentId: "s1",
        query: "explain matrices",
        plan: [{ action: "retrieve_and_explain", topic: "matrices", difficulty: "medium", quizSuggestion: true }],
        retrieved: MATRIX_TEXT,
        quizMeta: {},
        response: MATRIX_TEXT,
        timestamp: "2024-01-01T00:00:00.000Z",
      },
    ]);
  });

  it("does not suggest a quiz when nothing was found", async () => {
    const { tutor, store } = buildTutor([]);

    await expect(tutor.ask("s1", "explain limits")).resolves.toEqual({
      action: "explain",
      topic: "explain limits",
      difficulty: "medium",
      answer: FALLBACK_MESSAGE,
      chapter: null,
      sources: [],
      quizSuggestion: false,
    });
    expect(store.interactions[0]).toMatchObject({ retrieved: "None", response: FALLBACK_MESSAGE });
  });

  it("generates a quiz when asked for practice", async () => {
    const { tutor, store } = buildTutor([{ chapter: "3.pdf", text: MATRIX_TEXT, type: "text" }]);

    const response = await tutor.ask("s1", "quiz me on matrices");

    expect(response).toMatchObject({ action: "quiz", topic: "matrices", difficulty: "medium" });
    expect(response.action === "quiz" ? response.quiz.map((mcq) => mcq.question) : []).toEqual([
      "What is matrix?",
    ]);
    expect(store.interactions[0]).toMatchObject({
      retrieved: "none",
      quizMeta: { numQuestions: 1, difficulty: "medium" },
      response: "quiz generated",
    });
  });

  it("returns the same answer when logging fails", async () => {
    const { tutor, store } = buildTutor([{ chapter: "3.pdf", text: MATRIX_TEXT, type: "text" }]);
    jest.spyOn(store, "logInteraction").mockRejectedValue(new Error("write failed"));

    await expect(tutor.ask("s1", "explain matrices")).resolves.toMatchObject({
      answer: MATRIX_TEXT,
      quizSuggestion: true,
    });
    expect(warn).toHaveBeenCalledWith("[tutor] logging interaction failed", {
      studentId: "s1",
      message: "write failed",
    });
  });

  it("resolves automatic quiz difficulty from the student's record", async () => {
    const { tutor, store } = buildTutor([{ chapter: "13.pdf", text: MATRIX_TEXT, type: "text" }]);
    for (const question of ["q1", "q2"]) {
      await tutor.submitAnswer({ studentId: "s1", topic: "probability", question, selectedOption: "A", correctOption: "B" });
    }

    await expect(tutor.quiz("s1", "probability")).resolves.toMatchObject({ topic: "probability", difficulty: "easy" });
    await expect(tutor.quiz("s1", "probability", "hard")).resolves.toMatchObject({ difficulty: "hard" });
    expect(store.interactions[0]).toMatchObject({
      query: "[independent quiz] probability",
      plan: [{ action: "independent_quiz", difficulty: "easy" }],
      quizMeta: { numQuestions: 1, difficulty: "easy" },
    });
  });

  it("records answers and reports progress", async () => {
    const { tutor } = buildTutor([]);

    await expect(
      tutor.submitAnswer({
        studentId: "s1",
        topic: "matrices",
        question: "What is matrix?",
        selectedOption: " C ",
        correctOption: "C",
        difficulty: "hard",
      }),
    ).resolves.toEqual({
      studentId: "s1",
      topic: "matrices",
      question: "What is matrix?",
      selected: " C ",
      correct: "C",
      isCorrect: true,
      difficulty: "hard",
      recorded: true,
    });
    await tutor.submitAnswer({ studentId: "s1", topic: "matrices", question: "What is rank?" });

    await expect(tutor.progress("s1")).resolves.toEqual({
      matrices: { accuracy: 50, attempts: 2, strength: "weak" },
    });
  });

  it("still answers when the attempt cannot be recorded", async () => {
    const { tutor, store } = buildTutor([]);
    jest.spyOn(store, "recordAttempt").mockRejectedValue(new Error("offline"));

    await expect(
      tutor.submitAnswer({ studentId: "s1", topic: "matrices", question: "q", selectedOption: "A", correctOption: "A" }),
    ).resolves.toMatchObject({ isCorrect: true, recorded: false });
    expect(warn).toHaveBeenCalledWith("[tutor] recording attempt failed", {
      studentId: "s1",
      topic: "matrices",
      message: "offline",
    });
  });

  it("lists the newest interactions first", async () => {
    const { tutor } = buildTutor([]);
    await tutor.ask("s1", "explain limits");
    await tutor.ask("s1", "explain series");
    await tutor.ask("s2", "explain sets");

    const interactions = await tutor.interactions("s1", 1);

    expect(interactions.map((item) => item.query)).toEqual(["explain series"]);
  });

  it("registers each student once", async () => {
    const { tutor } = buildTutor([]);

    await expect(tutor.registerStudent("s1", "Asha")).resolves.toEqual({
      success: true,
      message: "Student 'Asha' registered successfully.",
    });
    await expect(tutor.registerStudent("s1", "Ravi")).resolves.toEqual({
      success: false,
      message: "Student ID 's1' is already registered!",
    });
    await expect(tutor.registerStudent("s2", "Asha")).resolves.toEqual({
      success: false,
      message: "Student name 'Asha' is already registered!",
    });
  });
});
