export const FALLBACK_MESSAGE = "No explanation found.";

export const DEFAULT_EXPLAIN_TOP_K = 3;
export const DEFAULT_EXPLAIN_MAX_CHARS = 1000;
export const DEFAULT_QUIZ_QUESTIONS = 3;
export const QUIZ_RETRIEVAL_TOP_K = 20;

export const MIN_CHUNK_CHARS = 20;
export const DEDUP_PREFIX_CHARS = 120;

// Chapter titles of the indexed textbook, lowercased.
export const CANONICAL_TOPICS = [
  "relations and functions",
  "inverse trigonometric function",
  "matrices",
  "determinants",
  "continuity and differentiability",
  "application of derivatives",
  "integrals",
  "application of integrals",
  "differential equations",
  "vector algebra",
  "three dimensional geometry",
  "linear programming",
  "probability",
] as const;

export const ACADEMIC_DISTRACTORS = [
  "Limit",
  "Derivative",
  "Integral",
  "Matrix",
  "Determinant",
  "Probability",
  "Permutation",
  "Combination",
  "Vector",
  "Scalar",
  "Continuity",
  "Differentiability",
  "Gradient",
  "Rank",
] as const;
