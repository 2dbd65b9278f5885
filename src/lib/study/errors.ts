export type MissingIndexCode = "missing_index" | "misaligned_index" | "invalid_index";
export type EmbeddingErrorCode =
  | "missing_api_key"
  | "request_failed"
  | "empty_response"
  | "dimension_mismatch"
  | "unknown_provider_error";

export class TutorPipelineError<TCode extends string = string> extends Error {
  readonly code: TCode;

  constructor(code: TCode, message: string) {
    super(message);
    this.name = "TutorPipelineError";
    this.code = code;
  }
}

/** Corpus artifacts are absent, unreadable or out of step with each other. */
export class MissingIndexError extends TutorPipelineError<MissingIndexCode> {
  constructor(code: MissingIndexCode, message: string) {
    super(code, message);
    this.name = "MissingIndexError";
  }
}

export class EmbeddingError extends TutorPipelineError<EmbeddingErrorCode> {
  constructor(code: EmbeddingErrorCode, message: string) {
    super(code, message);
    this.name = "EmbeddingError";
  }
}

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "unknown error";
}
