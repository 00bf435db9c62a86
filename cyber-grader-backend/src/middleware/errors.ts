import { CustomError, NotFoundError, ValidationError } from "./errorHandler";

/**
 * Error codes raised by the grading core and the routes in front of it
 */
export const ErrorCodes = {
  // 404 errors
  UNKNOWN_LAB: "UNKNOWN_LAB",
  UNKNOWN_FLAG: "UNKNOWN_FLAG",
  UNKNOWN_QUIZ: "UNKNOWN_QUIZ",
  UNKNOWN_EXAM: "UNKNOWN_EXAM",
  UNKNOWN_STAGE: "UNKNOWN_STAGE",
  NOTE_NOT_FOUND: "NOTE_NOT_FOUND",

  // 400 errors
  CONTENT_VALIDATION_ERROR: "CONTENT_VALIDATION_ERROR",

  // 500 errors, logged only
  PERSISTENCE_DEGRADED: "PERSISTENCE_DEGRADED",
} as const;

export function unknownLab(labId: string): NotFoundError {
  return new NotFoundError(`Lab ${labId}`, ErrorCodes.UNKNOWN_LAB);
}

export function unknownFlag(labId: string, flagName: string): NotFoundError {
  return new NotFoundError(`Flag ${flagName} in lab ${labId}`, ErrorCodes.UNKNOWN_FLAG);
}

export function unknownQuiz(quizId: string): NotFoundError {
  return new NotFoundError(`Quiz ${quizId}`, ErrorCodes.UNKNOWN_QUIZ);
}

export function unknownExam(examId: string): NotFoundError {
  return new NotFoundError(`Exam ${examId}`, ErrorCodes.UNKNOWN_EXAM);
}

export function unknownStage(examId: string, stageId: string): NotFoundError {
  return new NotFoundError(`Stage ${stageId} in exam ${examId}`, ErrorCodes.UNKNOWN_STAGE);
}

export function noteNotFound(name: string): NotFoundError {
  return new NotFoundError(`Note ${name}`, ErrorCodes.NOTE_NOT_FOUND);
}

export interface ContentIssue {
  path: string;
  message: string;
}

/**
 * A definition file could not be parsed or failed validation. Aborts the whole sync.
 */
export class ContentValidationError extends ValidationError {
  constructor(
    public readonly file: string,
    public readonly issues: ContentIssue[]
  ) {
    super(
      `Invalid content definition in ${file}`,
      { file, issues },
      ErrorCodes.CONTENT_VALIDATION_ERROR
    );
  }
}

/**
 * The durable backend is unavailable, either at start-up or for a single write.
 * Only ever logged; callers keep the in-memory result.
 */
export class PersistenceDegradedError extends CustomError {
  constructor(
    public readonly backend: string,
    public readonly operation: string,
    cause: string
  ) {
    super(
      `${backend} ${operation} failed: ${cause}`,
      500,
      ErrorCodes.PERSISTENCE_DEGRADED
    );
  }
}
