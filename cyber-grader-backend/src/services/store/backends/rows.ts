import {
  examDefinitionSchema,
  labDefinitionSchema,
  quizDefinitionSchema,
  ExamDefinition,
  LabDefinition,
  QuizDefinition,
} from "../../../types/content";
import {
  ExamSubmissionResult,
  FlagSubmissionResult,
  QuizSubmissionResult,
} from "../../../types/results";

/**
 * Row <-> record conversion shared by the durable backends. Table layouts are
 * identical in Postgres and Supabase.
 */

export type Row = Record<string, unknown>;

export const TABLES = {
  labs: "labs",
  quizzes: "quizzes",
  exams: "exams",
  labSubmissions: "lab_submissions",
  quizSubmissions: "quiz_submissions",
  examSubmissions: "exam_submissions",
} as const;

const asString = (value: unknown, fallback: string = ""): string =>
  typeof value === "string" ? value : value == null ? fallback : String(value);

const asInt = (value: unknown): number => {
  const parsed = typeof value === "number" ? value : parseInt(asString(value, "0"), 10);
  return Number.isFinite(parsed) ? Math.trunc(parsed) : 0;
};

// JSON columns arrive parsed from pg and Supabase, but tolerate text too
const asJson = (value: unknown): unknown => {
  if (typeof value === "string") {
    return JSON.parse(value);
  }
  return value ?? [];
};

/**
 * Timestamps come back as Date (pg) or ISO strings with a `+00:00` offset
 * (PostgREST). Normalise both to the `toISOString()` form records carry.
 */
export const toIsoTimestamp = (value: unknown): string => {
  const date = value instanceof Date ? value : new Date(asString(value));
  if (Number.isNaN(date.getTime())) {
    throw new Error(`Invalid timestamp in stored row: ${String(value)}`);
  }
  return date.toISOString();
};

export const labToRow = (lab: LabDefinition): Row => ({
  id: lab.id,
  title: lab.title,
  version: lab.version,
  instructions_path: lab.instructions_path,
  flags: lab.flags,
});

export const quizToRow = (quiz: QuizDefinition): Row => ({
  id: quiz.id,
  title: quiz.title,
  version: quiz.version,
  questions: quiz.questions,
});

export const examToRow = (exam: ExamDefinition): Row => ({
  id: exam.id,
  title: exam.title,
  version: exam.version,
  stages: exam.stages,
});

export const labFromRow = (row: Row): LabDefinition =>
  labDefinitionSchema.parse({
    id: row.id,
    title: asString(row.title, asString(row.id)),
    version: asString(row.version, "0.0.0"),
    instructions_path: asString(row.instructions_path),
    flags: asJson(row.flags),
  });

export const quizFromRow = (row: Row): QuizDefinition =>
  quizDefinitionSchema.parse({
    id: row.id,
    title: asString(row.title, asString(row.id)),
    version: asString(row.version, "0.0.0"),
    questions: asJson(row.questions),
  });

export const examFromRow = (row: Row): ExamDefinition =>
  examDefinitionSchema.parse({
    id: row.id,
    title: asString(row.title, asString(row.id)),
    version: asString(row.version, "0.0.0"),
    stages: asJson(row.stages),
  });

export const flagResultToRow = (result: FlagSubmissionResult): Row => ({
  user_id: result.user_id,
  lab_id: result.lab_id,
  flag_name: result.flag_name,
  correct: result.correct,
  submitted_at: result.submitted_at,
});

export const quizResultToRow = (result: QuizSubmissionResult): Row => ({
  user_id: result.user_id,
  quiz_id: result.quiz_id,
  score: result.score,
  max_score: result.max_score,
  submitted_at: result.submitted_at,
});

export const examResultToRow = (result: ExamSubmissionResult): Row => ({
  user_id: result.user_id,
  exam_id: result.exam_id,
  stage_id: result.stage_id,
  score: result.score,
  max_score: result.max_score,
  submitted_at: result.submitted_at,
});

export const flagResultFromRow = (row: Row): FlagSubmissionResult => ({
  user_id: asString(row.user_id),
  lab_id: asString(row.lab_id),
  flag_name: asString(row.flag_name),
  correct: row.correct === true,
  submitted_at: toIsoTimestamp(row.submitted_at),
});

export const quizResultFromRow = (row: Row): QuizSubmissionResult => ({
  user_id: asString(row.user_id),
  quiz_id: asString(row.quiz_id),
  score: asInt(row.score),
  max_score: asInt(row.max_score),
  submitted_at: toIsoTimestamp(row.submitted_at),
});

export const examResultFromRow = (row: Row): ExamSubmissionResult => ({
  user_id: asString(row.user_id),
  exam_id: asString(row.exam_id),
  stage_id: asString(row.stage_id),
  score: asInt(row.score),
  max_score: asInt(row.max_score),
  submitted_at: toIsoTimestamp(row.submitted_at),
});
