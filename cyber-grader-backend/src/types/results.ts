import { ExamDefinition, LabDefinition, QuizDefinition } from "./content";
import { FlagValidator, PersistenceMode } from "./enums";

// Attempt records. One per submission event, never mutated once recorded.

export interface FlagSubmissionResult {
  user_id: string;
  lab_id: string;
  flag_name: string;
  correct: boolean;
  submitted_at: string; // ISO-8601, UTC
}

export interface QuizSubmissionResult {
  user_id: string;
  quiz_id: string;
  score: number;
  max_score: number;
  submitted_at: string;
}

export interface ExamSubmissionResult {
  user_id: string;
  exam_id: string;
  stage_id: string;
  score: number;
  max_score: number;
  submitted_at: string;
}

// Derived views, recomputed on every read

export interface LabFlagPrompt {
  name: string;
  prompt: string;
  validator: FlagValidator;
  pattern?: string | null;
}

export interface LabStatus {
  id: string;
  title: string;
  version: string;
  instructions: string;
  score: number;
  total_flags: number;
  flags: LabFlagPrompt[];
}

export interface DashboardSummary {
  labs: LabStatus[];
  quizzes: QuizSubmissionResult[];
  exams: ExamSubmissionResult[];
}

export interface ExportResponse {
  labs: FlagSubmissionResult[];
  quizzes: QuizSubmissionResult[];
  exams: ExamSubmissionResult[];
}

/**
 * Everything a durable backend holds, used to rebuild in-memory state on start-up.
 * Attempt lists are expected in the order they were recorded.
 */
export interface StoreSnapshot {
  labs: LabDefinition[];
  quizzes: QuizDefinition[];
  exams: ExamDefinition[];
  labAttempts: FlagSubmissionResult[];
  quizAttempts: QuizSubmissionResult[];
  examAttempts: ExamSubmissionResult[];
}

export interface StoreStatus {
  mode: PersistenceMode;
  backend: string | null;
  failed_writes: number;
  last_error?: string;
}

export interface SyncResponse {
  labs: number;
  quizzes: number;
  exams: number;
  version: string;
  content_source: string | null;
  repo_branch: string | null;
  refresh_status: string | null;
  refresh_schedule: string | null;
  backup_schedule: string | null;
  refreshed_at: string;
}
