import {
  ContentSet,
  ExamDefinition,
  FlagDefinition,
  LabDefinition,
  QuizDefinition,
} from "../../types/content";
import {
  DashboardSummary,
  ExamSubmissionResult,
  ExportResponse,
  FlagSubmissionResult,
  LabStatus,
  QuizSubmissionResult,
  StoreSnapshot,
  StoreStatus,
} from "../../types/results";
import { AnswerMap } from "../grading";

/**
 * The store API request handlers depend on. Every implementation must answer
 * reads identically for the same sequence of writes, whatever it persists to.
 */
export interface GraderStore {
  setLabs(labs: LabDefinition[]): Promise<void>;
  setQuizzes(quizzes: QuizDefinition[]): Promise<void>;
  setExams(exams: ExamDefinition[]): Promise<void>;
  replaceContent(content: ContentSet): Promise<void>;

  getLab(labId: string): Promise<LabDefinition | undefined>;
  getQuiz(quizId: string): Promise<QuizDefinition | undefined>;
  getExam(examId: string): Promise<ExamDefinition | undefined>;
  listQuizzes(): Promise<QuizDefinition[]>;
  listExams(): Promise<ExamDefinition[]>;

  recordFlagSubmission(
    labId: string,
    flag: FlagDefinition,
    userId: string,
    submission: string
  ): Promise<FlagSubmissionResult>;
  recordQuizSubmission(
    quiz: QuizDefinition,
    userId: string,
    answers: AnswerMap
  ): Promise<QuizSubmissionResult>;
  recordExamSubmission(
    exam: ExamDefinition,
    userId: string,
    stageId: string,
    answers: AnswerMap
  ): Promise<ExamSubmissionResult>;

  labStatusForUser(userId: string): Promise<LabStatus[]>;
  dashboardForUser(userId: string): Promise<DashboardSummary>;
  exportAll(): Promise<ExportResponse>;

  status(): StoreStatus;
  close(): Promise<void>;
}

/**
 * Durable mirror of the in-memory state. Implementations throw on failure;
 * the persisting store decides what a failure means.
 */
export interface PersistenceBackend {
  readonly name: string;

  /** Connect and create tables where needed */
  init(): Promise<void>;
  /** Read everything back, attempts in recorded order */
  load(): Promise<StoreSnapshot>;

  /** Upsert by id and drop rows whose id is absent from the list */
  replaceLabs(labs: LabDefinition[]): Promise<void>;
  replaceQuizzes(quizzes: QuizDefinition[]): Promise<void>;
  replaceExams(exams: ExamDefinition[]): Promise<void>;

  insertFlagResult(result: FlagSubmissionResult): Promise<void>;
  insertQuizResult(result: QuizSubmissionResult): Promise<void>;
  insertExamResult(result: ExamSubmissionResult): Promise<void>;

  close(): Promise<void>;
}
