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
} from "../../types/results";
import { unknownFlag, unknownLab } from "../../middleware/errors";
import { AnswerMap, scoreExamStage, scoreQuiz, validateFlag } from "../grading";
import { AttemptLedger } from "./ledger";
import { chronological, labStatus } from "./aggregator";

export interface CoreStoreOptions {
  contentRoot: string;
  now?: () => Date;
}

const byId = <T extends { id: string }>(items: Iterable<T>): Map<string, T> => {
  const map = new Map<string, T>();
  for (const item of items) {
    map.set(item.id, item); // last one wins
  }
  return map;
};

/**
 * In-memory store holding content definitions and attempt ledgers.
 * All scoring and aggregation happens here; persistence adapters wrap it.
 */
export class CoreStore {
  readonly contentRoot: string;
  private readonly now: () => Date;

  private labs: Map<string, LabDefinition> = new Map();
  private quizzes: Map<string, QuizDefinition> = new Map();
  private exams: Map<string, ExamDefinition> = new Map();

  private readonly labAttempts = new AttemptLedger<FlagSubmissionResult>((r) => [
    r.user_id,
    r.lab_id,
    r.flag_name,
  ]);
  private readonly quizAttempts = new AttemptLedger<QuizSubmissionResult>((r) => [
    r.user_id,
    r.quiz_id,
  ]);
  private readonly examAttempts = new AttemptLedger<ExamSubmissionResult>((r) => [
    r.user_id,
    r.exam_id,
    r.stage_id,
  ]);

  constructor(options: CoreStoreOptions) {
    this.contentRoot = options.contentRoot;
    this.now = options.now ?? (() => new Date());
  }

  // Content management

  setLabs(labs: Iterable<LabDefinition>): void {
    this.labs = byId(labs);
  }

  setQuizzes(quizzes: Iterable<QuizDefinition>): void {
    this.quizzes = byId(quizzes);
  }

  setExams(exams: Iterable<ExamDefinition>): void {
    this.exams = byId(exams);
  }

  replaceContent(content: ContentSet): void {
    this.setLabs(content.labs);
    this.setQuizzes(content.quizzes);
    this.setExams(content.exams);
  }

  getLab(labId: string): LabDefinition | undefined {
    return this.labs.get(labId);
  }

  getQuiz(quizId: string): QuizDefinition | undefined {
    return this.quizzes.get(quizId);
  }

  getExam(examId: string): ExamDefinition | undefined {
    return this.exams.get(examId);
  }

  listLabs(): LabDefinition[] {
    return [...this.labs.values()];
  }

  listQuizzes(): QuizDefinition[] {
    return [...this.quizzes.values()];
  }

  listExams(): ExamDefinition[] {
    return [...this.exams.values()];
  }

  // Submissions

  recordFlagSubmission(
    labId: string,
    flag: FlagDefinition,
    userId: string,
    submission: string
  ): FlagSubmissionResult {
    const lab = this.labs.get(labId);
    if (!lab) {
      throw unknownLab(labId);
    }
    if (!lab.flags.some((candidate) => candidate.name === flag.name)) {
      throw unknownFlag(labId, flag.name);
    }

    return this.labAttempts.append({
      user_id: userId,
      lab_id: labId,
      flag_name: flag.name,
      correct: validateFlag(flag, submission, this.contentRoot),
      submitted_at: this.now().toISOString(),
    });
  }

  recordQuizSubmission(
    quiz: QuizDefinition,
    userId: string,
    answers: AnswerMap
  ): QuizSubmissionResult {
    const { score, max_score } = scoreQuiz(quiz, answers);

    return this.quizAttempts.append({
      user_id: userId,
      quiz_id: quiz.id,
      score,
      max_score,
      submitted_at: this.now().toISOString(),
    });
  }

  recordExamSubmission(
    exam: ExamDefinition,
    userId: string,
    stageId: string,
    answers: AnswerMap
  ): ExamSubmissionResult {
    // Throws for an unknown stage before anything is appended
    const { stage, score, max_score } = scoreExamStage(exam, stageId, answers);

    return this.examAttempts.append({
      user_id: userId,
      exam_id: exam.id,
      stage_id: stage.id,
      score,
      max_score,
      submitted_at: this.now().toISOString(),
    });
  }

  // Reads

  labStatusForUser(userId: string): LabStatus[] {
    return this.listLabs().map((lab) =>
      labStatus(lab, userId, this.labAttempts, this.contentRoot)
    );
  }

  quizHistoryForUser(userId: string): QuizSubmissionResult[] {
    return this.quizAttempts.forUser(userId);
  }

  examHistoryForUser(userId: string): ExamSubmissionResult[] {
    return this.examAttempts.forUser(userId);
  }

  dashboardForUser(userId: string): DashboardSummary {
    return {
      labs: this.labStatusForUser(userId),
      quizzes: this.quizHistoryForUser(userId),
      exams: this.examHistoryForUser(userId),
    };
  }

  exportAll(): ExportResponse {
    return {
      labs: chronological(this.labAttempts.all()),
      quizzes: chronological(this.quizAttempts.all()),
      exams: chronological(this.examAttempts.all()),
    };
  }

  /**
   * Restore definitions and previously recorded attempts, as loaded from a
   * durable backend. Attempts are appended as-is, without re-scoring.
   */
  hydrate(snapshot: StoreSnapshot): void {
    this.replaceContent(snapshot);
    snapshot.labAttempts.forEach((attempt) => this.labAttempts.append(attempt));
    snapshot.quizAttempts.forEach((attempt) => this.quizAttempts.append(attempt));
    snapshot.examAttempts.forEach((attempt) => this.examAttempts.append(attempt));
  }

  attemptCounts(): { labs: number; quizzes: number; exams: number } {
    return {
      labs: this.labAttempts.size,
      quizzes: this.quizAttempts.size,
      exams: this.examAttempts.size,
    };
  }
}
