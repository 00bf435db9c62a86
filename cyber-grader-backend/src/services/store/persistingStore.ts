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
  StoreStatus,
} from "../../types/results";
import { PersistenceMode } from "../../types/enums";
import { PersistenceDegradedError } from "../../middleware/errors";
import { errorMessage, logger } from "../../utils/logger";
import { SerialQueue, withTimeout } from "../../utils/serialQueue";
import { AnswerMap } from "../grading";
import { CoreStore } from "./coreStore";
import { GraderStore, PersistenceBackend } from "./types";

export interface PersistingStoreOptions {
  timeoutMs: number;
}

const DEFAULT_OPTIONS: PersistingStoreOptions = { timeoutMs: 5000 };

/**
 * Store facade. Holds a CoreStore as the read-of-record and, optionally, a
 * durable backend that mirrors every write.
 *
 * Operations are serialized: each one applies to the core first and, when
 * persistence is enabled, waits for the durable write (bounded by `timeoutMs`)
 * before the next operation starts. A failed durable write is logged and counted;
 * the caller still gets the in-memory result. Without a backend, or after a
 * failed `init()`, the store is a plain in-memory store.
 */
export class PersistingStore implements GraderStore {
  private readonly queue = new SerialQueue();
  private mode: PersistenceMode;
  private backendName: string | null;
  private failedWrites = 0;
  private lastError?: string;

  constructor(
    private readonly core: CoreStore,
    private readonly backend: PersistenceBackend | null = null,
    private readonly options: PersistingStoreOptions = DEFAULT_OPTIONS
  ) {
    this.mode = backend ? PersistenceMode.DEGRADED : PersistenceMode.MEMORY;
    this.backendName = backend ? backend.name : null;
  }

  /**
   * A memory-only store standing in for a backend whose client could not be built.
   */
  static degraded(
    core: CoreStore,
    backendName: string,
    reason: string,
    options: PersistingStoreOptions = DEFAULT_OPTIONS
  ): PersistingStore {
    const store = new PersistingStore(core, null, options);
    store.mode = PersistenceMode.DEGRADED;
    store.backendName = backendName;
    store.lastError = reason;
    return store;
  }

  /**
   * Prepare the backend and hydrate the core from it. Never rejects: on any
   * failure persistence is disabled and the store keeps working in memory.
   */
  init(): Promise<void> {
    const backend = this.backend;
    if (!backend) {
      return Promise.resolve();
    }

    return this.queue.run(async () => {
      try {
        await this.bounded(backend.init(), "init");
        const snapshot = await this.bounded(backend.load(), "load");
        this.core.hydrate(snapshot);
        this.mode = PersistenceMode.PERSISTENT;

        logger.info(`${backend.name} store enabled`, {
          labs: snapshot.labs.length,
          quizzes: snapshot.quizzes.length,
          exams: snapshot.exams.length,
          attempts: this.core.attemptCounts(),
        });
      } catch (error) {
        this.mode = PersistenceMode.DEGRADED;
        this.lastError = errorMessage(error);
        const degraded = new PersistenceDegradedError(backend.name, "init", this.lastError);
        logger.error(`${backend.name} store initialisation failed; operating in-memory only`, {
          code: degraded.code,
          error: degraded.message,
        });
      }
    });
  }

  private bounded<T>(operation: Promise<T>, label: string): Promise<T> {
    return withTimeout(operation, this.options.timeoutMs, `${this.backendName ?? "memory"} ${label}`);
  }

  private async persist(
    operation: string,
    write: (backend: PersistenceBackend) => Promise<void>
  ): Promise<void> {
    const backend = this.backend;
    if (!backend || this.mode !== PersistenceMode.PERSISTENT) {
      return;
    }

    try {
      await this.bounded(write(backend), operation);
    } catch (error) {
      this.failedWrites += 1;
      this.lastError = errorMessage(error);
      const degraded = new PersistenceDegradedError(backend.name, operation, this.lastError);
      logger.error("Durable write failed; in-memory state is ahead of the backend", {
        code: degraded.code,
        backend: backend.name,
        operation,
        error: degraded.message,
        failedWrites: this.failedWrites,
      });
    }
  }

  // Content management

  setLabs(labs: LabDefinition[]): Promise<void> {
    return this.queue.run(async () => {
      this.core.setLabs(labs);
      await this.persist("upsert labs", (b) => b.replaceLabs(this.core.listLabs()));
    });
  }

  setQuizzes(quizzes: QuizDefinition[]): Promise<void> {
    return this.queue.run(async () => {
      this.core.setQuizzes(quizzes);
      await this.persist("upsert quizzes", (b) => b.replaceQuizzes(this.core.listQuizzes()));
    });
  }

  setExams(exams: ExamDefinition[]): Promise<void> {
    return this.queue.run(async () => {
      this.core.setExams(exams);
      await this.persist("upsert exams", (b) => b.replaceExams(this.core.listExams()));
    });
  }

  replaceContent(content: ContentSet): Promise<void> {
    return this.queue.run(async () => {
      this.core.replaceContent(content);
      await this.persist("upsert labs", (b) => b.replaceLabs(this.core.listLabs()));
      await this.persist("upsert quizzes", (b) => b.replaceQuizzes(this.core.listQuizzes()));
      await this.persist("upsert exams", (b) => b.replaceExams(this.core.listExams()));
    });
  }

  getLab(labId: string): Promise<LabDefinition | undefined> {
    return this.queue.run(() => this.core.getLab(labId));
  }

  getQuiz(quizId: string): Promise<QuizDefinition | undefined> {
    return this.queue.run(() => this.core.getQuiz(quizId));
  }

  getExam(examId: string): Promise<ExamDefinition | undefined> {
    return this.queue.run(() => this.core.getExam(examId));
  }

  listQuizzes(): Promise<QuizDefinition[]> {
    return this.queue.run(() => this.core.listQuizzes());
  }

  listExams(): Promise<ExamDefinition[]> {
    return this.queue.run(() => this.core.listExams());
  }

  // Submissions

  recordFlagSubmission(
    labId: string,
    flag: FlagDefinition,
    userId: string,
    submission: string
  ): Promise<FlagSubmissionResult> {
    return this.queue.run(async () => {
      const result = this.core.recordFlagSubmission(labId, flag, userId, submission);
      await this.persist("insert lab submission", (b) => b.insertFlagResult(result));
      return result;
    });
  }

  recordQuizSubmission(
    quiz: QuizDefinition,
    userId: string,
    answers: AnswerMap
  ): Promise<QuizSubmissionResult> {
    return this.queue.run(async () => {
      const result = this.core.recordQuizSubmission(quiz, userId, answers);
      await this.persist("insert quiz submission", (b) => b.insertQuizResult(result));
      return result;
    });
  }

  recordExamSubmission(
    exam: ExamDefinition,
    userId: string,
    stageId: string,
    answers: AnswerMap
  ): Promise<ExamSubmissionResult> {
    return this.queue.run(async () => {
      const result = this.core.recordExamSubmission(exam, userId, stageId, answers);
      await this.persist("insert exam submission", (b) => b.insertExamResult(result));
      return result;
    });
  }

  // Reads

  labStatusForUser(userId: string): Promise<LabStatus[]> {
    return this.queue.run(() => this.core.labStatusForUser(userId));
  }

  dashboardForUser(userId: string): Promise<DashboardSummary> {
    return this.queue.run(() => this.core.dashboardForUser(userId));
  }

  exportAll(): Promise<ExportResponse> {
    return this.queue.run(() => this.core.exportAll());
  }

  status(): StoreStatus {
    return {
      mode: this.mode,
      backend: this.backendName,
      failed_writes: this.failedWrites,
      ...(this.lastError !== undefined && { last_error: this.lastError }),
    };
  }

  async close(): Promise<void> {
    if (!this.backend) {
      return;
    }
    try {
      await this.backend.close();
    } catch (error) {
      logger.warn(`Failed to close ${this.backend.name} backend`, {
        error: errorMessage(error),
      });
    }
  }
}
