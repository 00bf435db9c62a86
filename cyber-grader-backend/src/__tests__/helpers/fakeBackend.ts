import { ExamDefinition, LabDefinition, QuizDefinition } from "../../types/content";
import {
  ExamSubmissionResult,
  FlagSubmissionResult,
  QuizSubmissionResult,
  StoreSnapshot,
} from "../../types/results";
import { PersistenceBackend } from "../../services/store/types";

export const emptySnapshot = (): StoreSnapshot => ({
  labs: [],
  quizzes: [],
  exams: [],
  labAttempts: [],
  quizAttempts: [],
  examAttempts: [],
});

/**
 * In-process backend that keeps what it is given, for checking what a
 * persisting store writes and what it reads back on restart.
 */
export class FakeBackend implements PersistenceBackend {
  readonly name = "fake";
  readonly data: StoreSnapshot;
  failInit: Error | null = null;
  failWrites: Error | null = null;
  hangWrites = false;
  closed = false;
  readonly calls: string[] = [];

  constructor(initial: StoreSnapshot = emptySnapshot()) {
    this.data = initial;
  }

  private async write(call: string, apply: () => void): Promise<void> {
    this.calls.push(call);
    if (this.hangWrites) {
      return new Promise<void>(() => undefined);
    }
    if (this.failWrites) {
      throw this.failWrites;
    }
    apply();
  }

  async init(): Promise<void> {
    this.calls.push("init");
    if (this.failInit) {
      throw this.failInit;
    }
  }

  async load(): Promise<StoreSnapshot> {
    this.calls.push("load");
    return {
      labs: [...this.data.labs],
      quizzes: [...this.data.quizzes],
      exams: [...this.data.exams],
      labAttempts: [...this.data.labAttempts],
      quizAttempts: [...this.data.quizAttempts],
      examAttempts: [...this.data.examAttempts],
    };
  }

  replaceLabs(labs: LabDefinition[]): Promise<void> {
    return this.write("replaceLabs", () => {
      this.data.labs = [...labs];
    });
  }

  replaceQuizzes(quizzes: QuizDefinition[]): Promise<void> {
    return this.write("replaceQuizzes", () => {
      this.data.quizzes = [...quizzes];
    });
  }

  replaceExams(exams: ExamDefinition[]): Promise<void> {
    return this.write("replaceExams", () => {
      this.data.exams = [...exams];
    });
  }

  insertFlagResult(result: FlagSubmissionResult): Promise<void> {
    return this.write("insertFlagResult", () => {
      this.data.labAttempts.push(result);
    });
  }

  insertQuizResult(result: QuizSubmissionResult): Promise<void> {
    return this.write("insertQuizResult", () => {
      this.data.quizAttempts.push(result);
    });
  }

  insertExamResult(result: ExamSubmissionResult): Promise<void> {
    return this.write("insertExamResult", () => {
      this.data.examAttempts.push(result);
    });
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
