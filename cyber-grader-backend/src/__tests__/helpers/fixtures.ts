import fs from "fs";
import os from "os";
import path from "path";
import { ExamDefinition, LabDefinition, QuizDefinition } from "../../types/content";
import { FlagValidator, QuestionType } from "../../types/enums";

export const lab = (overrides: Partial<LabDefinition> = {}): LabDefinition => ({
  id: "L1",
  title: "Lab One",
  version: "1",
  instructions_path: "",
  flags: [
    {
      name: "f1",
      prompt: "Find the flag",
      validator: FlagValidator.REGEX,
      pattern: "FLAG\\{.+\\}",
    },
  ],
  ...overrides,
});

export const quiz = (overrides: Partial<QuizDefinition> = {}): QuizDefinition => ({
  id: "q1",
  title: "Quiz One",
  version: "1",
  questions: [
    {
      id: "q1a",
      prompt: "Pick one",
      type: QuestionType.MULTIPLE_CHOICE,
      choices: [
        { key: "a", label: "Alpha" },
        { key: "b", label: "Bravo" },
      ],
      answer: "b",
      points: 2,
    },
    {
      id: "q1b",
      prompt: "Capital of France?",
      type: QuestionType.SHORT_ANSWER,
      choices: [],
      answer: "Paris",
      points: 3,
    },
  ],
  ...overrides,
});

export const exam = (overrides: Partial<ExamDefinition> = {}): ExamDefinition => ({
  id: "e1",
  title: "Exam One",
  version: "1",
  stages: [{ id: "s1", title: "Stage One", description: "", max_score: 10 }],
  ...overrides,
});

/**
 * Clock that advances one second per call, starting at `start`.
 */
export const tickingClock = (start = "2024-01-01T00:00:00.000Z"): (() => Date) => {
  let current = Date.parse(start);
  return () => {
    const now = new Date(current);
    current += 1000;
    return now;
  };
};

export const makeTempDir = (): string => fs.mkdtempSync(path.join(os.tmpdir(), "grader-"));

export const writeFile = (root: string, relative: string, contents: string): string => {
  const target = path.join(root, relative);
  fs.mkdirSync(path.dirname(target), { recursive: true });
  fs.writeFileSync(target, contents);
  return target;
};
