import fs from "fs";
import path from "path";
import { ExamDefinition, ExamStageDefinition, FlagDefinition, QuizDefinition } from "../types/content";
import { FlagValidator, QuestionType } from "../types/enums";
import { unknownStage } from "../middleware/errors";

/**
 * Submission grading. Every function here is pure apart from the file system
 * lookup behind `file_exists` flags, and never records anything.
 */

export type AnswerMap = Record<string, string>;

function matchesEntirely(pattern: string, input: string): boolean {
  try {
    return new RegExp(`^(?:${pattern})$`).test(input);
  } catch {
    // An uncompilable pattern never accepts anything
    return false;
  }
}

function existsInside(contentRoot: string, submission: string): boolean {
  const root = path.resolve(contentRoot);
  const target = path.resolve(root, submission);
  const relative = path.relative(root, target);
  if (
    relative === "" ||
    relative === ".." ||
    relative.startsWith(`..${path.sep}`) ||
    path.isAbsolute(relative)
  ) {
    return false;
  }
  return fs.existsSync(target);
}

/**
 * Decide whether a flag submission is correct.
 * Unknown validator kinds fail closed.
 */
export function validateFlag(
  flag: FlagDefinition,
  submission: string,
  contentRoot: string
): boolean {
  const trimmed = submission.trim();

  switch (flag.validator) {
    case FlagValidator.EXACT:
      return trimmed === (flag.value ?? "").trim();
    case FlagValidator.REGEX:
      return flag.pattern ? matchesEntirely(flag.pattern, trimmed) : false;
    case FlagValidator.FILE_EXISTS:
      return trimmed !== "" && existsInside(contentRoot, trimmed);
    default:
      return false;
  }
}

export interface QuizScore {
  score: number;
  max_score: number;
}

/**
 * Score a quiz. `max_score` covers every question whether or not it was answered.
 */
export function scoreQuiz(quiz: QuizDefinition, answers: AnswerMap): QuizScore {
  let score = 0;
  let maxScore = 0;

  for (const question of quiz.questions) {
    maxScore += question.points;

    if (!Object.prototype.hasOwnProperty.call(answers, question.id)) {
      continue;
    }
    const submitted = answers[question.id];

    const correct =
      question.type === QuestionType.MULTIPLE_CHOICE
        ? submitted === question.answer
        : submitted.trim().toLowerCase() === question.answer.trim().toLowerCase();

    if (correct) {
      score += question.points;
    }
  }

  return { score, max_score: maxScore };
}

export interface StageScore {
  stage: ExamStageDefinition;
  score: number;
  max_score: number;
}

/**
 * Score one exam stage: full credit for any non-blank answer, otherwise zero.
 * Placeholder policy until stages carry real answer keys.
 */
export function scoreExamStage(
  exam: ExamDefinition,
  stageId: string,
  answers: AnswerMap
): StageScore {
  const stage = exam.stages.find((candidate) => candidate.id === stageId);
  if (!stage) {
    throw unknownStage(exam.id, stageId);
  }

  const answered = Object.values(answers).some((answer) => answer.trim() !== "");

  return {
    stage,
    score: answered ? stage.max_score : 0,
    max_score: stage.max_score,
  };
}
