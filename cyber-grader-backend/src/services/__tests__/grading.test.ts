import fs from "fs";
import { FlagDefinition } from "../../types/content";
import { FlagValidator } from "../../types/enums";
import { NotFoundError } from "../../middleware/errorHandler";
import { scoreExamStage, scoreQuiz, validateFlag } from "../grading";
import { exam, makeTempDir, quiz, writeFile } from "../../__tests__/helpers/fixtures";

describe("validateFlag", () => {
  let root: string;

  beforeAll(() => {
    root = makeTempDir();
    writeFile(root, "artifacts/loot.txt", "found");
  });

  afterAll(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  describe("exact", () => {
    const flag: FlagDefinition = {
      name: "port",
      prompt: "Which port?",
      validator: FlagValidator.EXACT,
      value: "8443",
    };

    it("accepts the value with surrounding whitespace", () => {
      expect(validateFlag(flag, "  8443\n", root)).toBe(true);
    });

    it("is case sensitive", () => {
      const word: FlagDefinition = { ...flag, value: "Secret" };
      expect(validateFlag(word, "secret", root)).toBe(false);
    });

    it("rejects a different value", () => {
      expect(validateFlag(flag, "443", root)).toBe(false);
    });
  });

  describe("regex", () => {
    const flag: FlagDefinition = {
      name: "banner",
      prompt: "Banner flag",
      validator: FlagValidator.REGEX,
      pattern: "FLAG\\{.+\\}",
    };

    it("requires the whole submission to match", () => {
      expect(validateFlag(flag, "FLAG{abc}", root)).toBe(true);
      expect(validateFlag(flag, "xFLAG{abc}", root)).toBe(false);
      expect(validateFlag(flag, "FLAG{abc}x", root)).toBe(false);
    });

    it("anchors every alternative", () => {
      const alternatives: FlagDefinition = { ...flag, pattern: "a|b" };
      expect(validateFlag(alternatives, "ab", root)).toBe(false);
      expect(validateFlag(alternatives, "b", root)).toBe(true);
    });

    it("matches against the trimmed submission", () => {
      expect(validateFlag(flag, "  FLAG{abc}  ", root)).toBe(true);
    });

    it("fails closed on an uncompilable pattern", () => {
      expect(validateFlag({ ...flag, pattern: "(" }, "(", root)).toBe(false);
    });

    it("fails closed without a pattern", () => {
      expect(validateFlag({ ...flag, pattern: null }, "anything", root)).toBe(false);
    });
  });

  describe("file_exists", () => {
    const flag: FlagDefinition = {
      name: "capture",
      prompt: "Where did you save it?",
      validator: FlagValidator.FILE_EXISTS,
    };

    it("accepts a path that exists under the content root", () => {
      expect(validateFlag(flag, "artifacts/loot.txt", root)).toBe(true);
    });

    it("rejects a missing path", () => {
      expect(validateFlag(flag, "artifacts/missing.txt", root)).toBe(false);
    });

    it("rejects an empty submission", () => {
      expect(validateFlag(flag, "   ", root)).toBe(false);
    });

    it("rejects the content root itself", () => {
      expect(validateFlag(flag, ".", root)).toBe(false);
    });

    it("rejects paths that leave the content root", () => {
      expect(validateFlag(flag, "../", root)).toBe(false);
      expect(validateFlag(flag, process.cwd(), root)).toBe(false);
    });
  });
});

describe("scoreQuiz", () => {
  it("awards full marks for correct answers", () => {
    expect(scoreQuiz(quiz(), { q1a: "b", q1b: "paris" })).toEqual({ score: 5, max_score: 5 });
  });

  it("compares short answers case-insensitively after trimming", () => {
    expect(scoreQuiz(quiz(), { q1b: "  PARIS " })).toEqual({ score: 3, max_score: 5 });
  });

  it("compares multiple choice keys exactly", () => {
    expect(scoreQuiz(quiz(), { q1a: "B" })).toEqual({ score: 0, max_score: 5 });
  });

  it("counts unanswered questions towards the maximum only", () => {
    expect(scoreQuiz(quiz(), {})).toEqual({ score: 0, max_score: 5 });
  });

  it("ignores answers for questions the quiz does not have", () => {
    expect(scoreQuiz(quiz(), { q9: "b", q1a: "b" })).toEqual({ score: 2, max_score: 5 });
  });

  it("scores an empty quiz as zero of zero", () => {
    expect(scoreQuiz(quiz({ questions: [] }), { q1a: "b" })).toEqual({ score: 0, max_score: 0 });
  });
});

describe("scoreExamStage", () => {
  it("awards nothing for blank answers", () => {
    const result = scoreExamStage(exam(), "s1", { a: "   " });
    expect(result.score).toBe(0);
    expect(result.max_score).toBe(10);
  });

  it("awards nothing when no answers are given", () => {
    expect(scoreExamStage(exam(), "s1", {}).score).toBe(0);
  });

  it("awards the stage maximum for any non-blank answer", () => {
    const result = scoreExamStage(exam(), "s1", { a: "anything" });
    expect(result).toEqual({
      stage: exam().stages[0],
      score: 10,
      max_score: 10,
    });
  });

  it("rejects an unknown stage", () => {
    expect(() => scoreExamStage(exam(), "s9", { a: "x" })).toThrow(NotFoundError);
    expect(() => scoreExamStage(exam(), "s9", { a: "x" })).toThrow("Stage s9 in exam e1 not found");
  });
});
