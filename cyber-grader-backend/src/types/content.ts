import { z } from "zod";
import { FlagValidator, QuestionType } from "./enums";

/**
 * Content definitions. Each schema validates one definition as it is read from
 * a YAML file or rehydrated from a durable backend; the exported types are the
 * parsed (and therefore valid) shapes.
 */

const isCompilableRegex = (pattern: string): boolean => {
  try {
    new RegExp(pattern);
    return true;
  } catch {
    return false;
  }
};

// YAML reads unquoted scalars such as `8443` as numbers; keep them as text
const scalarText = z.union([z.string(), z.number(), z.boolean()]).transform(String);

export const flagDefinitionSchema = z
  .object({
    name: z.string().min(1),
    prompt: z.string(),
    validator: z.nativeEnum(FlagValidator),
    value: scalarText.nullish(),
    pattern: scalarText.nullish(),
  })
  .superRefine((flag, ctx) => {
    if (flag.validator === FlagValidator.EXACT && !flag.value) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["value"],
        message: "Exact validator requires a value",
      });
    }
    if (flag.validator === FlagValidator.REGEX) {
      if (!flag.pattern) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["pattern"],
          message: "Regex validator requires a pattern",
        });
      } else if (!isCompilableRegex(flag.pattern)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["pattern"],
          message: `Invalid regular expression: ${flag.pattern}`,
        });
      }
    }
  });

export const labDefinitionSchema = z
  .object({
    id: z.string().min(1),
    title: z.string().min(1),
    version: z.coerce.string().min(1),
    instructions_path: z.string().default(""),
    flags: z.array(flagDefinitionSchema).default([]),
  })
  .superRefine((lab, ctx) => {
    const seen = new Set<string>();
    lab.flags.forEach((flag, index) => {
      if (seen.has(flag.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["flags", index, "name"],
          message: `Duplicate flag name: ${flag.name}`,
        });
      }
      seen.add(flag.name);
    });
  });

export const quizChoiceSchema = z.object({
  key: scalarText,
  label: scalarText,
});

export const quizQuestionSchema = z.object({
  id: z.string().min(1),
  prompt: z.string(),
  type: z.nativeEnum(QuestionType),
  choices: z.array(quizChoiceSchema).default([]),
  answer: scalarText,
  points: z.number().int().nonnegative().default(1),
});

export const quizDefinitionSchema = z.object({
  id: z.string().min(1),
  title: z.string().min(1),
  version: z.coerce.string().min(1),
  questions: z.array(quizQuestionSchema).default([]),
});

export const examStageDefinitionSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  description: z.string().default(""),
  max_score: z.number().int().nonnegative().default(10),
});

export const examDefinitionSchema = z.object({
  id: z.string().min(1),
  title: z.string().min(1),
  version: z.coerce.string().min(1),
  stages: z.array(examStageDefinitionSchema).default([]),
});

export type FlagDefinition = z.infer<typeof flagDefinitionSchema>;
export type LabDefinition = z.infer<typeof labDefinitionSchema>;
export type QuizChoice = z.infer<typeof quizChoiceSchema>;
export type QuizQuestion = z.infer<typeof quizQuestionSchema>;
export type QuizDefinition = z.infer<typeof quizDefinitionSchema>;
export type ExamStageDefinition = z.infer<typeof examStageDefinitionSchema>;
export type ExamDefinition = z.infer<typeof examDefinitionSchema>;

// Full replacement set applied by a content sync
export interface ContentSet {
  labs: LabDefinition[];
  quizzes: QuizDefinition[];
  exams: ExamDefinition[];
}
