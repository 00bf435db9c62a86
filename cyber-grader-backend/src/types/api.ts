import { z } from "zod";
import { QuizDefinition } from "./content";
import { ExportResponse } from "./results";
import { SheetSyncResult } from "../services/integrations";

// Request bodies

export const flagSubmissionSchema = z.object({
  user_id: z.string().min(1),
  submission: z.string(),
});

// A quiz answer may be a number ("42"); null, booleans and objects are rejected
const quizAnswerSchema = z.union([z.string(), z.number()]).transform(String);

// Quiz answers arrive either as a list of { question_id, answer } or as a map
const quizAnswerListSchema = z
  .array(z.object({ question_id: z.string().min(1), answer: quizAnswerSchema }))
  .transform((answers) =>
    Object.fromEntries(answers.map((entry) => [entry.question_id, entry.answer]))
  );

export const quizSubmissionSchema = z.object({
  user_id: z.string().min(1),
  answers: z.union([quizAnswerListSchema, z.record(quizAnswerSchema)]).default({}),
});

export const examSubmissionSchema = z.object({
  user_id: z.string().min(1),
  stage_id: z.string().min(1),
  answers: z.record(z.string()).default({}),
});

export type FlagSubmissionRequest = z.infer<typeof flagSubmissionSchema>;
export type QuizSubmissionRequest = z.infer<typeof quizSubmissionSchema>;
export type ExamSubmissionRequest = z.infer<typeof examSubmissionSchema>;

// Responses

export type PublicQuizQuestion = Omit<QuizDefinition["questions"][number], "answer">;

export interface PublicQuiz extends Omit<QuizDefinition, "questions"> {
  questions: PublicQuizQuestion[];
}

export interface ExportScoresResponse extends ExportResponse {
  sheet_sync: SheetSyncResult;
}
