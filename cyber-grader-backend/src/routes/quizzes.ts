import { Router, Request, Response } from "express";
import { asyncHandler } from "../middleware/errorHandler";
import { unknownQuiz } from "../middleware/errors";
import { PublicQuiz, quizSubmissionSchema } from "../types/api";
import { QuizDefinition } from "../types/content";
import { GraderStore } from "../services/store/types";

// Answer keys never leave the server
const toPublicQuiz = (quiz: QuizDefinition): PublicQuiz => ({
  ...quiz,
  questions: quiz.questions.map(({ answer: _answer, ...question }) => question),
});

export default function quizRoutes(store: GraderStore): Router {
  const router = Router();

  router.get(
    "/quizzes",
    asyncHandler(async (_req: Request, res: Response): Promise<void> => {
      const quizzes = await store.listQuizzes();
      res.json(quizzes.map(toPublicQuiz));
    })
  );

  router.post(
    "/quizzes/:quizId/submit",
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      const { quizId } = req.params;
      const body = quizSubmissionSchema.parse(req.body);

      const quiz = await store.getQuiz(quizId);
      if (!quiz) {
        throw unknownQuiz(quizId);
      }

      res.json(await store.recordQuizSubmission(quiz, body.user_id, body.answers));
    })
  );

  return router;
}
