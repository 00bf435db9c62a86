import { Router, Request, Response } from "express";
import { asyncHandler } from "../middleware/errorHandler";
import { unknownExam } from "../middleware/errors";
import { examSubmissionSchema } from "../types/api";
import { GraderStore } from "../services/store/types";

export default function examRoutes(store: GraderStore): Router {
  const router = Router();

  router.get(
    "/exams",
    asyncHandler(async (_req: Request, res: Response): Promise<void> => {
      res.json(await store.listExams());
    })
  );

  /**
   * POST /exams/:examId/submit
   * Score one stage; an unknown stage is a 404
   */
  router.post(
    "/exams/:examId/submit",
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      const { examId } = req.params;
      const body = examSubmissionSchema.parse(req.body);

      const exam = await store.getExam(examId);
      if (!exam) {
        throw unknownExam(examId);
      }

      res.json(
        await store.recordExamSubmission(exam, body.user_id, body.stage_id, body.answers)
      );
    })
  );

  return router;
}
