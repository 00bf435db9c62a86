import { Router, Request, Response } from "express";
import { asyncHandler, ValidationError } from "../middleware/errorHandler";
import { unknownFlag, unknownLab } from "../middleware/errors";
import { flagSubmissionSchema } from "../types/api";
import { GraderStore } from "../services/store/types";

export default function labRoutes(store: GraderStore): Router {
  const router = Router();

  /**
   * GET /labs?user_id=
   * Every lab with the user's score
   */
  router.get(
    "/labs",
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      const userId = req.query.user_id;
      if (typeof userId !== "string" || userId === "") {
        throw new ValidationError("user_id is required");
      }
      res.json(await store.labStatusForUser(userId));
    })
  );

  /**
   * POST /labs/:labId/flags/:flagName
   * Record one flag attempt
   */
  router.post(
    "/labs/:labId/flags/:flagName",
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      const { labId, flagName } = req.params;
      const body = flagSubmissionSchema.parse(req.body);

      const lab = await store.getLab(labId);
      if (!lab) {
        throw unknownLab(labId);
      }
      const flag = lab.flags.find((candidate) => candidate.name === flagName);
      if (!flag) {
        throw unknownFlag(labId, flagName);
      }

      res.json(await store.recordFlagSubmission(labId, flag, body.user_id, body.submission));
    })
  );

  return router;
}
