import { Router, Request, Response } from "express";
import { asyncHandler } from "../middleware/errorHandler";
import { GraderStore } from "../services/store/types";

export default function dashboardRoutes(store: GraderStore): Router {
  const router = Router();

  router.get(
    "/dashboard/:userId",
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      res.json(await store.dashboardForUser(req.params.userId));
    })
  );

  return router;
}
