import { Router, Request, Response } from "express";
import { readNote } from "../services/content/notes";

export default function noteRoutes(contentRoot: string): Router {
  const router = Router();

  router.get("/notes/:name", (req: Request, res: Response): void => {
    res.json(readNote(contentRoot, req.params.name));
  });

  return router;
}
