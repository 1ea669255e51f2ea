import { Router, Request, Response } from "express";

export function createHealthRouter(): Router {
  const router = Router();

  router.get("/", (_req: Request, res: Response) => {
    res.json({
      ok: true,
      uptime: process.uptime(),
    });
  });

  return router;
}
