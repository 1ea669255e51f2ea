import { Router } from "express";
import { requireUser } from "../auth.js";
import type { CommentService } from "../comments/service.js";
import { handle, param } from "./helpers.js";

export function createCommentsRouter(comments: CommentService): Router {
  const router = Router();

  // DELETE /:id: removes the comment and all of its replies
  router.delete(
    "/:id",
    handle("comments", (req, res) => {
      comments.delete(requireUser(req).id, param(req, "id"));
      res.json({ ok: true });
    })
  );

  return router;
}
