import { Router } from "express";
import { requireUser } from "../auth.js";
import type { CommentService } from "../comments/service.js";
import type { CommentNode } from "../comments/tree.js";
import type { Comment } from "../db/schema.js";
import { highlightMentions } from "../notifications/mentions.js";
import type { TaskService } from "../tasks/service.js";
import { handle, param } from "./helpers.js";

/** Single query-string value; repeated or nested params are ignored. */
function queryValue(value: unknown): string | undefined {
  return typeof value === "string" && value !== "" ? value : undefined;
}

interface ThreadEntry {
  comment: Comment;
  /** Escaped content with mentions wrapped in `<span class="mention">`. */
  html: string;
  replies: ThreadEntry[];
}

function presentThread(nodes: CommentNode[]): ThreadEntry[] {
  return nodes.map((node) => ({
    comment: node.comment,
    html: highlightMentions(node.comment.content),
    replies: presentThread(node.replies),
  }));
}

export function createTasksRouter(tasks: TaskService, comments: CommentService): Router {
  const router = Router();

  // GET /?teamId=&status=: tasks visible to the caller, newest first
  router.get(
    "/",
    handle("tasks", (req, res) => {
      const filter = { teamId: queryValue(req.query.teamId), status: queryValue(req.query.status) };
      res.json(tasks.list(requireUser(req).id, filter));
    })
  );

  router.post(
    "/",
    handle("tasks", async (req, res) => {
      res.status(201).json(await tasks.create(requireUser(req).id, req.body));
    })
  );

  router.get(
    "/:id",
    handle("tasks", (req, res) => {
      res.json(tasks.get(requireUser(req).id, param(req, "id")));
    })
  );

  router.patch(
    "/:id",
    handle("tasks", async (req, res) => {
      res.json(await tasks.update(requireUser(req).id, param(req, "id"), req.body));
    })
  );

  router.delete(
    "/:id",
    handle("tasks", (req, res) => {
      tasks.delete(requireUser(req).id, param(req, "id"));
      res.json({ ok: true });
    })
  );

  router.get(
    "/:id/activity",
    handle("tasks", (req, res) => {
      res.json(tasks.activityFor(requireUser(req).id, param(req, "id")));
    })
  );

  // GET /:id/comments: threaded, oldest first at every level
  router.get(
    "/:id/comments",
    handle("comments", (req, res) => {
      res.json(presentThread(comments.thread(requireUser(req).id, param(req, "id"))));
    })
  );

  // POST /:id/comments  { content, parentId? }
  router.post(
    "/:id/comments",
    handle("comments", async (req, res) => {
      res.status(201).json(await comments.create(requireUser(req).id, param(req, "id"), req.body));
    })
  );

  return router;
}
