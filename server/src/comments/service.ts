import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import type { ActivityLog } from "../activity/log.js";
import type { Database } from "../db/database.js";
import { deleteCommentTree } from "../db/cascade.js";
import type { Comment, Task } from "../db/schema.js";
import { AccessDeniedError, NotFoundError, ValidationError } from "../errors.js";
import type { NotificationDispatcher } from "../notifications/dispatcher.js";
import { parseMentions } from "../notifications/mentions.js";
import type { PermissionStore } from "../permissions/store.js";
import { removeStoredFiles, type FileStorage } from "../storage/files.js";
import { systemClock, type Clock } from "../utils/clock.js";
import { parseInput } from "../utils/validate.js";
import { buildThread, type CommentNode } from "./tree.js";

export const CommentInputSchema = z.object({
  content: z
    .string()
    .trim()
    .min(1, "Comment cannot be empty.")
    .max(2000, "Comment must not exceed 2000 characters."),
  parentId: z.string().min(1).nullable().default(null),
});

export type CommentInput = z.input<typeof CommentInputSchema>;

export interface CommentServiceDeps {
  db: Database;
  permissions: PermissionStore;
  activity: ActivityLog;
  dispatcher: NotificationDispatcher;
  files: FileStorage;
  clock?: Clock;
}

/**
 * Threaded comments on tasks. Comments form an arena: each row holds a
 * nullable parentId and threads are assembled from a child index.
 */
export class CommentService {
  private db: Database;
  private permissions: PermissionStore;
  private activity: ActivityLog;
  private dispatcher: NotificationDispatcher;
  private files: FileStorage;
  private clock: Clock;

  constructor(deps: CommentServiceDeps) {
    this.db = deps.db;
    this.permissions = deps.permissions;
    this.activity = deps.activity;
    this.dispatcher = deps.dispatcher;
    this.files = deps.files;
    this.clock = deps.clock ?? systemClock;
  }

  /**
   * Post a comment (or a reply when `parentId` is set). Mentioned team members
   * get a MENTION notification; the parent's author gets a REPLY notification
   * unless they wrote the reply or were already mentioned in it.
   */
  async create(actorId: string, taskId: string, input: CommentInput): Promise<Comment> {
    const task = this.requireTask(taskId);
    this.requireMember(actorId, task, "You do not have permission to comment on this task.");
    const { content, parentId } = parseInput(CommentInputSchema, input);

    let parent: Comment | undefined;
    if (parentId !== null) {
      parent = this.db.tables.comments.find((c) => c.id === parentId);
      if (!parent) throw new ValidationError("Parent comment does not exist.");
      if (parent.taskId !== task.id) {
        throw new ValidationError("Parent comment belongs to a different task.");
      }
    }

    const comment: Comment = {
      id: uuidv4(),
      taskId: task.id,
      authorId: actorId,
      content,
      parentId,
      createdAt: this.clock().toISOString(),
    };
    this.db.transaction((t) => {
      t.comments.push(comment);
      this.activity.record(task.id, actorId, "comment_added", parent ? `Replied to comment ${parent.id}` : "Added a comment");
    });

    const authorName = this.usernameOf(actorId);
    const notified = new Set<string>();
    for (const user of parseMentions(this.db, content, task.teamId)) {
      if (user.id === actorId) continue;
      notified.add(user.id);
      await this.dispatcher.notify({
        recipientId: user.id,
        senderId: actorId,
        kind: "mention",
        related: { kind: "comment", id: comment.id },
        message: `${authorName} mentioned you in a comment on '${task.title}'`,
      });
    }

    if (parent && parent.authorId !== actorId && !notified.has(parent.authorId)) {
      await this.dispatcher.notify({
        recipientId: parent.authorId,
        senderId: actorId,
        kind: "reply",
        related: { kind: "comment", id: comment.id },
        message: `${authorName} replied to your comment on '${task.title}'`,
      });
    }
    return comment;
  }

  /** All comments on a task as reply trees, oldest first at every level. */
  thread(actorId: string, taskId: string): CommentNode[] {
    const task = this.requireTask(taskId);
    this.requireMember(actorId, task, "You do not have permission to view this task.");
    return buildThread(this.db.tables.comments.filter((c) => c.taskId === task.id));
  }

  /** Delete a comment and every reply below it. Allowed for its author and team owners, while they can see the task. */
  delete(actorId: string, commentId: string): void {
    const comment = this.db.tables.comments.find((c) => c.id === commentId);
    if (!comment) throw new NotFoundError("Comment");
    const task = this.requireTask(comment.taskId);
    this.requireMember(actorId, task, "You do not have permission to delete this comment.");

    const isOwner = this.db.tables.memberships.some(
      (m) => m.teamId === task.teamId && m.userId === actorId && m.role === "OWNER"
    );
    if (comment.authorId !== actorId && !isOwner) {
      throw new AccessDeniedError("You do not have permission to delete this comment.");
    }

    const removed = this.db.transaction((t) => deleteCommentTree(t, comment.id));
    removeStoredFiles(this.files, removed);
  }

  private requireTask(taskId: string): Task {
    const task = this.db.tables.tasks.find((t) => t.id === taskId);
    if (!task) throw new NotFoundError("Task");
    return task;
  }

  private requireMember(actorId: string, task: Task, message: string): void {
    if (!this.permissions.check(actorId, { kind: "task", id: task.id }, "view")) {
      throw new AccessDeniedError(message);
    }
  }

  private usernameOf(userId: string): string {
    return this.db.tables.users.find((u) => u.id === userId)?.username ?? "someone";
  }
}
