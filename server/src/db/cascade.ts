import { collectSubtree } from "../comments/tree.js";
import type { Attachment, Tables } from "./schema.js";

// Cascading deletes. Call only inside Database.transaction(); each returns the
// attachment rows it removed so the caller can delete their stored files
// once the transaction has committed.
//
// Notifications are never cascaded: their `related` reference simply stops
// resolving once the task or comment is gone.

/** Remove the given comments and the attachments on them. */
export function deleteCommentRows(t: Tables, commentIds: readonly string[]): Attachment[] {
  const ids = new Set(commentIds);
  const removed = t.attachments.filter((a) => a.target.kind === "comment" && ids.has(a.target.id));
  t.attachments = t.attachments.filter((a) => !(a.target.kind === "comment" && ids.has(a.target.id)));
  t.comments = t.comments.filter((c) => !ids.has(c.id));
  return removed;
}

/** Remove a comment with all of its replies, at any depth. */
export function deleteCommentTree(t: Tables, commentId: string): Attachment[] {
  return deleteCommentRows(t, collectSubtree(t.comments, commentId));
}

/** Remove a task with its comments, activity log, attachments and grants. */
export function deleteTaskRows(t: Tables, taskId: string): Attachment[] {
  const commentIds = t.comments.filter((c) => c.taskId === taskId).map((c) => c.id);
  const removed = deleteCommentRows(t, commentIds);

  removed.push(...t.attachments.filter((a) => a.target.kind === "task" && a.target.id === taskId));
  t.attachments = t.attachments.filter((a) => !(a.target.kind === "task" && a.target.id === taskId));
  t.activity = t.activity.filter((e) => e.taskId !== taskId);
  t.grants = t.grants.filter((g) => !(g.target.kind === "task" && g.target.id === taskId));
  t.tasks = t.tasks.filter((task) => task.id !== taskId);
  return removed;
}

/** Remove a team with its memberships, tasks (and their cascades) and grants. */
export function deleteTeamRows(t: Tables, teamId: string): Attachment[] {
  const removed: Attachment[] = [];
  for (const task of t.tasks.filter((task) => task.teamId === teamId)) {
    removed.push(...deleteTaskRows(t, task.id));
  }
  t.memberships = t.memberships.filter((m) => m.teamId !== teamId);
  t.grants = t.grants.filter((g) => !(g.target.kind === "team" && g.target.id === teamId));
  t.teams = t.teams.filter((team) => team.id !== teamId);
  return removed;
}
