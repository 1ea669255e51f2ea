import type { Comment } from "../db/schema.js";

export interface CommentNode {
  comment: Comment;
  replies: CommentNode[];
}

/** parentId (null for top-level) → children in creation order. */
export function buildChildIndex(comments: readonly Comment[]): Map<string | null, Comment[]> {
  const index = new Map<string | null, Comment[]>();
  const ordered = [...comments].sort((a, b) => a.createdAt.localeCompare(b.createdAt));
  for (const comment of ordered) {
    const siblings = index.get(comment.parentId) ?? [];
    siblings.push(comment);
    index.set(comment.parentId, siblings);
  }
  return index;
}

/**
 * Nest a task's comments into reply trees. Iterative, so thread depth is not
 * bounded by the call stack.
 */
export function buildThread(comments: readonly Comment[]): CommentNode[] {
  const index = buildChildIndex(comments);
  const roots = (index.get(null) ?? []).map((comment): CommentNode => ({ comment, replies: [] }));

  const stack = [...roots];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    for (const child of index.get(node.comment.id) ?? []) {
      const childNode: CommentNode = { comment: child, replies: [] };
      node.replies.push(childNode);
      stack.push(childNode);
    }
  }
  return roots;
}

/** Ids of `rootId` and every comment below it. */
export function collectSubtree(comments: readonly Comment[], rootId: string): string[] {
  const index = buildChildIndex(comments);
  const ids: string[] = [];
  const stack = [rootId];
  while (stack.length > 0) {
    const id = stack.pop();
    if (id === undefined) break;
    ids.push(id);
    for (const child of index.get(id) ?? []) stack.push(child.id);
  }
  return ids;
}
