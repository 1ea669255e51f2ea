import type { Database } from "../db/database.js";
import type { User } from "../db/schema.js";

/** `@` followed by one or more word characters (letters, digits, underscore). */
const MENTION_PATTERN = /@(\w+)/g;

/** Usernames mentioned in `text`, in order of first appearance, without duplicates. */
export function extractMentions(text: string): string[] {
  if (!text) return [];
  const seen = new Set<string>();
  for (const match of text.matchAll(MENTION_PATTERN)) {
    seen.add(match[1]);
  }
  return [...seen];
}

/**
 * Resolve the mentions in `text` to members of `teamId`. Usernames match
 * case-sensitively; tokens naming no user, or a user outside the team, are
 * dropped without error.
 */
export function parseMentions(db: Database, text: string, teamId: string): Set<User> {
  const usernames = new Set(extractMentions(text));
  const mentioned = new Set<User>();
  if (usernames.size === 0) return mentioned;

  const memberIds = new Set(
    db.tables.memberships.filter((m) => m.teamId === teamId).map((m) => m.userId)
  );
  for (const user of db.tables.users) {
    if (usernames.has(user.username) && memberIds.has(user.id)) {
      mentioned.add(user);
    }
  }
  return mentioned;
}

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

/** HTML-escape `text` and wrap every mention token in a `mention` span. */
export function highlightMentions(text: string): string {
  return escapeHtml(text).replace(MENTION_PATTERN, '<span class="mention">@$1</span>');
}
