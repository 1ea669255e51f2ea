import { v4 as uuidv4 } from "uuid";
import type { Database } from "../db/database.js";
import type { Comment, ContentRef, Notification, NotificationKind, Task } from "../db/schema.js";
import { systemClock, type Clock } from "../utils/clock.js";

export interface NotificationInput {
  recipientId: string;
  senderId: string;
  kind: NotificationKind;
  related: ContentRef;
  message: string;
}

export type RelatedObject =
  | { kind: "task"; task: Task }
  | { kind: "comment"; comment: Comment };

/**
 * Persistent record of notifications. Rows are immutable once written apart
 * from `read`, which only ever goes from false to true.
 */
export class NotificationLedger {
  private db: Database;
  private clock: Clock;

  constructor(db: Database, clock: Clock = systemClock) {
    this.db = db;
    this.clock = clock;
  }

  record(input: NotificationInput): Notification {
    const notification: Notification = {
      id: uuidv4(),
      recipientId: input.recipientId,
      senderId: input.senderId,
      kind: input.kind,
      related: { ...input.related },
      message: input.message,
      read: false,
      createdAt: this.clock().toISOString(),
    };
    this.db.transaction((t) => {
      t.notifications.push(notification);
    });
    return notification;
  }

  get(id: string): Notification | undefined {
    return this.db.tables.notifications.find((n) => n.id === id);
  }

  /** A recipient's notifications, newest first. */
  listForRecipient(userId: string): Notification[] {
    return this.db.tables.notifications
      .filter((n) => n.recipientId === userId)
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt));
  }

  unreadCount(userId: string): number {
    return this.db.tables.notifications.filter((n) => n.recipientId === userId && !n.read).length;
  }

  /** Mark one notification read. Only its recipient may; anyone else gets null. */
  markRead(id: string, userId: string): Notification | null {
    const notification = this.get(id);
    if (!notification || notification.recipientId !== userId) return null;
    if (!notification.read) {
      this.db.transaction(() => {
        notification.read = true;
      });
    }
    return notification;
  }

  /** Mark every unread notification of `userId` read. Returns how many changed. */
  markAllRead(userId: string): number {
    return this.db.transaction((t) => {
      let count = 0;
      for (const n of t.notifications) {
        if (n.recipientId === userId && !n.read) {
          n.read = true;
          count++;
        }
      }
      return count;
    });
  }

  /** The task or comment a notification is about, or null once it has been deleted. */
  resolveRelated(notification: Notification): RelatedObject | null {
    const { kind, id } = notification.related;
    if (kind === "task") {
      const task = this.db.tables.tasks.find((t) => t.id === id);
      return task ? { kind, task } : null;
    }
    const comment = this.db.tables.comments.find((c) => c.id === id);
    return comment ? { kind, comment } : null;
  }
}
