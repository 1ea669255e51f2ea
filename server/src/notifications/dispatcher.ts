import type { Database } from "../db/database.js";
import type { Notification } from "../db/schema.js";
import { systemClock, type Clock } from "../utils/clock.js";
import { renderBatchEmail, renderSingleEmail, type EmailTransport } from "./email.js";
import type { NotificationInput, NotificationLedger } from "./ledger.js";

/** Fixed length of a recipient's batching window. Not configurable per user. */
export const BATCH_WINDOW_MS = 5 * 60 * 1000;

interface OpenWindow {
  start: number;
  /** Notification that opened the window; it was emailed on its own. */
  anchorId: string;
  /** Notifications that arrived while the window was open. */
  pendingIds: string[];
}

export type WindowState =
  | { state: "NO_WINDOW" }
  | { state: "WINDOW_OPEN"; start: Date; anchorId: string; pendingIds: string[] };

type DeliveryMode = "single" | "batch";

interface EmailJob {
  recipientId: string;
  mode: DeliveryMode;
  notificationIds: string[];
}

/** Only the most recent failures are kept. */
export const MAX_DELIVERY_ERRORS = 100;

export interface DeliveryError {
  recipientId: string;
  notificationIds: string[];
  mode: DeliveryMode;
  error: string;
  at: string;
}

/** In-app delivery, e.g. a socket.io room per user. */
export interface NotificationPusher {
  push(notification: Notification): void;
}

export interface DispatcherOptions {
  db: Database;
  ledger: NotificationLedger;
  transport: EmailTransport;
  pusher?: NotificationPusher | null;
  clock?: Clock;
}

/**
 * Records notifications, pushes them in-app and decides when to email.
 *
 * Each recipient is in one of two states, shared by every notification kind:
 *
 *   NO_WINDOW    : the next notification is emailed on its own right away and
 *                  opens a window anchored at it.
 *   WINDOW_OPEN  : until start + BATCH_WINDOW_MS, notifications only join the
 *                  pending list. When the window closes, one digest listing the
 *                  window's unread notifications goes out (if anything is
 *                  pending) and the recipient returns to NO_WINDOW.
 *
 * Expiry is lazy: it is evaluated on the recipient's next notify() or on
 * sweep(). The check-and-append is synchronous, so concurrent notify() calls
 * for one recipient can never open two windows.
 *
 * Email failures never undo the notification or reach the caller; they are
 * logged and the last MAX_DELIVERY_ERRORS are kept in getDeliveryErrors().
 */
export class NotificationDispatcher {
  private db: Database;
  private ledger: NotificationLedger;
  private transport: EmailTransport;
  private pusher: NotificationPusher | null;
  private clock: Clock;

  /** recipientId -> open window. Absent means NO_WINDOW. */
  private windows = new Map<string, OpenWindow>();
  private deliveryErrors: DeliveryError[] = [];

  constructor(options: DispatcherOptions) {
    this.db = options.db;
    this.ledger = options.ledger;
    this.transport = options.transport;
    this.pusher = options.pusher ?? null;
    this.clock = options.clock ?? systemClock;
  }

  /** Attach the in-app channel once it exists (the socket server starts after the services). */
  setPusher(pusher: NotificationPusher | null): void {
    this.pusher = pusher;
  }

  async notify(input: NotificationInput): Promise<Notification> {
    const notification = this.ledger.record(input);

    try {
      this.pusher?.push(notification);
    } catch (err) {
      console.error(`[dispatcher] In-app push failed for notification ${notification.id}:`, err);
    }

    const jobs = this.admit(notification);
    for (const job of jobs) {
      await this.deliver(job);
    }
    return notification;
  }

  /** Close every expired window, sending its digest. Returns how many digests were attempted. */
  async sweep(): Promise<number> {
    const now = this.clock().getTime();
    const jobs: EmailJob[] = [];
    for (const [recipientId, window] of [...this.windows]) {
      if (now - window.start >= BATCH_WINDOW_MS) {
        jobs.push(...this.close(recipientId, window));
      }
    }
    for (const job of jobs) {
      await this.deliver(job);
    }
    return jobs.length;
  }

  /** Close every window now, expired or not (shutdown). */
  async flushAll(): Promise<number> {
    const jobs: EmailJob[] = [];
    for (const [recipientId, window] of [...this.windows]) {
      jobs.push(...this.close(recipientId, window));
    }
    for (const job of jobs) {
      await this.deliver(job);
    }
    return jobs.length;
  }

  windowState(recipientId: string): WindowState {
    const window = this.windows.get(recipientId);
    if (!window) return { state: "NO_WINDOW" };
    return {
      state: "WINDOW_OPEN",
      start: new Date(window.start),
      anchorId: window.anchorId,
      pendingIds: [...window.pendingIds],
    };
  }

  getDeliveryErrors(): DeliveryError[] {
    return [...this.deliveryErrors];
  }

  /** State transition for one new notification. Must stay synchronous (see class comment). */
  private admit(notification: Notification): EmailJob[] {
    const recipientId = notification.recipientId;
    const now = this.clock().getTime();
    const jobs: EmailJob[] = [];

    let window = this.windows.get(recipientId);
    if (window && now - window.start >= BATCH_WINDOW_MS) {
      jobs.push(...this.close(recipientId, window));
      window = undefined;
    }

    if (window) {
      window.pendingIds.push(notification.id);
    } else {
      this.windows.set(recipientId, { start: now, anchorId: notification.id, pendingIds: [] });
      jobs.push({ recipientId, mode: "single", notificationIds: [notification.id] });
    }
    return jobs;
  }

  private close(recipientId: string, window: OpenWindow): EmailJob[] {
    this.windows.delete(recipientId);

    const unread = (id: string) => this.ledger.get(id)?.read === false;
    const pending = window.pendingIds.filter(unread);
    if (pending.length === 0) return [];

    const ids = unread(window.anchorId) ? [window.anchorId, ...pending] : pending;
    return [{ recipientId, mode: "batch", notificationIds: ids }];
  }

  private async deliver(job: EmailJob): Promise<void> {
    const recipient = this.db.tables.users.find((u) => u.id === job.recipientId);
    const notifications = job.notificationIds
      .map((id) => this.ledger.get(id))
      .filter((n): n is Notification => n !== undefined);
    const first = notifications[0];
    if (!recipient || !first) {
      console.warn(`[dispatcher] Dropping ${job.mode} email for unknown recipient ${job.recipientId}`);
      return;
    }

    const sender = this.db.tables.users.find((u) => u.id === first.senderId);
    const email =
      job.mode === "single"
        ? renderSingleEmail(first, sender?.username ?? "someone")
        : renderBatchEmail(notifications);

    let error: string | null = null;
    try {
      const ok = await this.transport.send(recipient.email, email.subject, email.body);
      if (!ok) error = "transport rejected the message";
    } catch (err) {
      error = err instanceof Error ? err.message : String(err);
    }

    if (error !== null) {
      console.error(`[dispatcher] Failed to send ${job.mode} email to ${recipient.username}: ${error}`);
      this.deliveryErrors.push({
        recipientId: recipient.id,
        notificationIds: notifications.map((n) => n.id),
        mode: job.mode,
        error,
        at: this.clock().toISOString(),
      });
      if (this.deliveryErrors.length > MAX_DELIVERY_ERRORS) {
        this.deliveryErrors.splice(0, this.deliveryErrors.length - MAX_DELIVERY_ERRORS);
      }
      return;
    }
    console.log(`[dispatcher] Sent ${job.mode} email to ${recipient.username} (${notifications.length} notification(s))`);
  }
}
