import type { Notification } from "../db/schema.js";

/**
 * Outbound mail. Implementations resolve false (or throw) when the message
 * could not be handed off; the dispatcher treats both as a delivery error.
 */
export interface EmailTransport {
  send(to: string, subject: string, body: string): Promise<boolean>;
}

/**
 * Transport that writes each message to the log instead of sending it.
 * Default when no mail relay is wired in.
 */
export class LogEmailTransport implements EmailTransport {
  private from: string;

  constructor(from: string) {
    this.from = from;
  }

  async send(to: string, subject: string, body: string): Promise<boolean> {
    console.log(`[email] ${this.from} → ${to}: ${subject}`);
    for (const line of body.split("\n")) {
      console.log(`[email]   ${line}`);
    }
    return true;
  }
}

export interface RenderedEmail {
  subject: string;
  body: string;
}

export function renderSingleEmail(notification: Notification, senderName: string): RenderedEmail {
  switch (notification.kind) {
    case "mention":
      return { subject: `You were mentioned by ${senderName}`, body: notification.message };
    case "assignment":
      return { subject: `You were assigned a task by ${senderName}`, body: notification.message };
    case "reply":
      return { subject: `${senderName} replied to your comment`, body: notification.message };
  }
}

/** One digest for everything that piled up in a batching window, oldest first. */
export function renderBatchEmail(notifications: readonly Notification[]): RenderedEmail {
  const noun = notifications.length === 1 ? "notification" : "notifications";
  return {
    subject: `You have ${notifications.length} new ${noun}`,
    body: notifications.map((n) => `- ${n.message}`).join("\n"),
  };
}
