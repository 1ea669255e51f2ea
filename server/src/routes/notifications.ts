import { Router } from "express";
import { requireUser } from "../auth.js";
import type { Notification } from "../db/schema.js";
import { NotFoundError } from "../errors.js";
import type { NotificationLedger } from "../notifications/ledger.js";
import { handle, param } from "./helpers.js";

export function createNotificationsRouter(ledger: NotificationLedger): Router {
  const router = Router();

  // A notification outlives the task or comment it points at; clients grey out
  // entries whose related object is gone.
  const present = (n: Notification) => ({ ...n, relatedExists: ledger.resolveRelated(n) !== null });

  // GET /: the caller's notifications, newest first
  router.get(
    "/",
    handle("notifications", (req, res) => {
      res.json(ledger.listForRecipient(requireUser(req).id).map(present));
    })
  );

  router.get(
    "/unread-count",
    handle("notifications", (req, res) => {
      res.json({ count: ledger.unreadCount(requireUser(req).id) });
    })
  );

  router.post(
    "/read-all",
    handle("notifications", (req, res) => {
      res.json({ updated: ledger.markAllRead(requireUser(req).id) });
    })
  );

  // Only the recipient can mark a notification read; anyone else gets 404.
  router.post(
    "/:id/read",
    handle("notifications", (req, res) => {
      const notification = ledger.markRead(param(req, "id"), requireUser(req).id);
      if (!notification) throw new NotFoundError("Notification");
      res.json(present(notification));
    })
  );

  return router;
}
