import express, { type Express } from "express";
import cors from "cors";
import rateLimit from "express-rate-limit";
import { createAuthMiddleware } from "./auth.js";
import { createAttachmentsRouter } from "./routes/attachments.js";
import { createAuthRouter } from "./routes/auth.js";
import { createCommentsRouter } from "./routes/comments.js";
import { createHealthRouter } from "./routes/health.js";
import { sendError } from "./routes/helpers.js";
import { createNotificationsRouter } from "./routes/notifications.js";
import { createTasksRouter } from "./routes/tasks.js";
import { createTeamsRouter } from "./routes/teams.js";
import { createUsersRouter } from "./routes/users.js";
import type { Services } from "./services.js";

export interface AppOptions {
  allowedOrigins: string[];
  maxUploadBytes: number;
  /** Uploads per client per hour (default: 100) */
  uploadsPerHour?: number;
}

/** The Express app without a listening server, so tests can drive it with supertest. */
export function createApp(services: Services, options: AppOptions): Express {
  const app = express();

  app.use(
    cors({
      origin: options.allowedOrigins,
      credentials: true,
    })
  );
  // Explicit body size limit; attachments go through multer, not this parser.
  app.use(express.json({ limit: "1mb" }));
  app.use(createAuthMiddleware(services.users));

  // ---- HTTP rate limiting ----
  const generalLimiter = rateLimit({
    windowMs: 15 * 60 * 1000,
    max: 1000,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: "Too many requests — please slow down" },
  });

  app.use("/api/health", createHealthRouter());
  app.use("/api/auth", createAuthRouter(services.users));
  app.use("/api/users", createUsersRouter(services.users));
  app.use("/api/teams", generalLimiter, createTeamsRouter(services.teams));
  app.use("/api/tasks", generalLimiter, createTasksRouter(services.tasks, services.comments));
  app.use("/api/comments", generalLimiter, createCommentsRouter(services.comments));
  app.use(
    "/api/attachments",
    generalLimiter,
    createAttachmentsRouter(services.attachments, options.maxUploadBytes, options.uploadsPerHour)
  );
  app.use("/api/notifications", generalLimiter, createNotificationsRouter(services.ledger));

  app.use("/api", (_req, res) => {
    res.status(404).json({ error: "Not found" });
  });

  // Malformed JSON bodies and anything else that escapes a route.
  app.use((err: unknown, _req: express.Request, res: express.Response, next: express.NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: "Malformed JSON body" });
      return;
    }
    sendError(res, "teamboard", err);
  });

  return app;
}
