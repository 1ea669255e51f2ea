import { Router, type RequestHandler } from "express";
import multer from "multer";
import rateLimit from "express-rate-limit";
import { requireUser } from "../auth.js";
import type { AttachmentService } from "../attachments/service.js";
import { ContentRefSchema } from "../db/schema.js";
import { ValidationError } from "../errors.js";
import { parseInput } from "../utils/validate.js";
import { handle, param, sendError } from "./helpers.js";

/**
 * multer's single-file middleware with its errors answered as JSON instead of
 * falling through to Express's default HTML error page.
 */
function singleFile(maxUploadBytes: number): RequestHandler {
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: maxUploadBytes, files: 1 },
  }).single("file");

  return (req, res, next) => {
    upload(req, res, (err: unknown) => {
      if (err instanceof multer.MulterError) {
        const message =
          err.code === "LIMIT_FILE_SIZE"
            ? `File exceeds the ${maxUploadBytes} byte upload limit.`
            : `Upload rejected: ${err.message}`;
        sendError(res, "attachments", new ValidationError(message));
        return;
      }
      if (err) {
        sendError(res, "attachments", err);
        return;
      }
      next();
    });
  };
}

/**
 * POST   /api/attachments/:kind/:id   multipart field `file`; kind is task | comment
 * GET    /api/attachments/:kind/:id   attachments on a task or comment
 * GET    /api/attachments/:id         the file body
 * DELETE /api/attachments/:id
 */
export function createAttachmentsRouter(
  attachments: AttachmentService,
  maxUploadBytes: number,
  uploadsPerHour = 100
): Router {
  const router = Router();

  // Counts uploads only; listings and downloads fall under the general limiter.
  const uploadLimiter = rateLimit({
    windowMs: 60 * 60 * 1000,
    max: uploadsPerHour,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: "Upload limit reached — try again later" },
  });

  router.post(
    "/:kind/:id",
    uploadLimiter,
    singleFile(maxUploadBytes),
    handle("attachments", (req, res) => {
      const target = parseInput(ContentRefSchema, { kind: param(req, "kind"), id: param(req, "id") });
      if (!req.file) throw new ValidationError("No file provided (expected multipart field \"file\").");
      const attachment = attachments.upload(requireUser(req).id, target, {
        originalName: req.file.originalname,
        data: req.file.buffer,
      });
      res.status(201).json(attachment);
    })
  );

  router.get(
    "/:kind/:id",
    handle("attachments", (req, res) => {
      const target = parseInput(ContentRefSchema, { kind: param(req, "kind"), id: param(req, "id") });
      res.json(attachments.listFor(requireUser(req).id, target));
    })
  );

  router.get(
    "/:id",
    handle("attachments", (req, res) => {
      const { attachment, data } = attachments.get(requireUser(req).id, param(req, "id"));
      res.attachment(attachment.filename);
      res.send(data);
    })
  );

  router.delete(
    "/:id",
    handle("attachments", (req, res) => {
      attachments.delete(requireUser(req).id, param(req, "id"));
      res.json({ ok: true });
    })
  );

  return router;
}
