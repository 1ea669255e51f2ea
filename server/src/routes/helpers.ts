import type { NextFunction, Request, RequestHandler, Response } from "express";
import { AppError } from "../errors.js";

/** Answer `err` as `{ error }` JSON: AppErrors with their own status, anything else as 500. */
export function sendError(res: Response, scope: string, err: unknown): void {
  if (err instanceof AppError) {
    res.status(err.status).json({ error: err.message });
    return;
  }
  console.error(`[${scope}] Unhandled error:`, err);
  res.status(500).json({ error: "Internal server error" });
}

/**
 * Wrap a route body so thrown errors and rejected promises both reach
 * sendError(). Express 4 does not catch async handler rejections itself.
 */
export function handle(
  scope: string,
  fn: (req: Request, res: Response) => void | Promise<void>
): RequestHandler {
  return (req: Request, res: Response, _next: NextFunction) => {
    Promise.resolve()
      .then(() => fn(req, res))
      .catch((err: unknown) => sendError(res, scope, err));
  };
}

/** A route param Express guarantees for the matched path. */
export function param(req: Request, name: string): string {
  return req.params[name] ?? "";
}
