import { Router } from "express";
import rateLimit from "express-rate-limit";
import { z } from "zod";
import { clearAuthCookie, requireUser, setAuthCookie } from "../auth.js";
import { toPublicUser } from "../db/schema.js";
import { UnauthorizedError } from "../errors.js";
import type { UserService } from "../users/service.js";
import { parseInput } from "../utils/validate.js";
import { handle } from "./helpers.js";

const LoginSchema = z.object({
  token: z.string().trim().min(1, "token is required"),
});

/**
 * POST /api/auth/login  { token }
 *   Validates the token and sets it as an httpOnly cookie.
 *
 * POST /api/auth/logout
 *   Clears the cookie.
 *
 * GET  /api/auth/me
 *   The authenticated user (cookie or Bearer).
 */
export function createAuthRouter(users: UserService): Router {
  const router = Router();

  /**
   * Max 5 failed attempts per 15 minutes per IP. Successful logins are not
   * counted (skipSuccessfulRequests).
   */
  const loginRateLimiter = rateLimit({
    windowMs: 15 * 60 * 1000,
    max: 5,
    skipSuccessfulRequests: true,
    standardHeaders: "draft-7",
    legacyHeaders: false,
    message: { error: "Too many login attempts — try again in 15 minutes" },
  });

  router.post(
    "/login",
    loginRateLimiter,
    handle("auth", (req, res) => {
      const { token } = parseInput(LoginSchema, req.body);
      const user = users.authenticate(token);
      if (!user) throw new UnauthorizedError("Invalid token");
      setAuthCookie(res, token);
      res.json({ ok: true, user: toPublicUser(user) });
    })
  );

  router.post("/logout", (_req, res) => {
    clearAuthCookie(res);
    res.json({ ok: true });
  });

  router.get(
    "/me",
    handle("auth", (req, res) => {
      res.json(toPublicUser(requireUser(req)));
    })
  );

  return router;
}
