import { Router } from "express";
import rateLimit from "express-rate-limit";
import { toPublicUser } from "../db/schema.js";
import type { UserService } from "../users/service.js";
import { handle } from "./helpers.js";

/**
 * POST /api/users  { username, email }
 *   Registers an account. The API token is returned once, in this response.
 */
export function createUsersRouter(users: UserService): Router {
  const router = Router();

  const registerRateLimiter = rateLimit({
    windowMs: 60 * 60 * 1000,
    max: 20,
    standardHeaders: "draft-7",
    legacyHeaders: false,
    message: { error: "Too many registrations from this address — try again later" },
  });

  router.post(
    "/",
    registerRateLimiter,
    handle("users", (req, res) => {
      const { user, token } = users.register(req.body);
      res.status(201).json({ user: toPublicUser(user), token });
    })
  );

  return router;
}
