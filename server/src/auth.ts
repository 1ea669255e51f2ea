import type { Request, Response, NextFunction, RequestHandler } from "express";
import { parse as parseCookies } from "cookie";
import type { User } from "./db/schema.js";
import { UnauthorizedError } from "./errors.js";
import type { UserService } from "./users/service.js";

export const COOKIE_NAME = "teamboard-auth";

declare global {
  namespace Express {
    interface Request {
      /** Set by authMiddleware on every authenticated /api request. */
      user?: User;
    }
  }
}

const COOKIE_OPTIONS = {
  httpOnly: true,
  sameSite: "strict" as const,
  path: "/",
  maxAge: 24 * 60 * 60 * 1000,
  // No `secure` flag: set it when serving over HTTPS.
};

function isPublic(req: Request): boolean {
  if (!req.path.startsWith("/api/")) return true;
  if (req.method === "GET" && req.path === "/api/health") return true;
  if (req.path === "/api/auth/login" || req.path === "/api/auth/logout") return true;
  return req.method === "POST" && req.path === "/api/users";
}

/** Token from the httpOnly cookie, falling back to a Bearer header (CLI / direct API use). */
function tokenFromRequest(req: Request): string | null {
  const cookies = parseCookies(req.headers.cookie ?? "");
  const cookieToken = cookies[COOKIE_NAME];
  if (cookieToken) return cookieToken;

  const authHeader = req.headers.authorization;
  if (authHeader?.startsWith("Bearer ")) {
    const token = authHeader.slice(7).trim();
    if (token) return token;
  }
  return null;
}

/**
 * Resolves the calling user for every /api request except health, login/logout
 * and registration. Unknown or missing tokens get 401.
 */
export function createAuthMiddleware(users: UserService): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (isPublic(req)) {
      next();
      return;
    }

    const token = tokenFromRequest(req);
    const user = token ? users.authenticate(token) : null;
    if (!user) {
      res.status(401).json({ error: "Unauthorized" });
      return;
    }
    req.user = user;
    next();
  };
}

/** The authenticated user; throws when a route is reached without one. */
export function requireUser(req: Request): User {
  if (!req.user) throw new UnauthorizedError();
  return req.user;
}

export function setAuthCookie(res: Response, token: string): void {
  res.cookie(COOKIE_NAME, token, COOKIE_OPTIONS);
}

export function clearAuthCookie(res: Response): void {
  const { maxAge: _maxAge, ...options } = COOKIE_OPTIONS;
  res.clearCookie(COOKIE_NAME, options);
}
