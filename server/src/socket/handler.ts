import type { Server, Socket } from "socket.io";
import { parse as parseCookies } from "cookie";
import { COOKIE_NAME } from "../auth.js";
import type { Notification } from "../db/schema.js";
import type { NotificationPusher } from "../notifications/dispatcher.js";
import type { NotificationLedger } from "../notifications/ledger.js";
import type { UserService } from "../users/service.js";

// ---- Handshake rate limiter ----
// Failed auth attempts per IP. After HANDSHAKE_MAX_FAILURES within
// HANDSHAKE_WINDOW_MS, every handshake from that IP is refused until the
// window runs out.
const HANDSHAKE_MAX_FAILURES = 5;
const HANDSHAKE_WINDOW_MS = 60_000;

interface FailureEntry {
  count: number;
  windowStart: number;
}

export class HandshakeLimiter {
  private failures = new Map<string, FailureEntry>();
  private now: () => number;

  constructor(now: () => number = Date.now) {
    this.now = now;
  }

  isLimited(ip: string): boolean {
    const entry = this.failures.get(ip);
    if (!entry) return false;
    if (this.now() - entry.windowStart > HANDSHAKE_WINDOW_MS) {
      this.failures.delete(ip);
      return false;
    }
    return entry.count >= HANDSHAKE_MAX_FAILURES;
  }

  /** Addresses with failures in a window that has not yet run out. */
  get trackedAddresses(): number {
    return this.failures.size;
  }

  /** Record a failure and return the count in the current window. */
  recordFailure(ip: string): number {
    const now = this.now();
    this.prune(now);
    const entry = this.failures.get(ip);
    if (!entry || now - entry.windowStart > HANDSHAKE_WINDOW_MS) {
      this.failures.set(ip, { count: 1, windowStart: now });
      return 1;
    }
    entry.count++;
    return entry.count;
  }

  // Addresses that never come back would otherwise stay in the map.
  private prune(now: number): void {
    for (const [ip, entry] of this.failures) {
      if (now - entry.windowStart > HANDSHAKE_WINDOW_MS) this.failures.delete(ip);
    }
  }
}

export function userRoom(userId: string): string {
  return `user:${userId}`;
}

export type ServerToClientEvents = {
  "notification:new": (notification: Notification) => void;
  "notification:unread-count": (payload: { count: number }) => void;
};

export type ClientToServerEvents = Record<string, never>;
export type InterServerEvents = Record<string, never>;

export interface SocketData {
  userId: string;
}

export type TeamboardServer = Server<ClientToServerEvents, ServerToClientEvents, InterServerEvents, SocketData>;
type TeamboardSocket = Socket<ClientToServerEvents, ServerToClientEvents, InterServerEvents, SocketData>;

function handshakeToken(socket: TeamboardSocket): string | null {
  const auth: unknown = socket.handshake.auth;
  if (typeof auth === "object" && auth !== null && "token" in auth && typeof auth.token === "string" && auth.token) {
    return auth.token;
  }
  // Browsers send the httpOnly cookie on the upgrade request.
  const cookieToken = parseCookies(socket.handshake.headers.cookie ?? "")[COOKIE_NAME];
  return cookieToken || null;
}

function clientIp(socket: TeamboardSocket): string {
  const forwarded = socket.handshake.headers["x-forwarded-for"];
  const first = (Array.isArray(forwarded) ? forwarded[0] : forwarded)?.split(",")[0]?.trim();
  return first || socket.handshake.address || "unknown";
}

/**
 * Authenticate every socket by API token (handshake `auth.token` or the auth
 * cookie) and put it in its user's room, where notifications are pushed.
 */
export function setupSocketHandler(
  io: TeamboardServer,
  users: UserService,
  ledger: NotificationLedger,
  limiter: HandshakeLimiter = new HandshakeLimiter()
): void {
  io.use((socket, next) => {
    const ip = clientIp(socket);
    if (limiter.isLimited(ip)) {
      console.warn(`[socket] Rate limited handshake from ${ip}`);
      next(new Error("Too many authentication attempts — try again later"));
      return;
    }

    const token = handshakeToken(socket);
    const user = token ? users.authenticate(token) : null;
    if (!user) {
      const failures = limiter.recordFailure(ip);
      console.warn(
        `[socket] Auth failure from ${ip} (${failures}/${HANDSHAKE_MAX_FAILURES}, ${limiter.trackedAddresses} address(es) tracked)`
      );
      next(new Error("Authentication failed"));
      return;
    }

    socket.data.userId = user.id;
    next();
  });

  io.on("connection", (socket) => {
    const { userId } = socket.data;
    void socket.join(userRoom(userId));
    console.log(`[socket] connected: ${socket.id} (user ${userId})`);

    // Lets a reconnecting client resync its badge without an HTTP round-trip.
    socket.emit("notification:unread-count", { count: ledger.unreadCount(userId) });

    socket.on("disconnect", () => {
      console.log(`[socket] disconnected: ${socket.id}`);
    });
  });
}

/** Pushes each new notification to its recipient's room. */
export function createSocketPusher(io: TeamboardServer): NotificationPusher {
  return {
    push(notification: Notification): void {
      io.to(userRoom(notification.recipientId)).emit("notification:new", notification);
    },
  };
}
