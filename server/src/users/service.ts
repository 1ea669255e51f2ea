import crypto from "crypto";
import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import type { Database } from "../db/database.js";
import type { User } from "../db/schema.js";
import { ConflictError } from "../errors.js";
import { systemClock, type Clock } from "../utils/clock.js";
import { parseInput } from "../utils/validate.js";

export const RegisterSchema = z.object({
  // Word characters only, so every username can be @mentioned.
  username: z
    .string()
    .trim()
    .min(3, "username must be at least 3 characters")
    .max(150, "username must not exceed 150 characters")
    .regex(/^\w+$/, "username may contain only letters, digits and underscores"),
  email: z.string().trim().email(),
});

export type RegisterInput = z.input<typeof RegisterSchema>;

function hashToken(token: string): string {
  return crypto.createHash("sha256").update(token).digest("hex");
}

/**
 * Accounts and API tokens. Only the sha256 of a token is stored; the token
 * itself is returned once, at registration.
 */
export class UserService {
  private db: Database;
  private clock: Clock;

  constructor(db: Database, clock: Clock = systemClock) {
    this.db = db;
    this.clock = clock;
  }

  register(input: RegisterInput): { user: User; token: string } {
    const { username, email } = parseInput(RegisterSchema, input);
    if (this.findByUsername(username)) {
      throw new ConflictError(`Username "${username}" is already taken`);
    }

    const token = crypto.randomBytes(32).toString("hex");
    const user: User = {
      id: uuidv4(),
      username,
      email,
      tokenHash: hashToken(token),
      createdAt: this.clock().toISOString(),
    };
    this.db.transaction((t) => {
      t.users.push(user);
    });
    console.log(`[users] Registered ${username}`);
    return { user, token };
  }

  /** The user owning `token`, or null. */
  authenticate(token: string): User | null {
    if (!token) return null;
    const digest = Buffer.from(hashToken(token), "hex");
    const user = this.db.tables.users.find((u) => {
      const stored = Buffer.from(u.tokenHash, "hex");
      return stored.length === digest.length && crypto.timingSafeEqual(stored, digest);
    });
    return user ?? null;
  }

  findByUsername(username: string): User | undefined {
    return this.db.tables.users.find((u) => u.username === username);
  }
}
