import { Database } from "../db/database.js";
import type { User } from "../db/schema.js";
import type { EmailTransport } from "../notifications/email.js";
import { createServices, type Services } from "../services.js";
import type { FileStorage } from "../storage/files.js";
import type { Clock } from "../utils/clock.js";

export const START = "2030-01-15T09:00:00.000Z";

/** A clock that only moves when told to. */
export class ManualClock {
  private current: number;

  constructor(start: string = START) {
    this.current = Date.parse(start);
  }

  readonly now: Clock = () => new Date(this.current);

  advance(ms: number): void {
    this.current += ms;
  }
}

export interface SentEmail {
  to: string;
  subject: string;
  body: string;
}

/** Keeps every accepted message; can be told to reject or throw. */
export class RecordingTransport implements EmailTransport {
  sent: SentEmail[] = [];
  attempts = 0;
  mode: "accept" | "reject" | "throw" = "accept";

  async send(to: string, subject: string, body: string): Promise<boolean> {
    this.attempts++;
    if (this.mode === "throw") throw new Error("SMTP connection refused");
    if (this.mode === "reject") return false;
    this.sent.push({ to, subject, body });
    return true;
  }

  to(email: string): SentEmail[] {
    return this.sent.filter((m) => m.to === email);
  }
}

export class MemoryFileStorage implements FileStorage {
  files = new Map<string, Buffer>();
  private counter = 0;

  save(data: Buffer, originalName: string): string {
    this.counter++;
    const storedName = `file-${this.counter}-${originalName}`;
    this.files.set(storedName, Buffer.from(data));
    return storedName;
  }

  read(storedName: string): Buffer {
    const data = this.files.get(storedName);
    if (!data) throw new Error(`ENOENT: ${storedName}`);
    return data;
  }

  remove(storedName: string): void {
    this.files.delete(storedName);
  }
}

export interface World {
  services: Services;
  db: Database;
  clock: ManualClock;
  transport: RecordingTransport;
  files: MemoryFileStorage;
}

export function createWorld(maxUploadBytes = 1024): World {
  const db = new Database();
  const clock = new ManualClock();
  const transport = new RecordingTransport();
  const files = new MemoryFileStorage();
  const services = createServices({ db, transport, files, maxUploadBytes, clock: clock.now });
  return { services, db, clock, transport, files };
}

/** Register `username` with the address `<username>@example.com`. */
export function register(world: World, username: string): { user: User; token: string } {
  return world.services.users.register({ username, email: `${username}@example.com` });
}
