import fs from "fs";
import path from "path";
import { z } from "zod";
import {
  ActivityLogEntrySchema,
  AttachmentSchema,
  CommentSchema,
  GrantSchema,
  MembershipSchema,
  NotificationSchema,
  TaskSchema,
  TeamSchema,
  UserSchema,
  emptyTables,
  type Tables,
} from "./schema.js";

/**
 * Parse one table from the raw document. Per-row isolation: an invalid row is
 * skipped and logged, the rest of the table still loads.
 */
function parseRows<T>(table: string, schema: z.ZodSchema<T>, raw: unknown): T[] {
  if (raw === undefined) return [];
  if (!Array.isArray(raw)) {
    console.error(`[db] ⚠️  Table "${table}" is not an array — starting it empty`);
    return [];
  }

  const rows: T[] = [];
  for (let i = 0; i < raw.length; i++) {
    const result = schema.safeParse(raw[i]);
    if (result.success) {
      rows.push(result.data);
    } else {
      console.error(`[db] ⚠️  Skipping invalid row ${i} in "${table}":`);
      for (const issue of result.error.issues) {
        console.error(`  • path: [${issue.path.join(".")}] — ${issue.message}`);
      }
    }
  }
  return rows;
}

const DocumentSchema = z.record(z.unknown());

/**
 * Every table of the application in one JSON document, kept in memory and
 * written to disk atomically after each committed transaction.
 *
 * Without a file path the database lives in memory only (tests, scratch use).
 *
 * All writes go through transaction(). The callback runs synchronously, so no
 * other request can observe a half-applied change; if it throws, every table
 * is restored to its state before the call.
 */
export class Database {
  private filePath: string | null;
  private data: Tables = emptyTables();
  private depth = 0;

  constructor(filePath: string | null = null) {
    this.filePath = filePath;
    if (filePath) this.load();
  }

  /** Live tables. Read freely; mutate only inside transaction(). */
  get tables(): Tables {
    return this.data;
  }

  transaction<T>(fn: (tables: Tables) => T): T {
    // Nested calls join the outer transaction and commit with it.
    if (this.depth > 0) return fn(this.data);

    const snapshot = structuredClone(this.data);
    this.depth++;
    try {
      const result = fn(this.data);
      if (result instanceof Promise) {
        throw new Error("transaction callbacks must be synchronous");
      }
      this.depth--;
      this.save();
      return result;
    } catch (err) {
      this.depth = 0;
      Object.assign(this.data, snapshot);
      throw err;
    }
  }

  private load(): void {
    if (!this.filePath || !fs.existsSync(this.filePath)) return;

    try {
      const doc = DocumentSchema.parse(JSON.parse(fs.readFileSync(this.filePath, "utf-8")));
      this.data = {
        users: parseRows("users", UserSchema, doc.users),
        teams: parseRows("teams", TeamSchema, doc.teams),
        memberships: parseRows("memberships", MembershipSchema, doc.memberships),
        tasks: parseRows("tasks", TaskSchema, doc.tasks),
        comments: parseRows("comments", CommentSchema, doc.comments),
        attachments: parseRows("attachments", AttachmentSchema, doc.attachments),
        notifications: parseRows("notifications", NotificationSchema, doc.notifications),
        activity: parseRows("activity", ActivityLogEntrySchema, doc.activity),
        grants: parseRows("grants", GrantSchema, doc.grants),
      };
      console.log(
        `[db] Loaded ${this.filePath} (${this.data.users.length} users, ${this.data.teams.length} teams, ${this.data.tasks.length} tasks)`
      );
    } catch (err) {
      console.error(`[db] ⚠️  STARTUP FAILURE — could not parse ${this.filePath}:`, err);
      this.data = emptyTables();
    }
  }

  private save(): void {
    if (!this.filePath) return;
    try {
      const dir = path.dirname(this.filePath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
      // Atomic write: write to temp file, then rename
      const tmp = this.filePath + ".tmp";
      fs.writeFileSync(tmp, JSON.stringify(this.data, null, 2), "utf-8");
      fs.renameSync(tmp, this.filePath);
    } catch (err) {
      console.error("[db] Failed to save database file:", err);
    }
  }
}
