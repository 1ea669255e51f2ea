import { v4 as uuidv4 } from "uuid";
import type { Database } from "../db/database.js";
import type { ActivityAction, ActivityLogEntry } from "../db/schema.js";
import { systemClock, type Clock } from "../utils/clock.js";

/**
 * Append-only audit trail per task. Entries are never edited; they go away
 * only when their task is deleted (see db/cascade.ts).
 */
export class ActivityLog {
  private db: Database;
  private clock: Clock;

  constructor(db: Database, clock: Clock = systemClock) {
    this.db = db;
    this.clock = clock;
  }

  record(taskId: string, actorId: string, action: ActivityAction, detail = ""): ActivityLogEntry {
    const entry: ActivityLogEntry = {
      id: uuidv4(),
      taskId,
      actorId,
      action,
      detail,
      timestamp: this.clock().toISOString(),
    };
    this.db.transaction((t) => {
      t.activity.push(entry);
    });
    return entry;
  }

  /** Entries for a task, oldest first. */
  listForTask(taskId: string): ActivityLogEntry[] {
    return this.db.tables.activity
      .filter((e) => e.taskId === taskId)
      .sort((a, b) => a.timestamp.localeCompare(b.timestamp));
  }
}
