import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import type { ActivityLog } from "../activity/log.js";
import type { Database } from "../db/database.js";
import { deleteTaskRows } from "../db/cascade.js";
import { TaskStatusSchema, type ActivityLogEntry, type Permission, type Task, type Team } from "../db/schema.js";
import { AccessDeniedError, NotFoundError, ValidationError } from "../errors.js";
import type { NotificationDispatcher } from "../notifications/dispatcher.js";
import { extractMentions, parseMentions } from "../notifications/mentions.js";
import type { PermissionStore } from "../permissions/store.js";
import { removeStoredFiles, type FileStorage } from "../storage/files.js";
import { systemClock, type Clock } from "../utils/clock.js";
import { parseInput } from "../utils/validate.js";

const DeadlineSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "deadline must be a YYYY-MM-DD date")
  .refine((value) => {
    // Date.parse rolls impossible days over (2030-02-31 becomes March 3rd), so compare the round trip.
    const parsed = new Date(`${value}T00:00:00Z`);
    return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
  }, "deadline is not a valid date");

const TitleSchema = z
  .string()
  .trim()
  .min(3, "Task title must be at least 3 characters long.")
  .max(200, "Task title must not exceed 200 characters.");

const DescriptionSchema = z.string().trim().max(5000, "Task description must not exceed 5000 characters.");

export const TaskCreateSchema = z.object({
  teamId: z.string().min(1, "teamId is required"),
  title: TitleSchema,
  description: DescriptionSchema.default(""),
  status: TaskStatusSchema.default("TODO"),
  deadline: DeadlineSchema.nullable().default(null),
  assigneeId: z.string().min(1).nullable().default(null),
});

export const TaskPatchSchema = z.object({
  title: TitleSchema.optional(),
  description: DescriptionSchema.optional(),
  status: TaskStatusSchema.optional(),
  deadline: DeadlineSchema.nullable().optional(),
  assigneeId: z.string().min(1).nullable().optional(),
});

export const TaskFilterSchema = z.object({
  teamId: z.string().optional(),
  status: TaskStatusSchema.optional(),
});

export type TaskCreateInput = z.input<typeof TaskCreateSchema>;
export type TaskPatch = z.input<typeof TaskPatchSchema>;
export type TaskFilter = z.input<typeof TaskFilterSchema>;

export interface TaskServiceDeps {
  db: Database;
  permissions: PermissionStore;
  activity: ActivityLog;
  dispatcher: NotificationDispatcher;
  files: FileStorage;
  clock?: Clock;
}

/**
 * Tasks: permission checks, validation, the activity trail, and assignment /
 * mention notifications. Notifications go out after the write commits; a
 * failing email never fails the mutation.
 */
export class TaskService {
  private db: Database;
  private permissions: PermissionStore;
  private activity: ActivityLog;
  private dispatcher: NotificationDispatcher;
  private files: FileStorage;
  private clock: Clock;

  constructor(deps: TaskServiceDeps) {
    this.db = deps.db;
    this.permissions = deps.permissions;
    this.activity = deps.activity;
    this.dispatcher = deps.dispatcher;
    this.files = deps.files;
    this.clock = deps.clock ?? systemClock;
  }

  async create(actorId: string, input: TaskCreateInput): Promise<Task> {
    const data = parseInput(TaskCreateSchema, input);
    const team = this.db.tables.teams.find((t) => t.id === data.teamId);
    if (!team) throw new NotFoundError("Team");
    if (!this.permissions.check(actorId, { kind: "team", id: team.id }, "view")) {
      throw new AccessDeniedError("You must be a member of this team to create tasks.");
    }
    this.assertAssignable(team, data.assigneeId);

    const now = this.clock();
    if (data.deadline && data.deadline < now.toISOString().slice(0, 10)) {
      throw new ValidationError("Deadline cannot be in the past.");
    }

    const task: Task = {
      id: uuidv4(),
      teamId: team.id,
      title: data.title,
      description: data.description,
      status: data.status,
      deadline: data.deadline,
      assigneeId: data.assigneeId,
      createdBy: actorId,
      createdAt: now.toISOString(),
      updatedAt: now.toISOString(),
    };

    this.db.transaction((t) => {
      t.tasks.push(task);
      this.permissions.applyTaskCreated(task);
      this.activity.record(task.id, actorId, "task_created", `Created "${task.title}"`);
    });

    if (task.assigneeId) await this.notifyAssignment(task, actorId);
    await this.notifyMentions(task, actorId, task.description);
    return task;
  }

  get(actorId: string, taskId: string): Task {
    return this.requireTask(actorId, taskId, "view", "You do not have permission to view this task.");
  }

  /** Tasks the actor can view, newest first. */
  list(actorId: string, filter: TaskFilter = {}): Task[] {
    const { teamId, status } = parseInput(TaskFilterSchema, filter);
    return this.db.tables.tasks
      .filter((task) => teamId === undefined || task.teamId === teamId)
      .filter((task) => status === undefined || task.status === status)
      .filter((task) => this.permissions.check(actorId, { kind: "task", id: task.id }, "view"))
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt));
  }

  async update(actorId: string, taskId: string, patch: TaskPatch): Promise<Task> {
    const task = this.requireTask(actorId, taskId, "change", "You do not have permission to edit this task.");
    const data = parseInput(TaskPatchSchema, patch);
    const team = this.db.tables.teams.find((t) => t.id === task.teamId);
    if (!team) throw new NotFoundError("Team");
    if (data.assigneeId !== undefined) this.assertAssignable(team, data.assigneeId);

    const previous = { ...task };
    const changedFields: string[] = [];

    this.db.transaction(() => {
      if (data.title !== undefined && data.title !== task.title) {
        task.title = data.title;
        changedFields.push("title");
      }
      if (data.description !== undefined && data.description !== task.description) {
        task.description = data.description;
        changedFields.push("description");
      }
      if (data.deadline !== undefined && data.deadline !== task.deadline) {
        task.deadline = data.deadline;
        changedFields.push("deadline");
      }
      if (data.status !== undefined && data.status !== task.status) {
        task.status = data.status;
        this.activity.record(task.id, actorId, "status_changed", `${previous.status} → ${task.status}`);
      }
      if (data.assigneeId !== undefined && data.assigneeId !== task.assigneeId) {
        task.assigneeId = data.assigneeId;
        this.activity.record(
          task.id,
          actorId,
          "assignment_changed",
          `${this.displayName(previous.assigneeId)} → ${this.displayName(task.assigneeId)}`
        );
      }
      if (changedFields.length > 0) {
        this.activity.record(task.id, actorId, "task_updated", `Changed ${changedFields.join(", ")}`);
      }
      const touched =
        changedFields.length > 0 || task.status !== previous.status || task.assigneeId !== previous.assigneeId;
      if (touched) task.updatedAt = this.clock().toISOString();
    });

    if (task.assigneeId && task.assigneeId !== previous.assigneeId) {
      await this.notifyAssignment(task, actorId);
    }
    if (task.description !== previous.description) {
      await this.notifyMentions(task, actorId, task.description, new Set(extractMentions(previous.description)));
    }
    return task;
  }

  /** Delete a task with its comments, activity log and attachments. */
  delete(actorId: string, taskId: string): void {
    const task = this.requireTask(actorId, taskId, "delete", "You do not have permission to delete this task.");
    const removed = this.db.transaction((t) => deleteTaskRows(t, task.id));
    removeStoredFiles(this.files, removed);
    console.log(`[tasks] Deleted "${task.title}" (${task.id})`);
  }

  activityFor(actorId: string, taskId: string): ActivityLogEntry[] {
    const task = this.requireTask(actorId, taskId, "view", "You do not have permission to view this task.");
    return this.activity.listForTask(task.id);
  }

  private requireTask(actorId: string, taskId: string, permission: Permission, message: string): Task {
    const task = this.db.tables.tasks.find((t) => t.id === taskId);
    if (!task) throw new NotFoundError("Task");
    if (!this.permissions.check(actorId, { kind: "task", id: task.id }, permission)) {
      throw new AccessDeniedError(message);
    }
    return task;
  }

  private assertAssignable(team: Team, assigneeId: string | null): void {
    if (assigneeId === null) return;
    const isMember = this.db.tables.memberships.some((m) => m.teamId === team.id && m.userId === assigneeId);
    if (!isMember) {
      throw new ValidationError("The assigned user must be a member of the selected team.");
    }
  }

  private displayName(userId: string | null): string {
    if (userId === null) return "unassigned";
    return this.db.tables.users.find((u) => u.id === userId)?.username ?? "unknown user";
  }

  private async notifyAssignment(task: Task, actorId: string): Promise<void> {
    // Assigning a task to yourself is not news.
    if (!task.assigneeId || task.assigneeId === actorId) return;
    await this.dispatcher.notify({
      recipientId: task.assigneeId,
      senderId: actorId,
      kind: "assignment",
      related: { kind: "task", id: task.id },
      message: `${this.displayName(actorId)} assigned you to task '${task.title}'`,
    });
  }

  /**
   * Notify team members mentioned in `text`, except the actor and anyone whose
   * username is in `alreadyMentioned`.
   */
  private async notifyMentions(
    task: Task,
    actorId: string,
    text: string,
    alreadyMentioned: ReadonlySet<string> = new Set()
  ): Promise<void> {
    for (const user of parseMentions(this.db, text, task.teamId)) {
      if (user.id === actorId || alreadyMentioned.has(user.username)) continue;
      await this.dispatcher.notify({
        recipientId: user.id,
        senderId: actorId,
        kind: "mention",
        related: { kind: "task", id: task.id },
        message: `${this.displayName(actorId)} mentioned you in task '${task.title}'`,
      });
    }
  }
}
