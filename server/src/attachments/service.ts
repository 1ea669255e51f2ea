import path from "path";
import { v4 as uuidv4 } from "uuid";
import type { ActivityLog } from "../activity/log.js";
import type { Database } from "../db/database.js";
import type { Attachment, ContentRef, Task } from "../db/schema.js";
import { AccessDeniedError, NotFoundError, ValidationError } from "../errors.js";
import type { PermissionStore } from "../permissions/store.js";
import { removeStoredFiles, type FileStorage } from "../storage/files.js";
import { systemClock, type Clock } from "../utils/clock.js";

export interface UploadedFile {
  originalName: string;
  data: Buffer;
}

export interface AttachmentServiceDeps {
  db: Database;
  permissions: PermissionStore;
  activity: ActivityLog;
  files: FileStorage;
  maxUploadBytes: number;
  clock?: Clock;
}

/** Files attached to a task or to a comment on one. Access follows the owning task. */
export class AttachmentService {
  private db: Database;
  private permissions: PermissionStore;
  private activity: ActivityLog;
  private files: FileStorage;
  private maxUploadBytes: number;
  private clock: Clock;

  constructor(deps: AttachmentServiceDeps) {
    this.db = deps.db;
    this.permissions = deps.permissions;
    this.activity = deps.activity;
    this.files = deps.files;
    this.maxUploadBytes = deps.maxUploadBytes;
    this.clock = deps.clock ?? systemClock;
  }

  upload(actorId: string, target: ContentRef, file: UploadedFile): Attachment {
    const task = this.owningTask(target);
    this.requireView(actorId, task);

    const filename = path.basename(file.originalName.replace(/\\/g, "/")).trim();
    if (!filename) throw new ValidationError("A file name is required.");
    if (file.data.length === 0) throw new ValidationError("The uploaded file is empty.");
    if (file.data.length > this.maxUploadBytes) {
      throw new ValidationError(`File exceeds the ${this.maxUploadBytes} byte upload limit.`);
    }

    const storedName = this.files.save(file.data, filename);
    const attachment: Attachment = {
      id: uuidv4(),
      target: { kind: target.kind, id: target.id },
      filename,
      storedName,
      size: file.data.length,
      uploadedBy: actorId,
      uploadedAt: this.clock().toISOString(),
    };
    try {
      this.db.transaction((t) => {
        t.attachments.push(attachment);
        this.activity.record(task.id, actorId, "file_uploaded", `Uploaded ${filename}`);
      });
    } catch (err) {
      removeStoredFiles(this.files, [attachment]);
      throw err;
    }
    return attachment;
  }

  get(actorId: string, attachmentId: string): { attachment: Attachment; data: Buffer } {
    const attachment = this.requireAttachment(attachmentId);
    this.requireView(actorId, this.owningTask(attachment.target));
    return { attachment, data: this.files.read(attachment.storedName) };
  }

  listFor(actorId: string, target: ContentRef): Attachment[] {
    this.requireView(actorId, this.owningTask(target));
    return this.db.tables.attachments.filter(
      (a) => a.target.kind === target.kind && a.target.id === target.id
    );
  }

  /** Allowed for the uploader and owners of the task's team, while they can see the task. */
  delete(actorId: string, attachmentId: string): void {
    const attachment = this.requireAttachment(attachmentId);
    const task = this.owningTask(attachment.target);
    this.requireView(actorId, task);
    const isOwner = this.db.tables.memberships.some(
      (m) => m.teamId === task.teamId && m.userId === actorId && m.role === "OWNER"
    );
    if (attachment.uploadedBy !== actorId && !isOwner) {
      throw new AccessDeniedError("You do not have permission to delete this attachment.");
    }

    this.db.transaction((t) => {
      t.attachments = t.attachments.filter((a) => a.id !== attachment.id);
    });
    removeStoredFiles(this.files, [attachment]);
  }

  private requireAttachment(attachmentId: string): Attachment {
    const attachment = this.db.tables.attachments.find((a) => a.id === attachmentId);
    if (!attachment) throw new NotFoundError("Attachment");
    return attachment;
  }

  private owningTask(target: ContentRef): Task {
    let taskId = target.id;
    if (target.kind === "comment") {
      const comment = this.db.tables.comments.find((c) => c.id === target.id);
      if (!comment) throw new NotFoundError("Comment");
      taskId = comment.taskId;
    }
    const task = this.db.tables.tasks.find((t) => t.id === taskId);
    if (!task) throw new NotFoundError("Task");
    return task;
  }

  private requireView(actorId: string, task: Task): void {
    if (!this.permissions.check(actorId, { kind: "task", id: task.id }, "view")) {
      throw new AccessDeniedError("You do not have permission to access this task.");
    }
  }
}
