import { z } from "zod";

// Zod schemas validate every row read from disk. A row that fails is
// skipped and logged by Database.load(); the rest of its table survives.

export const ROLES = ["OWNER", "MEMBER"] as const;
export const TASK_STATUSES = ["TODO", "IN_PROGRESS", "REVIEW", "DONE"] as const;
export const NOTIFICATION_KINDS = ["mention", "assignment", "reply"] as const;
export const PERMISSIONS = ["view", "change", "delete", "manage_members"] as const;
export const ACTIVITY_ACTIONS = [
  "task_created",
  "task_updated",
  "status_changed",
  "assignment_changed",
  "comment_added",
  "file_uploaded",
] as const;

export const RoleSchema = z.enum(ROLES);
export const TaskStatusSchema = z.enum(TASK_STATUSES);
export const NotificationKindSchema = z.enum(NOTIFICATION_KINDS);
export const PermissionSchema = z.enum(PERMISSIONS);
export const ActivityActionSchema = z.enum(ACTIVITY_ACTIONS);

/** Object a permission is granted on. */
export const GrantTargetSchema = z.object({
  kind: z.enum(["team", "task"]),
  id: z.string(),
});

/** Object a notification or attachment points at. */
export const ContentRefSchema = z.object({
  kind: z.enum(["task", "comment"]),
  id: z.string(),
});

export const UserSchema = z.object({
  id: z.string(),
  username: z.string(),
  email: z.string(),
  tokenHash: z.string(),
  createdAt: z.string(),
});

export const TeamSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string(),
  createdBy: z.string(),
  createdAt: z.string(),
});

export const MembershipSchema = z.object({
  id: z.string(),
  teamId: z.string(),
  userId: z.string(),
  role: RoleSchema,
  joinedAt: z.string(),
});

export const TaskSchema = z.object({
  id: z.string(),
  teamId: z.string(),
  title: z.string(),
  description: z.string(),
  status: TaskStatusSchema,
  deadline: z.string().nullable(),
  assigneeId: z.string().nullable(),
  createdBy: z.string(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

export const CommentSchema = z.object({
  id: z.string(),
  taskId: z.string(),
  authorId: z.string(),
  content: z.string(),
  parentId: z.string().nullable(),
  createdAt: z.string(),
});

export const AttachmentSchema = z.object({
  id: z.string(),
  target: ContentRefSchema,
  filename: z.string(),
  storedName: z.string(),
  size: z.number().int().nonnegative(),
  uploadedBy: z.string(),
  uploadedAt: z.string(),
});

export const NotificationSchema = z.object({
  id: z.string(),
  recipientId: z.string(),
  senderId: z.string(),
  kind: NotificationKindSchema,
  related: ContentRefSchema,
  message: z.string(),
  read: z.boolean(),
  createdAt: z.string(),
});

export const ActivityLogEntrySchema = z.object({
  id: z.string(),
  taskId: z.string(),
  actorId: z.string(),
  action: ActivityActionSchema,
  detail: z.string(),
  timestamp: z.string(),
});

export const GrantSchema = z.object({
  userId: z.string(),
  target: GrantTargetSchema,
  permission: PermissionSchema,
});

export type Role = z.infer<typeof RoleSchema>;
export type TaskStatus = z.infer<typeof TaskStatusSchema>;
export type NotificationKind = z.infer<typeof NotificationKindSchema>;
export type Permission = z.infer<typeof PermissionSchema>;
export type ActivityAction = z.infer<typeof ActivityActionSchema>;
export type GrantTarget = z.infer<typeof GrantTargetSchema>;
export type ContentRef = z.infer<typeof ContentRefSchema>;

export type User = z.infer<typeof UserSchema>;
export type Team = z.infer<typeof TeamSchema>;
export type Membership = z.infer<typeof MembershipSchema>;
export type Task = z.infer<typeof TaskSchema>;
export type Comment = z.infer<typeof CommentSchema>;
export type Attachment = z.infer<typeof AttachmentSchema>;
export type Notification = z.infer<typeof NotificationSchema>;
export type ActivityLogEntry = z.infer<typeof ActivityLogEntrySchema>;
export type Grant = z.infer<typeof GrantSchema>;

export interface Tables {
  users: User[];
  teams: Team[];
  memberships: Membership[];
  tasks: Task[];
  comments: Comment[];
  attachments: Attachment[];
  notifications: Notification[];
  activity: ActivityLogEntry[];
  grants: Grant[];
}

export function emptyTables(): Tables {
  return {
    users: [],
    teams: [],
    memberships: [],
    tasks: [],
    comments: [],
    attachments: [],
    notifications: [],
    activity: [],
    grants: [],
  };
}

/** A user as exposed over the API: no token hash. */
export type PublicUser = Pick<User, "id" | "username" | "email">;

export function toPublicUser(user: User): PublicUser {
  return { id: user.id, username: user.username, email: user.email };
}
