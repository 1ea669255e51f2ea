import { ActivityLog } from "./activity/log.js";
import { AttachmentService } from "./attachments/service.js";
import { CommentService } from "./comments/service.js";
import type { Database } from "./db/database.js";
import type { EmailTransport } from "./notifications/email.js";
import { NotificationDispatcher, type NotificationPusher } from "./notifications/dispatcher.js";
import { NotificationLedger } from "./notifications/ledger.js";
import { PermissionStore } from "./permissions/store.js";
import type { FileStorage } from "./storage/files.js";
import { TaskService } from "./tasks/service.js";
import { TeamService } from "./teams/service.js";
import { UserService } from "./users/service.js";
import { systemClock, type Clock } from "./utils/clock.js";

export interface ServiceOptions {
  db: Database;
  transport: EmailTransport;
  files: FileStorage;
  maxUploadBytes: number;
  clock?: Clock;
  pusher?: NotificationPusher | null;
}

export interface Services {
  db: Database;
  users: UserService;
  teams: TeamService;
  tasks: TaskService;
  comments: CommentService;
  attachments: AttachmentService;
  permissions: PermissionStore;
  activity: ActivityLog;
  ledger: NotificationLedger;
  dispatcher: NotificationDispatcher;
}

/** Build every service over one database, sharing a clock and a dispatcher. */
export function createServices(options: ServiceOptions): Services {
  const { db, transport, files, maxUploadBytes } = options;
  const clock = options.clock ?? systemClock;

  const permissions = new PermissionStore(db);
  const activity = new ActivityLog(db, clock);
  const ledger = new NotificationLedger(db, clock);
  const dispatcher = new NotificationDispatcher({ db, ledger, transport, pusher: options.pusher, clock });

  return {
    db,
    users: new UserService(db, clock),
    teams: new TeamService(db, permissions, files, clock),
    tasks: new TaskService({ db, permissions, activity, dispatcher, files, clock }),
    comments: new CommentService({ db, permissions, activity, dispatcher, files, clock }),
    attachments: new AttachmentService({ db, permissions, activity, files, maxUploadBytes, clock }),
    permissions,
    activity,
    ledger,
    dispatcher,
  };
}
