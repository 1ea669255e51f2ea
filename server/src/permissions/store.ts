import type { Database } from "../db/database.js";
import type { Grant, GrantTarget, Permission, Role, Task } from "../db/schema.js";
import { taskPermissionsFor, teamPermissionsFor } from "./roles.js";

function sameTarget(a: GrantTarget, b: GrantTarget): boolean {
  return a.kind === b.kind && a.id === b.id;
}

function matches(grant: Grant, userId: string, target: GrantTarget): boolean {
  return grant.userId === userId && sameTarget(grant.target, target);
}

/**
 * Object-level permissions: (user, object, permission) → granted.
 *
 * Every write runs through Database.transaction(), so when a caller is
 * already inside a transaction (creating a membership, deleting a team) the
 * grant changes commit or roll back together with it.
 */
export class PermissionStore {
  private db: Database;

  constructor(db: Database) {
    this.db = db;
  }

  check(userId: string, target: GrantTarget, permission: Permission): boolean {
    return this.db.tables.grants.some(
      (g) => g.permission === permission && matches(g, userId, target)
    );
  }

  permissionsFor(userId: string, target: GrantTarget): Permission[] {
    return this.db.tables.grants
      .filter((g) => matches(g, userId, target))
      .map((g) => g.permission);
  }

  grant(userId: string, target: GrantTarget, permission: Permission): void {
    if (this.check(userId, target, permission)) return;
    this.db.transaction((t) => {
      t.grants.push({ userId, target: { ...target }, permission });
    });
  }

  revoke(userId: string, target: GrantTarget, permission: Permission): boolean {
    return this.db.transaction((t) => {
      const before = t.grants.length;
      t.grants = t.grants.filter((g) => !(g.permission === permission && matches(g, userId, target)));
      return t.grants.length < before;
    });
  }

  /** Remove every grant `userId` holds on `target`. Returns how many were removed. */
  revokeAll(userId: string, target: GrantTarget): number {
    return this.db.transaction((t) => {
      const before = t.grants.length;
      t.grants = t.grants.filter((g) => !matches(g, userId, target));
      return before - t.grants.length;
    });
  }

  /** Make the user's grants on `target` exactly `permissions`, in one step. */
  replace(userId: string, target: GrantTarget, permissions: readonly Permission[]): void {
    this.db.transaction((t) => {
      t.grants = t.grants.filter((g) => !matches(g, userId, target));
      for (const permission of new Set(permissions)) {
        t.grants.push({ userId, target: { ...target }, permission });
      }
    });
  }

  /**
   * Bring a user's grants on a team and on all of its tasks in line with
   * their membership role. `null` means the membership is gone: every grant
   * on the team and its tasks is revoked.
   */
  applyMembership(userId: string, teamId: string, role: Role | null): void {
    this.db.transaction((t) => {
      const team: GrantTarget = { kind: "team", id: teamId };
      this.replace(userId, team, role ? teamPermissionsFor(role) : []);

      for (const task of t.tasks) {
        if (task.teamId !== teamId) continue;
        const target: GrantTarget = { kind: "task", id: task.id };
        this.replace(userId, target, role ? taskPermissionsFor(role, task.createdBy === userId) : []);
      }
    });
  }

  /** Grant task permissions to every current member of the task's team. */
  applyTaskCreated(task: Task): void {
    this.db.transaction((t) => {
      const target: GrantTarget = { kind: "task", id: task.id };
      for (const membership of t.memberships) {
        if (membership.teamId !== task.teamId) continue;
        const isCreator = membership.userId === task.createdBy;
        this.replace(membership.userId, target, taskPermissionsFor(membership.role, isCreator));
      }
    });
  }
}
