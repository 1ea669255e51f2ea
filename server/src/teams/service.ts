import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import type { Database } from "../db/database.js";
import { deleteTeamRows } from "../db/cascade.js";
import {
  RoleSchema,
  toPublicUser,
  type Membership,
  type Permission,
  type PublicUser,
  type Role,
  type Team,
} from "../db/schema.js";
import { AccessDeniedError, ConflictError, NotFoundError } from "../errors.js";
import type { PermissionStore } from "../permissions/store.js";
import { removeStoredFiles, type FileStorage } from "../storage/files.js";
import { systemClock, type Clock } from "../utils/clock.js";
import { parseInput } from "../utils/validate.js";

export const TeamInputSchema = z.object({
  name: z.string().trim().min(1, "name is required").max(200),
  description: z.string().trim().max(2000).default(""),
});

export const TeamPatchSchema = z.object({
  name: z.string().trim().min(1, "name cannot be empty").max(200).optional(),
  description: z.string().trim().max(2000).optional(),
});

export const AddMemberSchema = z.object({
  username: z.string().trim().min(1, "username is required"),
  role: RoleSchema.default("MEMBER"),
});

export const ChangeRoleSchema = z.object({
  role: RoleSchema,
});

export type TeamInput = z.input<typeof TeamInputSchema>;
export type TeamPatch = z.input<typeof TeamPatchSchema>;
export type AddMemberInput = z.input<typeof AddMemberSchema>;
export type ChangeRoleInput = z.input<typeof ChangeRoleSchema>;

export interface MemberView {
  user: PublicUser;
  role: Role;
  joinedAt: string;
}

/**
 * Teams and memberships. Every membership change rewrites the member's grants
 * in the same transaction as the membership row, so a reader sees either the
 * old role's permissions or the new one's, never a mix or nothing.
 */
export class TeamService {
  private db: Database;
  private permissions: PermissionStore;
  private files: FileStorage;
  private clock: Clock;

  constructor(db: Database, permissions: PermissionStore, files: FileStorage, clock: Clock = systemClock) {
    this.db = db;
    this.permissions = permissions;
    this.files = files;
    this.clock = clock;
  }

  /** Create a team; the creator becomes its first OWNER. */
  create(actorId: string, input: TeamInput): Team {
    const { name, description } = parseInput(TeamInputSchema, input);
    const now = this.clock().toISOString();
    const team: Team = { id: uuidv4(), name, description, createdBy: actorId, createdAt: now };

    this.db.transaction((t) => {
      t.teams.push(team);
      t.memberships.push({ id: uuidv4(), teamId: team.id, userId: actorId, role: "OWNER", joinedAt: now });
      this.permissions.applyMembership(actorId, team.id, "OWNER");
    });
    console.log(`[teams] Created "${name}" (${team.id})`);
    return team;
  }

  get(actorId: string, teamId: string): Team {
    const team = this.requireTeam(teamId);
    this.requirePermission(actorId, teamId, "view", "You do not have permission to view this team.");
    return team;
  }

  /** Teams `userId` belongs to, newest first. */
  listForUser(userId: string): Team[] {
    const teamIds = new Set(
      this.db.tables.memberships.filter((m) => m.userId === userId).map((m) => m.teamId)
    );
    return this.db.tables.teams
      .filter((t) => teamIds.has(t.id))
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt));
  }

  update(actorId: string, teamId: string, patch: TeamPatch): Team {
    const team = this.requireTeam(teamId);
    this.requirePermission(actorId, teamId, "change", "You do not have permission to edit this team.");
    const data = parseInput(TeamPatchSchema, patch);

    this.db.transaction(() => {
      if (data.name !== undefined) team.name = data.name;
      if (data.description !== undefined) team.description = data.description;
    });
    return team;
  }

  /** Delete a team with its memberships, tasks and everything hanging off them. */
  delete(actorId: string, teamId: string): void {
    const team = this.requireTeam(teamId);
    this.requirePermission(actorId, teamId, "delete", "You do not have permission to delete this team.");

    const removed = this.db.transaction((t) => deleteTeamRows(t, teamId));
    removeStoredFiles(this.files, removed);
    console.log(`[teams] Deleted "${team.name}" (${teamId})`);
  }

  membership(teamId: string, userId: string): Membership | undefined {
    return this.db.tables.memberships.find((m) => m.teamId === teamId && m.userId === userId);
  }

  listMembers(actorId: string, teamId: string): MemberView[] {
    this.requireTeam(teamId);
    this.requirePermission(actorId, teamId, "view", "You do not have permission to view this team.");

    const members: MemberView[] = [];
    for (const m of this.db.tables.memberships) {
      if (m.teamId !== teamId) continue;
      const user = this.db.tables.users.find((u) => u.id === m.userId);
      if (user) members.push({ user: toPublicUser(user), role: m.role, joinedAt: m.joinedAt });
    }
    return members.sort((a, b) => a.joinedAt.localeCompare(b.joinedAt));
  }

  addMember(actorId: string, teamId: string, input: AddMemberInput): Membership {
    this.requireTeam(teamId);
    this.requireManager(actorId, teamId);
    const { username, role } = parseInput(AddMemberSchema, input);

    const user = this.db.tables.users.find((u) => u.username === username);
    if (!user) throw new NotFoundError(`User "${username}"`);
    if (this.membership(teamId, user.id)) {
      throw new ConflictError(`${username} is already a member of this team`);
    }

    const membership: Membership = {
      id: uuidv4(),
      teamId,
      userId: user.id,
      role,
      joinedAt: this.clock().toISOString(),
    };
    this.db.transaction((t) => {
      t.memberships.push(membership);
      this.permissions.applyMembership(user.id, teamId, role);
    });
    return membership;
  }

  changeRole(actorId: string, teamId: string, userId: string, input: ChangeRoleInput): Membership {
    this.requireTeam(teamId);
    this.requireManager(actorId, teamId);
    const { role } = parseInput(ChangeRoleSchema, input);

    const membership = this.membership(teamId, userId);
    if (!membership) throw new NotFoundError("Membership");
    if (membership.role === role) return membership;
    if (membership.role === "OWNER" && this.ownerCount(teamId) <= 1) {
      throw new ConflictError("Cannot change the role of the last owner.");
    }

    this.db.transaction(() => {
      membership.role = role;
      this.permissions.applyMembership(userId, teamId, role);
    });
    return membership;
  }

  /**
   * Remove a member. Their grants on the team and its tasks go in the same
   * transaction, and tasks assigned to them become unassigned.
   */
  removeMember(actorId: string, teamId: string, userId: string): void {
    this.requireTeam(teamId);
    this.requireManager(actorId, teamId);

    const membership = this.membership(teamId, userId);
    if (!membership) throw new NotFoundError("Membership");
    if (membership.role === "OWNER" && this.ownerCount(teamId) <= 1) {
      throw new ConflictError("Cannot remove the last owner of the team.");
    }

    this.db.transaction((t) => {
      t.memberships = t.memberships.filter((m) => m.id !== membership.id);
      this.permissions.applyMembership(userId, teamId, null);
      for (const task of t.tasks) {
        if (task.teamId === teamId && task.assigneeId === userId) task.assigneeId = null;
      }
    });
  }

  private ownerCount(teamId: string): number {
    return this.db.tables.memberships.filter((m) => m.teamId === teamId && m.role === "OWNER").length;
  }

  private requireTeam(teamId: string): Team {
    const team = this.db.tables.teams.find((t) => t.id === teamId);
    if (!team) throw new NotFoundError("Team");
    return team;
  }

  private requireManager(actorId: string, teamId: string): void {
    this.requirePermission(actorId, teamId, "manage_members", "You do not have permission to manage team members.");
  }

  private requirePermission(actorId: string, teamId: string, permission: Permission, message: string): void {
    if (!this.permissions.check(actorId, { kind: "team", id: teamId }, permission)) {
      throw new AccessDeniedError(message);
    }
  }
}
