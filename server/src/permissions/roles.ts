import type { Permission, Role } from "../db/schema.js";

/** Team permissions conferred by each membership role. */
const ROLE_PERMISSIONS: Record<Role, readonly Permission[]> = {
  OWNER: ["view", "change", "delete", "manage_members"],
  MEMBER: ["view"],
};

export function teamPermissionsFor(role: Role): Permission[] {
  return [...ROLE_PERMISSIONS[role]];
}

/**
 * Task permissions for a team member: everyone can view, owners and the
 * task's creator can also change and delete it.
 */
export function taskPermissionsFor(role: Role, isCreator: boolean): Permission[] {
  return role === "OWNER" || isCreator ? ["view", "change", "delete"] : ["view"];
}
