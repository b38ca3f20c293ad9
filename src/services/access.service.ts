import { AccessDeniedError, NotFoundError } from "../errors.js";
import type {
  MemberRole,
  ProjectMemberRecord,
  ProjectRecord,
  TaskRecord,
} from "../db/records.js";
import type { LockOptions, Repositories } from "../db/store.js";

export type EffectiveRole = "owner" | MemberRole | "none";

const ROLE_RANK: Record<EffectiveRole, number> = {
  none: 0,
  viewer: 1,
  member: 2,
  admin: 3,
  owner: 4,
};

export interface ProjectAccess {
  project: ProjectRecord;
  role: EffectiveRole;
}

export interface TaskAccess extends ProjectAccess {
  task: TaskRecord;
}

/**
 * Ownership wins over any member row: the owner is never a member, and a
 * stray row for the owner must not downgrade them.
 */
export function resolveRole(
  actorId: string,
  project: Pick<ProjectRecord, "ownerId">,
  membership: Pick<ProjectMemberRecord, "role"> | null,
): EffectiveRole {
  if (project.ownerId === actorId) return "owner";
  return membership?.role ?? "none";
}

export function hasCapability(role: EffectiveRole, required: EffectiveRole): boolean {
  if (required === "owner") return role === "owner";
  return ROLE_RANK[role] >= ROLE_RANK[required];
}

export function assertCapability(role: EffectiveRole, required: EffectiveRole): void {
  if (hasCapability(role, required)) return;

  if (required === "owner") {
    throw new AccessDeniedError("Only the project owner can do this");
  }
  throw new AccessDeniedError(`${required} role required`);
}

export async function lookupRole(
  repos: Repositories,
  actorId: string,
  project: ProjectRecord,
): Promise<EffectiveRole> {
  if (project.ownerId === actorId) return "owner";
  const membership = await repos.findMember(project.id, actorId);
  return resolveRole(actorId, project, membership);
}

export async function requireProjectRole(
  repos: Repositories,
  actorId: string,
  projectId: string,
  required: EffectiveRole,
  options: LockOptions = {},
): Promise<ProjectAccess> {
  const project = await repos.findProject(projectId, options);
  if (!project) {
    throw new NotFoundError("ProjectNotFound", "Project not found");
  }

  const role = await lookupRole(repos, actorId, project);
  assertCapability(role, required);
  return { project, role };
}

export async function requireTaskRole(
  repos: Repositories,
  actorId: string,
  taskId: string,
  required: EffectiveRole,
  options: LockOptions = {},
): Promise<TaskAccess> {
  const task = await repos.findTask(taskId, options);
  if (!task) {
    throw new NotFoundError("TaskNotFound", "Task not found");
  }

  const access = await requireProjectRole(repos, actorId, task.projectId, required);
  return { ...access, task };
}
