import type { AppContext } from "../context.js";
import type {
  MemberRole,
  ProjectMemberRecord,
  ProjectRecord,
  PublicUser,
} from "../db/records.js";
import { toPublicUser } from "../db/records.js";
import type { Repositories } from "../db/store.js";
import {
  ConflictError,
  InvalidStateError,
  NotFoundError,
} from "../errors.js";
import { newId, nowIso } from "../util/ids.js";
import { getLogger } from "../util/logger.js";
import {
  assertCapability,
  lookupRole,
  requireProjectRole,
  type EffectiveRole,
} from "./access.service.js";
import { logActivity } from "./activity.service.js";
import { commitMutation } from "./mutation.js";

const logger = getLogger("projects");

export interface CreateProjectInput {
  name: string;
  description?: string | null;
  color?: string | null;
  icon?: string | null;
}

/** Fields left `undefined` are not touched. */
export interface UpdateProjectInput {
  name?: string;
  description?: string | null;
  color?: string | null;
  icon?: string | null;
}

export interface ProjectView extends ProjectRecord {
  role: EffectiveRole;
}

export interface MemberView {
  user: PublicUser;
  role: MemberRole | "owner";
  joinedAt: string;
}

export interface ListProjectsOptions {
  archived?: boolean;
}

export async function createProject(
  ctx: AppContext,
  actorId: string,
  input: CreateProjectInput,
): Promise<ProjectRecord> {
  return ctx.store.transaction(async (repos) => {
    const owner = await repos.findUserById(actorId);
    if (!owner || !owner.isActive) {
      throw new NotFoundError("UserNotFound", "User not found");
    }

    const at = nowIso();
    const project: ProjectRecord = {
      id: newId(),
      name: input.name,
      description: input.description ?? null,
      ownerId: actorId,
      color: input.color ?? null,
      icon: input.icon ?? null,
      isArchived: false,
      createdAt: at,
      updatedAt: at,
    };

    await repos.insertProject(project);
    logger.debug({ projectId: project.id, ownerId: actorId }, "Project created");
    return project;
  });
}

export async function getProject(
  ctx: AppContext,
  actorId: string,
  projectId: string,
): Promise<ProjectView> {
  return ctx.store.run(async (repos) => {
    const { project, role } = await requireProjectRole(repos, actorId, projectId, "viewer");
    return { ...project, role };
  });
}

export async function listProjects(
  ctx: AppContext,
  actorId: string,
  options: ListProjectsOptions = {},
): Promise<ProjectRecord[]> {
  return ctx.store.run((repos) => repos.listProjectsForUser(actorId, options.archived ?? false));
}

export async function updateProject(
  ctx: AppContext,
  actorId: string,
  projectId: string,
  patch: UpdateProjectInput,
): Promise<ProjectRecord> {
  return commitMutation(ctx, async (repos, events) => {
    const { project } = await requireProjectRole(repos, actorId, projectId, "admin", {
      forUpdate: true,
    });

    const next: ProjectRecord = {
      ...project,
      name: patch.name ?? project.name,
      description: patch.description !== undefined ? patch.description : project.description,
      color: patch.color !== undefined ? patch.color : project.color,
      icon: patch.icon !== undefined ? patch.icon : project.icon,
    };

    const changed =
      next.name !== project.name ||
      next.description !== project.description ||
      next.color !== project.color ||
      next.icon !== project.icon;
    if (!changed) return project;

    const updated = { ...next, updatedAt: nowIso() };
    await repos.updateProject(updated);
    events.project(project.id, "project_updated", { actorId, project: updated });
    return updated;
  });
}

/** Flips the archived flag; archiving and unarchiving are the same call. */
export async function archiveToggle(
  ctx: AppContext,
  actorId: string,
  projectId: string,
): Promise<ProjectRecord> {
  return commitMutation(ctx, async (repos, events) => {
    const { project } = await requireProjectRole(repos, actorId, projectId, "admin", {
      forUpdate: true,
    });

    const updated = { ...project, isArchived: !project.isArchived, updatedAt: nowIso() };
    await repos.updateProject(updated);
    events.project(project.id, "project_archived", {
      actorId,
      isArchived: updated.isArchived,
    });
    return updated;
  });
}

/** Soft delete: the project is archived, nothing is removed. Owner only. */
export async function deleteProject(
  ctx: AppContext,
  actorId: string,
  projectId: string,
): Promise<ProjectRecord> {
  return commitMutation(ctx, async (repos, events) => {
    const { project } = await requireProjectRole(repos, actorId, projectId, "owner", {
      forUpdate: true,
    });
    if (project.isArchived) return project;

    const updated = { ...project, isArchived: true, updatedAt: nowIso() };
    await repos.updateProject(updated);
    events.project(project.id, "project_archived", { actorId, isArchived: true });
    return updated;
  });
}

/** The owner first, then member rows in join order. */
export async function listMembers(
  ctx: AppContext,
  actorId: string,
  projectId: string,
): Promise<MemberView[]> {
  return ctx.store.run(async (repos) => {
    const { project } = await requireProjectRole(repos, actorId, projectId, "viewer");

    const owner = await repos.findUserById(project.ownerId);
    const views: MemberView[] = [];
    if (owner) {
      views.push({ user: toPublicUser(owner), role: "owner", joinedAt: project.createdAt });
    }

    for (const member of await repos.listMembers(project.id)) {
      const user = await repos.findUserById(member.userId);
      if (!user) continue;
      views.push({ user: toPublicUser(user), role: member.role, joinedAt: member.joinedAt });
    }
    return views;
  });
}

export async function addMember(
  ctx: AppContext,
  actorId: string,
  projectId: string,
  userId: string,
  role: MemberRole = "member",
): Promise<ProjectMemberRecord> {
  return commitMutation(ctx, async (repos, events) => {
    const { project } = await requireProjectRole(repos, actorId, projectId, "admin", {
      forUpdate: true,
    });

    const user = await repos.findUserById(userId);
    if (!user || !user.isActive) {
      throw new NotFoundError("UserNotFound", "User not found");
    }
    if (project.ownerId === userId) {
      throw new ConflictError("CannotAddOwner", "Project owner cannot be added as member");
    }
    if (await repos.findMember(project.id, userId)) {
      throw new ConflictError("AlreadyMember", "User is already a project member");
    }

    const member: ProjectMemberRecord = {
      projectId: project.id,
      userId,
      role,
      joinedAt: nowIso(),
    };
    await repos.insertMember(member);
    await logActivity(repos, {
      actorId,
      projectId: project.id,
      action: "member_added",
      details: { memberId: userId, role },
    });

    const payload = { actorId, userId, role };
    events.project(project.id, "member_added", payload);
    events.user(userId, "added_to_project", {
      ...payload,
      projectId: project.id,
      projectName: project.name,
    });
    return member;
  });
}

export async function updateMemberRole(
  ctx: AppContext,
  actorId: string,
  projectId: string,
  userId: string,
  role: MemberRole,
): Promise<ProjectMemberRecord> {
  return commitMutation(ctx, async (repos, events) => {
    const { project } = await requireProjectRole(repos, actorId, projectId, "admin", {
      forUpdate: true,
    });
    if (project.ownerId === userId) {
      throw new InvalidStateError("CannotChangeOwnerRole", "Project owner role cannot be changed");
    }

    const member = await findMemberOrThrow(repos, project.id, userId);
    if (member.role === role) return member;

    const updated = { ...member, role };
    await repos.updateMember(updated);
    events.project(project.id, "member_role_updated", {
      actorId,
      userId,
      oldRole: member.role,
      role,
    });
    return updated;
  });
}

export async function removeMember(
  ctx: AppContext,
  actorId: string,
  projectId: string,
  userId: string,
): Promise<void> {
  await commitMutation(ctx, async (repos, events) => {
    const project = await repos.findProject(projectId, { forUpdate: true });
    if (!project) {
      throw new NotFoundError("ProjectNotFound", "Project not found");
    }
    // Fails the same way for every caller, whatever their role.
    if (project.ownerId === userId) {
      throw new InvalidStateError("CannotRemoveOwner", "Cannot remove project owner");
    }
    assertCapability(await lookupRole(repos, actorId, project), "admin");

    await findMemberOrThrow(repos, project.id, userId);
    await repos.deleteMember(project.id, userId);
    await logActivity(repos, {
      actorId,
      projectId: project.id,
      action: "member_removed",
      details: { memberId: userId },
    });

    events.project(project.id, "member_removed", { actorId, userId });
    events.user(userId, "removed_from_project", { actorId, userId, projectId: project.id });
  });
}

async function findMemberOrThrow(
  repos: Repositories,
  projectId: string,
  userId: string,
): Promise<ProjectMemberRecord> {
  const member = await repos.findMember(projectId, userId);
  if (!member) {
    throw new NotFoundError("NotAMember", "User is not a project member");
  }
  return member;
}
