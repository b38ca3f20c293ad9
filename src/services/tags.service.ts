import type { AppContext } from "../context.js";
import type { TagRecord, TaskRecord } from "../db/records.js";
import type { Repositories } from "../db/store.js";
import {
  AccessDeniedError,
  ConflictError,
  InvalidStateError,
  NotFoundError,
} from "../errors.js";
import { newId, nowIso } from "../util/ids.js";
import { requireProjectRole } from "./access.service.js";
import { commitMutation } from "./mutation.js";

export interface CreateTagInput {
  name: string;
  color?: string | null;
  projectId?: string | null;
}

export interface UpdateTagInput {
  name?: string;
  color?: string | null;
}

export interface ListTagsOptions {
  projectId?: string;
}

/** A tag fits a task when it is global or lives in the task's project. */
export function resolveForTask(tag: TagRecord, task: Pick<TaskRecord, "projectId">): void {
  if (tag.projectId === null || tag.projectId === task.projectId) return;

  throw new InvalidStateError(
    "TagScopeMismatch",
    `Tag '${tag.name}' belongs to a different project`,
  );
}

/**
 * Resolves a whole batch before anything is written, so one bad id rejects
 * the batch. Duplicate ids collapse to one.
 */
export async function resolveTagsForTask(
  repos: Repositories,
  projectId: string,
  tagIds: readonly string[],
): Promise<TagRecord[]> {
  const tags: TagRecord[] = [];

  for (const tagId of new Set(tagIds)) {
    const tag = await repos.findTag(tagId);
    if (!tag) {
      throw new NotFoundError("TagNotFound", `Tag ${tagId} not found`);
    }
    resolveForTask(tag, { projectId });
    tags.push(tag);
  }

  return tags;
}

export async function createTag(
  ctx: AppContext,
  actorId: string,
  input: CreateTagInput,
): Promise<TagRecord> {
  const projectId = input.projectId ?? null;

  return commitMutation(ctx, async (repos, events) => {
    if (projectId !== null) {
      await requireProjectRole(repos, actorId, projectId, "member");
    }

    await assertNameAvailable(repos, input.name, projectId);

    const at = nowIso();
    const tag: TagRecord = {
      id: newId(),
      name: input.name,
      color: input.color ?? null,
      projectId,
      createdAt: at,
      updatedAt: at,
    };
    await repos.insertTag(tag);

    if (projectId !== null) {
      events.project(projectId, "tag_created", { actorId, tagId: tag.id, tag });
    }
    return tag;
  });
}

export async function getTag(ctx: AppContext, actorId: string, tagId: string): Promise<TagRecord> {
  return ctx.store.run(async (repos) => {
    const tag = await findTagOrThrow(repos, tagId);
    if (tag.projectId !== null) {
      await requireProjectRole(repos, actorId, tag.projectId, "viewer");
    }
    return tag;
  });
}

export async function listTags(
  ctx: AppContext,
  actorId: string,
  options: ListTagsOptions = {},
): Promise<TagRecord[]> {
  return ctx.store.run(async (repos) => {
    if (options.projectId !== undefined) {
      await requireProjectRole(repos, actorId, options.projectId, "viewer");
      return repos.listTags({ projectIds: [options.projectId], includeGlobal: false });
    }

    const projectIds = await repos.listAccessibleProjectIds(actorId);
    return repos.listTags({ projectIds, includeGlobal: true });
  });
}

export async function updateTag(
  ctx: AppContext,
  actorId: string,
  tagId: string,
  patch: UpdateTagInput,
): Promise<TagRecord> {
  return commitMutation(ctx, async (repos, events) => {
    const tag = await findTagOrThrow(repos, tagId);
    const projectId = requireProjectScope(tag, "updated");
    await requireProjectRole(repos, actorId, projectId, "member");

    if (patch.name !== undefined && patch.name !== tag.name) {
      await assertNameAvailable(repos, patch.name, projectId, tag.id);
    }

    const updated: TagRecord = {
      ...tag,
      name: patch.name ?? tag.name,
      color: patch.color !== undefined ? patch.color : tag.color,
      updatedAt: nowIso(),
    };
    await repos.updateTag(updated);

    events.project(projectId, "tag_updated", { actorId, tagId: updated.id, tag: updated });
    return updated;
  });
}

export async function deleteTag(ctx: AppContext, actorId: string, tagId: string): Promise<void> {
  await commitMutation(ctx, async (repos, events) => {
    const tag = await findTagOrThrow(repos, tagId);
    const projectId = requireProjectScope(tag, "deleted");
    await requireProjectRole(repos, actorId, projectId, "member");

    await repos.deleteTag(tag.id);
    events.project(projectId, "tag_deleted", { actorId, tagId: tag.id });
  });
}

async function findTagOrThrow(repos: Repositories, tagId: string): Promise<TagRecord> {
  const tag = await repos.findTag(tagId);
  if (!tag) {
    throw new NotFoundError("TagNotFound", "Tag not found");
  }
  return tag;
}

function requireProjectScope(tag: TagRecord, verb: "updated" | "deleted"): string {
  if (tag.projectId === null) {
    throw new AccessDeniedError(`Global tags cannot be ${verb}`, "GlobalTagImmutable");
  }
  return tag.projectId;
}

async function assertNameAvailable(
  repos: Repositories,
  name: string,
  projectId: string | null,
  renamingTagId?: string,
): Promise<void> {
  // Names are unique per scope ignoring case; a tag may change the case of its own name.
  const existing = await repos.findTagByName(name, projectId);
  if (!existing || existing.id === renamingTagId) return;

  const scope = projectId === null ? "global" : "project";
  throw new ConflictError("DuplicateTagName", `Tag '${name}' already exists in ${scope} scope`);
}
