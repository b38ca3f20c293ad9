import type { AppContext } from "../context.js";
import type { ActivityAction, ActivityDetails, ActivityRecord } from "../db/records.js";
import type { Repositories } from "../db/store.js";
import { newId, nowIso } from "../util/ids.js";
import { requireProjectRole, requireTaskRole } from "./access.service.js";

export const DEFAULT_ACTIVITY_LIMIT = 50;
export const MAX_ACTIVITY_LIMIT = 200;

export interface ActivityInput {
  actorId: string;
  projectId: string;
  action: ActivityAction;
  taskId?: string | null;
  details?: ActivityDetails;
}

/** Appends to the log within the caller's transaction. */
export async function logActivity(
  repos: Repositories,
  input: ActivityInput,
): Promise<ActivityRecord> {
  const entry: ActivityRecord = {
    id: newId(),
    userId: input.actorId,
    projectId: input.projectId,
    taskId: input.taskId ?? null,
    action: input.action,
    details: input.details ?? {},
    createdAt: nowIso(),
  };

  await repos.insertActivity(entry);
  return entry;
}

export async function taskHistory(
  ctx: AppContext,
  actorId: string,
  taskId: string,
): Promise<ActivityRecord[]> {
  return ctx.store.run(async (repos) => {
    await requireTaskRole(repos, actorId, taskId, "viewer");
    return repos.listActivityForTask(taskId);
  });
}

export async function projectActivity(
  ctx: AppContext,
  actorId: string,
  projectId: string,
  limit = DEFAULT_ACTIVITY_LIMIT,
): Promise<ActivityRecord[]> {
  const boundedLimit = Math.min(Math.max(1, Math.trunc(limit)), MAX_ACTIVITY_LIMIT);

  return ctx.store.run(async (repos) => {
    await requireProjectRole(repos, actorId, projectId, "viewer");
    return repos.listActivityForProject(projectId, boundedLimit);
  });
}
