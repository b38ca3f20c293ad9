import type { AppContext } from "../context.js";
import type {
  JsonValue,
  ProjectRecord,
  TaskPriority,
  TaskRecord,
  TaskStatus,
} from "../db/records.js";
import type { Repositories, TaskFilters } from "../db/store.js";
import { InvalidStateError, NotFoundError } from "../errors.js";
import { newId, nowIso } from "../util/ids.js";
import { getLogger } from "../util/logger.js";
import { requireProjectRole, requireTaskRole } from "./access.service.js";
import { logActivity } from "./activity.service.js";
import { commitMutation, type EventBatch } from "./mutation.js";
import { resolveTagsForTask } from "./tags.service.js";

const logger = getLogger("tasks");

export interface CreateTaskInput {
  projectId: string;
  title: string;
  description?: string | null;
  assigneeId?: string | null;
  status?: TaskStatus;
  priority?: TaskPriority;
  dueDate?: string | null;
  estimatedHours?: number | null;
  tagIds?: string[];
}

/** Fields left `undefined` are not touched. */
export interface UpdateTaskInput {
  title?: string;
  description?: string | null;
  priority?: TaskPriority;
  status?: TaskStatus;
  assigneeId?: string | null;
  dueDate?: string | null;
  estimatedHours?: number | null;
  actualHours?: number | null;
  /** Replaces the whole tag set. */
  tagIds?: string[];
}

export interface TaskListOptions extends TaskFilters {
  projectId?: string;
}

type FieldChange = { old: JsonValue; new: JsonValue };
type ChangeSet = { [field: string]: FieldChange };

type DiffableField =
  | "title"
  | "description"
  | "priority"
  | "dueDate"
  | "estimatedHours"
  | "actualHours";

const DIFFABLE_FIELDS: DiffableField[] = [
  "title",
  "description",
  "priority",
  "dueDate",
  "estimatedHours",
  "actualHours",
];

/**
 * Any status may follow any other. Entering `done` stamps `completedAt`,
 * leaving it clears the stamp, and every other move leaves it alone.
 */
export function transitionStatus(task: TaskRecord, next: TaskStatus, at: string): TaskRecord {
  if (task.status === next) return task;

  let completedAt = task.completedAt;
  if (next === "done") {
    completedAt = at;
  } else if (task.status === "done") {
    completedAt = null;
  }

  return { ...task, status: next, completedAt };
}

export async function createTask(
  ctx: AppContext,
  actorId: string,
  input: CreateTaskInput,
): Promise<TaskRecord> {
  return commitMutation(ctx, async (repos, events) => {
    const { project } = await requireProjectRole(repos, actorId, input.projectId, "member");

    const assigneeId = input.assigneeId ?? null;
    if (assigneeId !== null) {
      await assertAssignable(repos, project, assigneeId);
    }
    const tags = await resolveTagsForTask(repos, project.id, input.tagIds ?? []);

    const at = nowIso();
    const status = input.status ?? "todo";
    const task: TaskRecord = {
      id: newId(),
      projectId: project.id,
      title: input.title,
      description: input.description ?? null,
      creatorId: actorId,
      assigneeId,
      status,
      priority: input.priority ?? "medium",
      dueDate: input.dueDate ?? null,
      estimatedHours: input.estimatedHours ?? null,
      actualHours: null,
      completedAt: status === "done" ? at : null,
      tagIds: tags.map((tag) => tag.id),
      createdAt: at,
      updatedAt: at,
    };

    await repos.insertTask(task);
    await logActivity(repos, {
      actorId,
      projectId: project.id,
      taskId: task.id,
      action: "created",
      details: { title: task.title },
    });

    events.project(project.id, "task_created", { actorId, taskId: task.id, task });
    if (assigneeId !== null) {
      events.user(assigneeId, "task_assigned_to_you", {
        actorId,
        projectId: project.id,
        taskId: task.id,
        assigneeId,
      });
    }

    logger.debug({ taskId: task.id, projectId: project.id, actorId }, "Task created");
    return task;
  });
}

export async function getTask(
  ctx: AppContext,
  actorId: string,
  taskId: string,
): Promise<TaskRecord> {
  return ctx.store.run(async (repos) => {
    const { task } = await requireTaskRole(repos, actorId, taskId, "viewer");
    return task;
  });
}

/**
 * Lists tasks of one project when `projectId` is given, otherwise of every
 * project the actor owns or belongs to. Newest update first.
 */
export async function listTasks(
  ctx: AppContext,
  actorId: string,
  options: TaskListOptions = {},
): Promise<TaskRecord[]> {
  const { projectId, ...filters } = options;

  return ctx.store.run(async (repos) => {
    if (projectId !== undefined) {
      await requireProjectRole(repos, actorId, projectId, "viewer");
      return repos.listTasks({ ...filters, projectIds: [projectId] });
    }

    const projectIds = await repos.listAccessibleProjectIds(actorId);
    return repos.listTasks({ ...filters, projectIds });
  });
}

export async function updateTask(
  ctx: AppContext,
  actorId: string,
  taskId: string,
  patch: UpdateTaskInput,
): Promise<TaskRecord> {
  return commitMutation(ctx, async (repos, events) => {
    const { task, project } = await requireTaskRole(repos, actorId, taskId, "member", {
      forUpdate: true,
    });

    const assigneeChanged =
      patch.assigneeId !== undefined && patch.assigneeId !== task.assigneeId;
    if (assigneeChanged && patch.assigneeId) {
      await assertAssignable(repos, project, patch.assigneeId);
    }
    const tags =
      patch.tagIds !== undefined
        ? await resolveTagsForTask(repos, project.id, patch.tagIds)
        : null;

    const at = nowIso();
    const changes: ChangeSet = {};
    let next = task;

    for (const field of DIFFABLE_FIELDS) {
      const value = patch[field];
      if (value === undefined || value === next[field]) continue;
      changes[field] = { old: next[field], new: value };
      next = withField(next, field, value);
    }

    if (patch.status !== undefined && patch.status !== task.status) {
      changes.status = { old: task.status, new: patch.status };
      next = transitionStatus(next, patch.status, at);
    }

    if (assigneeChanged) {
      const assigneeId = patch.assigneeId ?? null;
      changes.assigneeId = { old: task.assigneeId, new: assigneeId };
      next = { ...next, assigneeId };
    }

    if (tags) {
      const tagIds = tags.map((tag) => tag.id);
      if (!sameMembers(tagIds, task.tagIds)) {
        changes.tagIds = { old: task.tagIds, new: tagIds };
        next = { ...next, tagIds };
        await repos.replaceTags(task.id, tagIds);
      }
    }

    if (Object.keys(changes).length === 0) {
      return task;
    }

    next = { ...next, updatedAt: at };
    await repos.updateTask(next);

    await logActivity(repos, {
      actorId,
      projectId: project.id,
      taskId: task.id,
      action: "updated",
      details: { changes },
    });
    events.project(project.id, "task_updated", { actorId, taskId: task.id, changes });

    if (next.status !== task.status) {
      await recordStatusChange(repos, events, actorId, task, next.status);
    }
    if (assigneeChanged) {
      await recordAssignment(repos, events, actorId, task, next.assigneeId);
    }

    return next;
  });
}

export async function changeStatus(
  ctx: AppContext,
  actorId: string,
  taskId: string,
  status: TaskStatus,
): Promise<TaskRecord> {
  return commitMutation(ctx, async (repos, events) => {
    const { task } = await requireTaskRole(repos, actorId, taskId, "member", { forUpdate: true });
    if (task.status === status) return task;

    const at = nowIso();
    const next = { ...transitionStatus(task, status, at), updatedAt: at };
    await repos.updateTask(next);
    await recordStatusChange(repos, events, actorId, task, status);
    return next;
  });
}

/** Moves the task into `done`. Completing a task that is already done changes nothing. */
export async function completeTask(
  ctx: AppContext,
  actorId: string,
  taskId: string,
): Promise<TaskRecord> {
  return commitMutation(ctx, async (repos, events) => {
    const { task } = await requireTaskRole(repos, actorId, taskId, "member", { forUpdate: true });
    if (task.status === "done") return task;

    const at = nowIso();
    const next = { ...transitionStatus(task, "done", at), updatedAt: at };
    await repos.updateTask(next);

    await logActivity(repos, {
      actorId,
      projectId: task.projectId,
      taskId: task.id,
      action: "completed",
      details: { title: task.title },
    });
    await recordStatusChange(repos, events, actorId, task, "done");
    return next;
  });
}

/** Sets or, with `null`, clears the assignee. */
export async function assignTask(
  ctx: AppContext,
  actorId: string,
  taskId: string,
  assigneeId: string | null,
): Promise<TaskRecord> {
  return commitMutation(ctx, async (repos, events) => {
    const { task, project } = await requireTaskRole(repos, actorId, taskId, "member", {
      forUpdate: true,
    });
    if (assigneeId !== null) {
      await assertAssignable(repos, project, assigneeId);
    }

    const next: TaskRecord = { ...task, assigneeId, updatedAt: nowIso() };
    await repos.updateTask(next);
    await recordAssignment(repos, events, actorId, task, assigneeId);
    return next;
  });
}

export async function deleteTask(ctx: AppContext, actorId: string, taskId: string): Promise<void> {
  await commitMutation(ctx, async (repos, events) => {
    const { task } = await requireTaskRole(repos, actorId, taskId, "member", { forUpdate: true });

    await logActivity(repos, {
      actorId,
      projectId: task.projectId,
      action: "deleted",
      details: { taskId: task.id, title: task.title },
    });
    await repos.deleteTask(task.id);

    events.project(task.projectId, "task_deleted", { actorId, taskId: task.id });
    logger.debug({ taskId: task.id, actorId }, "Task deleted");
  });
}

/** Adds tags to the task. Tags already on it are skipped without error. */
export async function attachTags(
  ctx: AppContext,
  actorId: string,
  taskId: string,
  tagIds: string[],
): Promise<TaskRecord> {
  return commitMutation(ctx, async (repos, events) => {
    const { task } = await requireTaskRole(repos, actorId, taskId, "member", { forUpdate: true });
    const tags = await resolveTagsForTask(repos, task.projectId, tagIds);

    const added = tags.map((tag) => tag.id).filter((id) => !task.tagIds.includes(id));
    if (added.length === 0) return task;

    await repos.attachTags(task.id, added);
    return recordTagChange(repos, events, actorId, task, [...task.tagIds, ...added]);
  });
}

export async function detachTag(
  ctx: AppContext,
  actorId: string,
  taskId: string,
  tagId: string,
): Promise<TaskRecord> {
  return commitMutation(ctx, async (repos, events) => {
    const { task } = await requireTaskRole(repos, actorId, taskId, "member", { forUpdate: true });

    const tag = await repos.findTag(tagId);
    if (!tag) {
      throw new NotFoundError("TagNotFound", "Tag not found");
    }
    if (!task.tagIds.includes(tag.id)) {
      throw new NotFoundError("TagNotAttached", "Tag is not applied to this task");
    }

    await repos.detachTag(task.id, tag.id);
    return recordTagChange(
      repos,
      events,
      actorId,
      task,
      task.tagIds.filter((id) => id !== tag.id),
    );
  });
}

/**
 * The assignee must be the project owner or hold a member row, and be an
 * active account.
 */
async function assertAssignable(
  repos: Repositories,
  project: ProjectRecord,
  assigneeId: string,
): Promise<void> {
  const user = await repos.findUserById(assigneeId);
  if (!user || !user.isActive) {
    throw new NotFoundError("UserNotFound", "Assignee not found");
  }

  if (project.ownerId === assigneeId) return;

  const membership = await repos.findMember(project.id, assigneeId);
  if (!membership) {
    throw new InvalidStateError("InvalidAssignee", "Assignee is not a project member");
  }
}

async function recordStatusChange(
  repos: Repositories,
  events: EventBatch,
  actorId: string,
  task: TaskRecord,
  newStatus: TaskStatus,
): Promise<void> {
  await logActivity(repos, {
    actorId,
    projectId: task.projectId,
    taskId: task.id,
    action: "status_changed",
    details: { oldStatus: task.status, newStatus },
  });

  events.project(task.projectId, "task_status_changed", {
    actorId,
    taskId: task.id,
    oldStatus: task.status,
    newStatus,
  });
}

async function recordAssignment(
  repos: Repositories,
  events: EventBatch,
  actorId: string,
  task: TaskRecord,
  assigneeId: string | null,
): Promise<void> {
  await logActivity(repos, {
    actorId,
    projectId: task.projectId,
    taskId: task.id,
    action: "assigned",
    details: { assigneeId, previousAssigneeId: task.assigneeId },
  });

  const payload = {
    actorId,
    taskId: task.id,
    assigneeId,
    previousAssigneeId: task.assigneeId,
  };
  events.project(task.projectId, "task_assigned", payload);
  if (assigneeId !== null) {
    events.user(assigneeId, "task_assigned_to_you", { ...payload, projectId: task.projectId });
  }
}

async function recordTagChange(
  repos: Repositories,
  events: EventBatch,
  actorId: string,
  task: TaskRecord,
  tagIds: string[],
): Promise<TaskRecord> {
  const next: TaskRecord = { ...task, tagIds, updatedAt: nowIso() };
  await repos.updateTask(next);

  const changes: ChangeSet = { tagIds: { old: task.tagIds, new: tagIds } };
  await logActivity(repos, {
    actorId,
    projectId: task.projectId,
    taskId: task.id,
    action: "updated",
    details: { changes },
  });
  events.project(task.projectId, "task_updated", { actorId, taskId: task.id, changes });
  return next;
}

function withField<K extends DiffableField>(
  task: TaskRecord,
  field: K,
  value: TaskRecord[K],
): TaskRecord {
  const copy = { ...task };
  copy[field] = value;
  return copy;
}

function sameMembers(a: readonly string[], b: readonly string[]): boolean {
  if (a.length !== b.length) return false;
  const set = new Set(b);
  return a.every((id) => set.has(id));
}
