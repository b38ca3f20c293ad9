import type { NextFunction, Request, Response } from "express";
import type { AppContext } from "../context.js";
import type { TaskPriority, TaskStatus } from "../db/records.js";
import { actorId } from "../middleware/authenticate.js";
import { taskHistory } from "../services/activity.service.js";
import {
  assignTask,
  attachTags,
  changeStatus,
  completeTask,
  createTask,
  deleteTask,
  detachTag,
  getTask,
  listTasks,
  updateTask,
  type TaskListOptions,
  type UpdateTaskInput,
} from "../services/tasks.service.js";
import {
  asRecord,
  has,
  isNullableStringPayload,
  isIdValue,
  normalizeDescription,
  normalizeName,
  parseId,
  parseIdList,
  parseNullableDate,
  parseNullableHours,
  parseNullableId,
  parsePriority,
  parseStatus,
  queryString,
  type Parsed,
} from "./validation.js";

const TITLE_MAX_LENGTH = 200;

export function createTasksController(ctx: AppContext) {
  async function getTasks(req: Request, res: Response, next: NextFunction) {
    try {
      const query = parseTaskQuery(req.query);
      if (!query.ok) {
        res.status(400).json({ error: query.error });
        return;
      }

      const tasks = await listTasks(ctx, actorId(req), query.options);
      res.status(200).json({ tasks });
    } catch (err) {
      next(err);
    }
  }

  async function getProjectTasks(req: Request, res: Response, next: NextFunction) {
    try {
      const projectId = parseId(req.params.id);
      if (projectId === null) {
        res.status(400).json({ error: "Invalid project id" });
        return;
      }

      const query = parseTaskQuery(req.query);
      if (!query.ok) {
        res.status(400).json({ error: query.error });
        return;
      }

      const tasks = await listTasks(ctx, actorId(req), { ...query.options, projectId });
      res.status(200).json({ tasks });
    } catch (err) {
      next(err);
    }
  }

  async function createNewTask(req: Request, res: Response, next: NextFunction) {
    try {
      const projectId = parseId(req.params.id);
      if (projectId === null) {
        res.status(400).json({ error: "Invalid project id" });
        return;
      }

      const payload = parseCreateTaskPayload(req.body);
      if (!payload.ok) {
        res.status(400).json({ error: payload.error });
        return;
      }

      const { ok: _ok, ...input } = payload;
      const task = await createTask(ctx, actorId(req), { ...input, projectId });
      res.status(201).json({ task });
    } catch (err) {
      next(err);
    }
  }

  async function getTaskById(req: Request, res: Response, next: NextFunction) {
    try {
      const taskId = parseId(req.params.taskId);
      if (taskId === null) {
        res.status(400).json({ error: "Invalid task id" });
        return;
      }

      const task = await getTask(ctx, actorId(req), taskId);
      res.status(200).json({ task });
    } catch (err) {
      next(err);
    }
  }

  async function patchTask(req: Request, res: Response, next: NextFunction) {
    try {
      const taskId = parseId(req.params.taskId);
      if (taskId === null) {
        res.status(400).json({ error: "Invalid task id" });
        return;
      }

      const payload = parseUpdateTaskPayload(req.body);
      if (!payload.ok) {
        res.status(400).json({ error: payload.error });
        return;
      }

      const task = await updateTask(ctx, actorId(req), taskId, payload.patch);
      res.status(200).json({ task });
    } catch (err) {
      next(err);
    }
  }

  async function deleteTaskById(req: Request, res: Response, next: NextFunction) {
    try {
      const taskId = parseId(req.params.taskId);
      if (taskId === null) {
        res.status(400).json({ error: "Invalid task id" });
        return;
      }

      await deleteTask(ctx, actorId(req), taskId);
      res.status(204).send();
    } catch (err) {
      next(err);
    }
  }

  async function putTaskStatus(req: Request, res: Response, next: NextFunction) {
    try {
      const taskId = parseId(req.params.taskId);
      if (taskId === null) {
        res.status(400).json({ error: "Invalid task id" });
        return;
      }

      const status = parseStatus(asRecord(req.body).status);
      if (status === null) {
        res.status(400).json({ error: "Status must be todo, in_progress, review, or done" });
        return;
      }

      const task = await changeStatus(ctx, actorId(req), taskId, status);
      res.status(200).json({ task });
    } catch (err) {
      next(err);
    }
  }

  async function postCompleteTask(req: Request, res: Response, next: NextFunction) {
    try {
      const taskId = parseId(req.params.taskId);
      if (taskId === null) {
        res.status(400).json({ error: "Invalid task id" });
        return;
      }

      const task = await completeTask(ctx, actorId(req), taskId);
      res.status(200).json({ task });
    } catch (err) {
      next(err);
    }
  }

  async function putTaskAssignee(req: Request, res: Response, next: NextFunction) {
    try {
      const taskId = parseId(req.params.taskId);
      if (taskId === null) {
        res.status(400).json({ error: "Invalid task id" });
        return;
      }

      const payload = asRecord(req.body);
      const assigneeId = has(payload, "assigneeId") ? parseNullableId(payload.assigneeId) : undefined;
      if (assigneeId === undefined) {
        res.status(400).json({ error: "assigneeId is required and must be a user id or null" });
        return;
      }

      const task = await assignTask(ctx, actorId(req), taskId, assigneeId);
      res.status(200).json({ task });
    } catch (err) {
      next(err);
    }
  }

  async function getTaskHistory(req: Request, res: Response, next: NextFunction) {
    try {
      const taskId = parseId(req.params.taskId);
      if (taskId === null) {
        res.status(400).json({ error: "Invalid task id" });
        return;
      }

      const activity = await taskHistory(ctx, actorId(req), taskId);
      res.status(200).json({ activity });
    } catch (err) {
      next(err);
    }
  }

  async function postTaskTags(req: Request, res: Response, next: NextFunction) {
    try {
      const taskId = parseId(req.params.taskId);
      if (taskId === null) {
        res.status(400).json({ error: "Invalid task id" });
        return;
      }

      const tagIds = parseIdList(asRecord(req.body).tagIds);
      if (tagIds === null || tagIds.length === 0) {
        res.status(400).json({ error: "tagIds must be a non-empty array of tag ids" });
        return;
      }

      const task = await attachTags(ctx, actorId(req), taskId, tagIds);
      res.status(200).json({ task });
    } catch (err) {
      next(err);
    }
  }

  async function deleteTaskTag(req: Request, res: Response, next: NextFunction) {
    try {
      const taskId = parseId(req.params.taskId);
      const tagId = parseId(req.params.tagId);
      if (taskId === null || tagId === null) {
        res.status(400).json({ error: "Invalid task or tag id" });
        return;
      }

      const task = await detachTag(ctx, actorId(req), taskId, tagId);
      res.status(200).json({ task });
    } catch (err) {
      next(err);
    }
  }

  return {
    getTasks,
    getProjectTasks,
    createNewTask,
    getTaskById,
    patchTask,
    deleteTaskById,
    putTaskStatus,
    postCompleteTask,
    putTaskAssignee,
    getTaskHistory,
    postTaskTags,
    deleteTaskTag,
  };
}

// --- Validation helpers ---

function parseTaskQuery(query: unknown): Parsed<{ options: TaskListOptions }> {
  const params = asRecord(query);
  const options: TaskListOptions = {};

  const projectId = queryString(params.projectId);
  if (projectId !== undefined) {
    if (!isIdValue(projectId)) return { ok: false, error: "Invalid project id" };
    options.projectId = projectId.toLowerCase();
  }

  const status = queryString(params.status);
  if (status !== undefined) {
    const parsed = parseStatus(status);
    if (parsed === null) return { ok: false, error: "Invalid status filter" };
    options.status = parsed;
  }

  const priority = queryString(params.priority);
  if (priority !== undefined) {
    const parsed = parsePriority(priority);
    if (parsed === null) return { ok: false, error: "Invalid priority filter" };
    options.priority = parsed;
  }

  const assigneeId = queryString(params.assigneeId);
  if (assigneeId !== undefined) {
    if (!isIdValue(assigneeId)) return { ok: false, error: "Invalid assignee filter" };
    options.assigneeId = assigneeId.toLowerCase();
  }

  const search = queryString(params.search);
  if (search !== undefined) {
    options.search = search;
  }

  return { ok: true, options };
}

function parseCreateTaskPayload(body: unknown): Parsed<{
  title: string;
  description: string | null;
  assigneeId: string | null;
  status?: TaskStatus;
  priority?: TaskPriority;
  dueDate: string | null;
  estimatedHours: number | null;
  tagIds: string[];
}> {
  const payload = asRecord(body);

  const title = normalizeName(payload.title, TITLE_MAX_LENGTH);
  if (title === null) {
    return { ok: false, error: `Title is required and must be 1-${TITLE_MAX_LENGTH} characters` };
  }

  if (!isNullableStringPayload(payload.description)) {
    return { ok: false, error: "Description must be a string or null" };
  }

  let assigneeId: string | null = null;
  if (payload.assigneeId !== undefined) {
    const parsed = parseNullableId(payload.assigneeId);
    if (parsed === undefined) return { ok: false, error: "assigneeId must be a user id or null" };
    assigneeId = parsed;
  }

  let status: TaskStatus | undefined;
  if (payload.status !== undefined) {
    const parsed = parseStatus(payload.status);
    if (parsed === null) {
      return { ok: false, error: "Status must be todo, in_progress, review, or done" };
    }
    status = parsed;
  }

  let priority: TaskPriority | undefined;
  if (payload.priority !== undefined) {
    const parsed = parsePriority(payload.priority);
    if (parsed === null) {
      return { ok: false, error: "Priority must be low, medium, high, or urgent" };
    }
    priority = parsed;
  }

  let dueDate: string | null = null;
  if (payload.dueDate !== undefined) {
    const parsed = parseNullableDate(payload.dueDate);
    if (parsed === undefined) return { ok: false, error: "dueDate must be a date or null" };
    dueDate = parsed;
  }

  let estimatedHours: number | null = null;
  if (payload.estimatedHours !== undefined) {
    const parsed = parseNullableHours(payload.estimatedHours);
    if (parsed === undefined) {
      return { ok: false, error: "estimatedHours must be a non-negative number or null" };
    }
    estimatedHours = parsed;
  }

  let tagIds: string[] = [];
  if (payload.tagIds !== undefined) {
    const parsed = parseIdList(payload.tagIds);
    if (parsed === null) return { ok: false, error: "tagIds must be an array of tag ids" };
    tagIds = parsed;
  }

  return {
    ok: true,
    title,
    description: normalizeDescription(payload.description),
    assigneeId,
    status,
    priority,
    dueDate,
    estimatedHours,
    tagIds,
  };
}

const UPDATABLE_FIELDS = [
  "title",
  "description",
  "priority",
  "status",
  "assigneeId",
  "dueDate",
  "estimatedHours",
  "actualHours",
  "tagIds",
];

function parseUpdateTaskPayload(body: unknown): Parsed<{ patch: UpdateTaskInput }> {
  const payload = asRecord(body);

  if (!UPDATABLE_FIELDS.some((field) => has(payload, field))) {
    return { ok: false, error: `Provide at least one of: ${UPDATABLE_FIELDS.join(", ")}` };
  }

  const patch: UpdateTaskInput = {};

  if (has(payload, "title")) {
    const title = normalizeName(payload.title, TITLE_MAX_LENGTH);
    if (title === null) return { ok: false, error: `Title must be 1-${TITLE_MAX_LENGTH} characters` };
    patch.title = title;
  }

  if (has(payload, "description")) {
    if (!isNullableStringPayload(payload.description)) {
      return { ok: false, error: "Description must be a string or null" };
    }
    patch.description = normalizeDescription(payload.description);
  }

  if (has(payload, "priority")) {
    const priority = parsePriority(payload.priority);
    if (priority === null) {
      return { ok: false, error: "Priority must be low, medium, high, or urgent" };
    }
    patch.priority = priority;
  }

  if (has(payload, "status")) {
    const status = parseStatus(payload.status);
    if (status === null) {
      return { ok: false, error: "Status must be todo, in_progress, review, or done" };
    }
    patch.status = status;
  }

  if (has(payload, "assigneeId")) {
    const assigneeId = parseNullableId(payload.assigneeId);
    if (assigneeId === undefined) return { ok: false, error: "assigneeId must be a user id or null" };
    patch.assigneeId = assigneeId;
  }

  if (has(payload, "dueDate")) {
    const dueDate = parseNullableDate(payload.dueDate);
    if (dueDate === undefined) return { ok: false, error: "dueDate must be a date or null" };
    patch.dueDate = dueDate;
  }

  for (const field of ["estimatedHours", "actualHours"] as const) {
    if (has(payload, field)) {
      const hours = parseNullableHours(payload[field]);
      if (hours === undefined) {
        return { ok: false, error: `${field} must be a non-negative number or null` };
      }
      patch[field] = hours;
    }
  }

  if (has(payload, "tagIds")) {
    const tagIds = parseIdList(payload.tagIds);
    if (tagIds === null) return { ok: false, error: "tagIds must be an array of tag ids" };
    patch.tagIds = tagIds;
  }

  return { ok: true, patch };
}
