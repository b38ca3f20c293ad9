import type { NextFunction, Request, Response } from "express";
import type { AppContext } from "../context.js";
import type { MemberRole } from "../db/records.js";
import { actorId } from "../middleware/authenticate.js";
import { projectActivity, DEFAULT_ACTIVITY_LIMIT } from "../services/activity.service.js";
import {
  addMember,
  archiveToggle,
  createProject,
  deleteProject,
  getProject,
  listMembers,
  listProjects,
  removeMember,
  updateMemberRole,
  updateProject,
  type UpdateProjectInput,
} from "../services/projects.service.js";
import {
  asRecord,
  has,
  isColorPayload,
  isIdValue,
  isNullableStringPayload,
  normalizeDescription,
  normalizeName,
  parseId,
  parseMemberRole,
  queryString,
  type Parsed,
} from "./validation.js";

const NAME_MAX_LENGTH = 100;
const ICON_MAX_LENGTH = 50;

export function createProjectsController(ctx: AppContext) {
  async function getProjects(req: Request, res: Response, next: NextFunction) {
    try {
      const archived = queryString(req.query.archived);
      if (archived !== undefined && archived !== "true" && archived !== "false") {
        res.status(400).json({ error: "archived must be true or false" });
        return;
      }

      const projects = await listProjects(ctx, actorId(req), { archived: archived === "true" });
      res.status(200).json({ projects });
    } catch (err) {
      next(err);
    }
  }

  async function postProject(req: Request, res: Response, next: NextFunction) {
    try {
      const payload = parseCreateProjectPayload(req.body);
      if (!payload.ok) {
        res.status(400).json({ error: payload.error });
        return;
      }

      const { ok: _ok, ...input } = payload;
      const project = await createProject(ctx, actorId(req), input);
      res.status(201).json({ project });
    } catch (err) {
      next(err);
    }
  }

  async function getProjectById(req: Request, res: Response, next: NextFunction) {
    try {
      const projectId = parseId(req.params.id);
      if (projectId === null) {
        res.status(400).json({ error: "Invalid project id" });
        return;
      }

      const project = await getProject(ctx, actorId(req), projectId);
      res.status(200).json({ project });
    } catch (err) {
      next(err);
    }
  }

  async function patchProject(req: Request, res: Response, next: NextFunction) {
    try {
      const projectId = parseId(req.params.id);
      if (projectId === null) {
        res.status(400).json({ error: "Invalid project id" });
        return;
      }

      const payload = parseUpdateProjectPayload(req.body);
      if (!payload.ok) {
        res.status(400).json({ error: payload.error });
        return;
      }

      const project = await updateProject(ctx, actorId(req), projectId, payload.patch);
      res.status(200).json({ project });
    } catch (err) {
      next(err);
    }
  }

  async function postArchiveToggle(req: Request, res: Response, next: NextFunction) {
    try {
      const projectId = parseId(req.params.id);
      if (projectId === null) {
        res.status(400).json({ error: "Invalid project id" });
        return;
      }

      const project = await archiveToggle(ctx, actorId(req), projectId);
      res.status(200).json({ project });
    } catch (err) {
      next(err);
    }
  }

  async function deleteProjectById(req: Request, res: Response, next: NextFunction) {
    try {
      const projectId = parseId(req.params.id);
      if (projectId === null) {
        res.status(400).json({ error: "Invalid project id" });
        return;
      }

      await deleteProject(ctx, actorId(req), projectId);
      res.status(204).send();
    } catch (err) {
      next(err);
    }
  }

  async function getMembers(req: Request, res: Response, next: NextFunction) {
    try {
      const projectId = parseId(req.params.id);
      if (projectId === null) {
        res.status(400).json({ error: "Invalid project id" });
        return;
      }

      const members = await listMembers(ctx, actorId(req), projectId);
      res.status(200).json({ members });
    } catch (err) {
      next(err);
    }
  }

  async function postMember(req: Request, res: Response, next: NextFunction) {
    try {
      const projectId = parseId(req.params.id);
      if (projectId === null) {
        res.status(400).json({ error: "Invalid project id" });
        return;
      }

      const payload = parseAddMemberPayload(req.body);
      if (!payload.ok) {
        res.status(400).json({ error: payload.error });
        return;
      }

      const member = await addMember(ctx, actorId(req), projectId, payload.userId, payload.role);
      res.status(201).json({ member });
    } catch (err) {
      next(err);
    }
  }

  async function patchMemberRole(req: Request, res: Response, next: NextFunction) {
    try {
      const projectId = parseId(req.params.id);
      const userId = parseId(req.params.userId);
      if (projectId === null || userId === null) {
        res.status(400).json({ error: "Invalid project or user id" });
        return;
      }

      const role = parseMemberRole(asRecord(req.body).role);
      if (role === null) {
        res.status(400).json({ error: "Role must be viewer, member, or admin" });
        return;
      }

      const member = await updateMemberRole(ctx, actorId(req), projectId, userId, role);
      res.status(200).json({ member });
    } catch (err) {
      next(err);
    }
  }

  async function deleteMember(req: Request, res: Response, next: NextFunction) {
    try {
      const projectId = parseId(req.params.id);
      const userId = parseId(req.params.userId);
      if (projectId === null || userId === null) {
        res.status(400).json({ error: "Invalid project or user id" });
        return;
      }

      await removeMember(ctx, actorId(req), projectId, userId);
      res.status(204).send();
    } catch (err) {
      next(err);
    }
  }

  async function getActivity(req: Request, res: Response, next: NextFunction) {
    try {
      const projectId = parseId(req.params.id);
      if (projectId === null) {
        res.status(400).json({ error: "Invalid project id" });
        return;
      }

      const limit = parseLimit(req.query.limit);
      if (limit === null) {
        res.status(400).json({ error: "limit must be a positive integer" });
        return;
      }

      const activity = await projectActivity(ctx, actorId(req), projectId, limit);
      res.status(200).json({ activity });
    } catch (err) {
      next(err);
    }
  }

  return {
    getProjects,
    postProject,
    getProjectById,
    patchProject,
    postArchiveToggle,
    deleteProjectById,
    getMembers,
    postMember,
    patchMemberRole,
    deleteMember,
    getActivity,
  };
}

// --- Validation helpers ---

function parseLimit(value: unknown): number | null {
  const rawValue = queryString(value);
  if (rawValue === undefined) return DEFAULT_ACTIVITY_LIMIT;
  const parsed = Number(rawValue);
  if (!Number.isInteger(parsed) || parsed < 1) return null;
  return parsed;
}

function parseOptionalText(value: unknown, maxLength: number): string | null | undefined {
  if (value === undefined || value === null) return null;
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  if (trimmed.length > maxLength) return undefined;
  return trimmed.length ? trimmed : null;
}

function parseCreateProjectPayload(body: unknown): Parsed<{
  name: string;
  description: string | null;
  color: string | null;
  icon: string | null;
}> {
  const payload = asRecord(body);

  const name = normalizeName(payload.name, NAME_MAX_LENGTH);
  if (name === null) {
    return { ok: false, error: `Name is required and must be 1-${NAME_MAX_LENGTH} characters` };
  }

  if (!isNullableStringPayload(payload.description)) {
    return { ok: false, error: "Description must be a string or null" };
  }

  const color = payload.color;
  if (!isColorPayload(color)) {
    return { ok: false, error: "Color must be a hex value like #1a2b3c" };
  }

  const icon = parseOptionalText(payload.icon, ICON_MAX_LENGTH);
  if (icon === undefined) {
    return { ok: false, error: `Icon must be a string of at most ${ICON_MAX_LENGTH} characters` };
  }

  return {
    ok: true,
    name,
    description: normalizeDescription(payload.description),
    color: color ?? null,
    icon,
  };
}

function parseUpdateProjectPayload(body: unknown): Parsed<{ patch: UpdateProjectInput }> {
  const payload = asRecord(body);

  const fields = ["name", "description", "color", "icon"];
  if (!fields.some((field) => has(payload, field))) {
    return { ok: false, error: "Provide at least one of: name, description, color, icon" };
  }

  const patch: UpdateProjectInput = {};

  if (has(payload, "name")) {
    const name = normalizeName(payload.name, NAME_MAX_LENGTH);
    if (name === null) return { ok: false, error: `Name must be 1-${NAME_MAX_LENGTH} characters` };
    patch.name = name;
  }

  if (has(payload, "description")) {
    if (!isNullableStringPayload(payload.description)) {
      return { ok: false, error: "Description must be a string or null" };
    }
    patch.description = normalizeDescription(payload.description);
  }

  if (has(payload, "color")) {
    const color = payload.color;
    if (!isColorPayload(color)) {
      return { ok: false, error: "Color must be a hex value like #1a2b3c" };
    }
    patch.color = color ?? null;
  }

  if (has(payload, "icon")) {
    const icon = parseOptionalText(payload.icon, ICON_MAX_LENGTH);
    if (icon === undefined) {
      return { ok: false, error: `Icon must be a string of at most ${ICON_MAX_LENGTH} characters` };
    }
    patch.icon = icon;
  }

  return { ok: true, patch };
}

function parseAddMemberPayload(body: unknown): Parsed<{ userId: string; role: MemberRole }> {
  const payload = asRecord(body);

  const userId = payload.userId;
  if (!isIdValue(userId)) {
    return { ok: false, error: "userId is required" };
  }

  let role: MemberRole = "member";
  if (payload.role !== undefined) {
    const parsed = parseMemberRole(payload.role);
    if (parsed === null) return { ok: false, error: "Role must be viewer, member, or admin" };
    role = parsed;
  }

  return { ok: true, userId: userId.toLowerCase(), role };
}
