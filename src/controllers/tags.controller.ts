import type { NextFunction, Request, Response } from "express";
import type { AppContext } from "../context.js";
import { actorId } from "../middleware/authenticate.js";
import {
  createTag,
  deleteTag,
  getTag,
  listTags,
  updateTag,
  type UpdateTagInput,
} from "../services/tags.service.js";
import {
  asRecord,
  has,
  isColorPayload,
  normalizeName,
  parseId,
  parseNullableId,
  queryString,
  type Parsed,
} from "./validation.js";

const NAME_MAX_LENGTH = 50;

export function createTagsController(ctx: AppContext) {
  async function getTags(req: Request, res: Response, next: NextFunction) {
    try {
      const rawProjectId = queryString(req.query.projectId);
      let projectId: string | undefined;
      if (rawProjectId !== undefined) {
        const parsed = parseId(rawProjectId);
        if (parsed === null) {
          res.status(400).json({ error: "Invalid project id" });
          return;
        }
        projectId = parsed;
      }

      const tags = await listTags(ctx, actorId(req), { projectId });
      res.status(200).json({ tags });
    } catch (err) {
      next(err);
    }
  }

  async function postTag(req: Request, res: Response, next: NextFunction) {
    try {
      const payload = parseCreateTagPayload(req.body);
      if (!payload.ok) {
        res.status(400).json({ error: payload.error });
        return;
      }

      const { ok: _ok, ...input } = payload;
      const tag = await createTag(ctx, actorId(req), input);
      res.status(201).json({ tag });
    } catch (err) {
      next(err);
    }
  }

  async function getTagById(req: Request, res: Response, next: NextFunction) {
    try {
      const tagId = parseId(req.params.tagId);
      if (tagId === null) {
        res.status(400).json({ error: "Invalid tag id" });
        return;
      }

      const tag = await getTag(ctx, actorId(req), tagId);
      res.status(200).json({ tag });
    } catch (err) {
      next(err);
    }
  }

  async function patchTag(req: Request, res: Response, next: NextFunction) {
    try {
      const tagId = parseId(req.params.tagId);
      if (tagId === null) {
        res.status(400).json({ error: "Invalid tag id" });
        return;
      }

      const payload = parseUpdateTagPayload(req.body);
      if (!payload.ok) {
        res.status(400).json({ error: payload.error });
        return;
      }

      const tag = await updateTag(ctx, actorId(req), tagId, payload.patch);
      res.status(200).json({ tag });
    } catch (err) {
      next(err);
    }
  }

  async function deleteTagById(req: Request, res: Response, next: NextFunction) {
    try {
      const tagId = parseId(req.params.tagId);
      if (tagId === null) {
        res.status(400).json({ error: "Invalid tag id" });
        return;
      }

      await deleteTag(ctx, actorId(req), tagId);
      res.status(204).send();
    } catch (err) {
      next(err);
    }
  }

  return { getTags, postTag, getTagById, patchTag, deleteTagById };
}

function parseCreateTagPayload(
  body: unknown,
): Parsed<{ name: string; color: string | null; projectId: string | null }> {
  const payload = asRecord(body);

  const name = normalizeName(payload.name, NAME_MAX_LENGTH);
  if (name === null) {
    return { ok: false, error: `Name is required and must be 1-${NAME_MAX_LENGTH} characters` };
  }

  const color = payload.color;
  if (!isColorPayload(color)) {
    return { ok: false, error: "Color must be a hex value like #1a2b3c" };
  }

  let projectId: string | null = null;
  if (payload.projectId !== undefined) {
    const parsed = parseNullableId(payload.projectId);
    if (parsed === undefined) return { ok: false, error: "projectId must be a project id or null" };
    projectId = parsed;
  }

  return { ok: true, name, color: color ?? null, projectId };
}

function parseUpdateTagPayload(body: unknown): Parsed<{ patch: UpdateTagInput }> {
  const payload = asRecord(body);

  if (!has(payload, "name") && !has(payload, "color")) {
    return { ok: false, error: "Provide at least one of: name, color" };
  }

  const patch: UpdateTagInput = {};

  if (has(payload, "name")) {
    const name = normalizeName(payload.name, NAME_MAX_LENGTH);
    if (name === null) return { ok: false, error: `Name must be 1-${NAME_MAX_LENGTH} characters` };
    patch.name = name;
  }

  if (has(payload, "color")) {
    const color = payload.color;
    if (!isColorPayload(color)) {
      return { ok: false, error: "Color must be a hex value like #1a2b3c" };
    }
    patch.color = color ?? null;
  }

  return { ok: true, patch };
}
