import type { NextFunction, Request, Response } from "express";
import type { AppContext } from "../context.js";
import { actorId } from "../middleware/authenticate.js";
import {
  changePassword,
  deactivateAccount,
  getProfile,
  getUser,
  searchUsers,
  updateProfile,
  type UpdateProfileInput,
} from "../services/users.service.js";
import {
  asRecord,
  has,
  MIN_PASSWORD_LENGTH,
  normalizeName,
  parseId,
  queryString,
  type Parsed,
} from "./validation.js";

export function createUsersController(ctx: AppContext) {
  async function getMe(req: Request, res: Response, next: NextFunction) {
    try {
      const user = await getProfile(ctx, actorId(req));
      res.status(200).json({ user });
    } catch (err) {
      next(err);
    }
  }

  async function patchMe(req: Request, res: Response, next: NextFunction) {
    try {
      const payload = parseProfilePayload(req.body);
      if (!payload.ok) {
        res.status(400).json({ error: payload.error });
        return;
      }

      const user = await updateProfile(ctx, actorId(req), payload.patch);
      res.status(200).json({ user });
    } catch (err) {
      next(err);
    }
  }

  async function putPassword(req: Request, res: Response, next: NextFunction) {
    try {
      const { currentPassword, newPassword } = asRecord(req.body);

      if (typeof currentPassword !== "string" || typeof newPassword !== "string") {
        res.status(400).json({ error: "currentPassword and newPassword are required" });
        return;
      }

      if (newPassword.length < MIN_PASSWORD_LENGTH) {
        res.status(400).json({ error: `Password must be at least ${MIN_PASSWORD_LENGTH} characters` });
        return;
      }

      await changePassword(ctx, actorId(req), { currentPassword, newPassword });
      res.status(204).send();
    } catch (err) {
      next(err);
    }
  }

  async function deleteMe(req: Request, res: Response, next: NextFunction) {
    try {
      await deactivateAccount(ctx, actorId(req));
      res.status(204).send();
    } catch (err) {
      next(err);
    }
  }

  async function getSearch(req: Request, res: Response, next: NextFunction) {
    try {
      const users = await searchUsers(ctx, queryString(req.query.q) ?? "");
      res.status(200).json({ users });
    } catch (err) {
      next(err);
    }
  }

  async function getUserById(req: Request, res: Response, next: NextFunction) {
    try {
      const userId = parseId(req.params.userId);
      if (userId === null) {
        res.status(400).json({ error: "Invalid user id" });
        return;
      }

      const user = await getUser(ctx, userId);
      res.status(200).json({ user });
    } catch (err) {
      next(err);
    }
  }

  return { getMe, patchMe, putPassword, deleteMe, getSearch, getUserById };
}

function parseProfilePayload(body: unknown): Parsed<{ patch: UpdateProfileInput }> {
  const payload = asRecord(body);
  const patch: UpdateProfileInput = {};

  if (!has(payload, "displayName") && !has(payload, "avatarUrl")) {
    return { ok: false, error: "Provide at least one of: displayName, avatarUrl" };
  }

  if (has(payload, "displayName")) {
    if (payload.displayName === null) {
      patch.displayName = null;
    } else {
      const displayName = normalizeName(payload.displayName, 100);
      if (displayName === null) return { ok: false, error: "displayName must be 1-100 characters" };
      patch.displayName = displayName;
    }
  }

  if (has(payload, "avatarUrl")) {
    if (payload.avatarUrl === null) {
      patch.avatarUrl = null;
    } else {
      const avatarUrl = normalizeName(payload.avatarUrl, 500);
      if (avatarUrl === null || !URL.canParse(avatarUrl)) {
        return { ok: false, error: "avatarUrl must be a URL or null" };
      }
      patch.avatarUrl = avatarUrl;
    }
  }

  return { ok: true, patch };
}
