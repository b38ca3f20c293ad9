import type { AppContext } from "../context.js";
import type { PublicUser, UserRecord } from "../db/records.js";
import { toPublicUser } from "../db/records.js";
import type { Repositories } from "../db/store.js";
import { NotFoundError, ValidationError } from "../errors.js";
import { nowIso } from "../util/ids.js";
import { comparePassword, hashPassword } from "./auth.service.js";

export const MIN_SEARCH_LENGTH = 2;
export const SEARCH_LIMIT = 20;

export interface UpdateProfileInput {
  displayName?: string | null;
  avatarUrl?: string | null;
}

export interface ChangePasswordInput {
  currentPassword: string;
  newPassword: string;
}

export async function getProfile(ctx: AppContext, actorId: string): Promise<PublicUser> {
  const user = await ctx.store.run((repos) => findActiveUser(repos, actorId));
  return toPublicUser(user);
}

export async function getUser(ctx: AppContext, userId: string): Promise<PublicUser> {
  const user = await ctx.store.run((repos) => findActiveUser(repos, userId));
  return toPublicUser(user);
}

export async function updateProfile(
  ctx: AppContext,
  actorId: string,
  patch: UpdateProfileInput,
): Promise<PublicUser> {
  const user = await ctx.store.transaction(async (repos) => {
    const current = await findActiveUser(repos, actorId);
    const next: UserRecord = {
      ...current,
      displayName: patch.displayName !== undefined ? patch.displayName : current.displayName,
      avatarUrl: patch.avatarUrl !== undefined ? patch.avatarUrl : current.avatarUrl,
      updatedAt: nowIso(),
    };
    await repos.updateUser(next);
    return next;
  });
  return toPublicUser(user);
}

export async function changePassword(
  ctx: AppContext,
  actorId: string,
  input: ChangePasswordInput,
): Promise<void> {
  const user = await ctx.store.run((repos) => findActiveUser(repos, actorId));

  if (!(await comparePassword(input.currentPassword, user.passwordHash))) {
    throw new ValidationError("Current password is incorrect");
  }

  const passwordHash = await hashPassword(input.newPassword);
  await ctx.store.transaction(async (repos) => {
    const current = await findActiveUser(repos, actorId);
    await repos.updateUser({ ...current, passwordHash, updatedAt: nowIso() });
  });
}

/** Soft delete. The row stays so that history keeps pointing at it. */
export async function deactivateAccount(ctx: AppContext, actorId: string): Promise<void> {
  await ctx.store.transaction(async (repos) => {
    const current = await findActiveUser(repos, actorId);
    await repos.updateUser({ ...current, isActive: false, updatedAt: nowIso() });
  });
}

export async function searchUsers(ctx: AppContext, term: string): Promise<PublicUser[]> {
  const trimmed = term.trim();
  if (trimmed.length < MIN_SEARCH_LENGTH) {
    throw new ValidationError(`Search term must be at least ${MIN_SEARCH_LENGTH} characters`);
  }

  const users = await ctx.store.run((repos) => repos.searchUsers(trimmed, SEARCH_LIMIT));
  return users.map(toPublicUser);
}

async function findActiveUser(repos: Repositories, userId: string): Promise<UserRecord> {
  const user = await repos.findUserById(userId);
  if (!user || !user.isActive) {
    throw new NotFoundError("UserNotFound", "User not found");
  }
  return user;
}
