import bcrypt from "bcrypt";
import jwt, { type JwtPayload } from "jsonwebtoken";
import { env } from "../config/env.js";
import type { AppContext } from "../context.js";
import type { PublicUser, UserRecord } from "../db/records.js";
import { toPublicUser } from "../db/records.js";
import { ConflictError, UnauthorizedError } from "../errors.js";
import { newId, nowIso } from "../util/ids.js";

export interface TokenPayload {
  userId: string;
}

export interface RegisterInput {
  username: string;
  email: string;
  password: string;
  displayName?: string | null;
}

export interface LoginInput {
  /** Username or e-mail address. */
  login: string;
  password: string;
}

export interface AuthResult {
  token: string;
  user: PublicUser;
}

export function hashPassword(plain: string): Promise<string> {
  return bcrypt.hash(plain, env.BCRYPT_ROUNDS);
}

export function comparePassword(plain: string, hash: string): Promise<boolean> {
  return bcrypt.compare(plain, hash);
}

export function signToken(payload: TokenPayload): string {
  return jwt.sign(payload, env.JWT_SECRET, { expiresIn: env.JWT_EXPIRES_IN_SECONDS });
}

export function verifyToken(token: string): TokenPayload {
  let decoded: string | JwtPayload;
  try {
    decoded = jwt.verify(token, env.JWT_SECRET);
  } catch {
    throw new UnauthorizedError("Invalid or expired token");
  }

  if (typeof decoded === "string" || typeof decoded.userId !== "string") {
    throw new UnauthorizedError("Invalid or expired token");
  }
  return { userId: decoded.userId };
}

export async function register(ctx: AppContext, input: RegisterInput): Promise<AuthResult> {
  const passwordHash = await hashPassword(input.password);

  const user = await ctx.store.transaction(async (repos) => {
    if (await repos.findUserByUsername(input.username)) {
      throw new ConflictError("UsernameTaken", "Username already taken");
    }
    if (await repos.findUserByEmail(input.email)) {
      throw new ConflictError("EmailTaken", "Email already registered");
    }

    const at = nowIso();
    const record: UserRecord = {
      id: newId(),
      username: input.username,
      email: input.email,
      passwordHash,
      displayName: input.displayName ?? null,
      avatarUrl: null,
      isActive: true,
      lastLoginAt: null,
      createdAt: at,
      updatedAt: at,
    };
    await repos.insertUser(record);
    return record;
  });

  return { token: signToken({ userId: user.id }), user: toPublicUser(user) };
}

export async function login(ctx: AppContext, input: LoginInput): Promise<AuthResult> {
  const user = await ctx.store.run(async (repos) => {
    return input.login.includes("@")
      ? repos.findUserByEmail(input.login)
      : repos.findUserByUsername(input.login);
  });

  if (!user || !user.isActive) {
    throw new UnauthorizedError("Invalid username or password");
  }

  const match = await comparePassword(input.password, user.passwordHash);
  if (!match) {
    throw new UnauthorizedError("Invalid username or password");
  }

  // The row may have changed while bcrypt ran; only lastLoginAt is written.
  const loggedIn = await ctx.store.transaction(async (repos) => {
    const current = await repos.findUserById(user.id);
    if (!current || !current.isActive) {
      throw new UnauthorizedError("Invalid username or password");
    }
    const next: UserRecord = { ...current, lastLoginAt: nowIso() };
    await repos.updateUser(next);
    return next;
  });

  return { token: signToken({ userId: loggedIn.id }), user: toPublicUser(loggedIn) };
}
