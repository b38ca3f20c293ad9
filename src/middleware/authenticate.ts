import type { Request, Response, NextFunction } from "express";
import { verifyToken } from "../services/auth.service.js";
import { UnauthorizedError } from "../errors.js";

declare global {
  namespace Express {
    interface Request {
      user?: { userId: string };
    }
  }
}

export function authenticate(req: Request, _res: Response, next: NextFunction) {
  const header = req.headers.authorization;
  if (!header?.startsWith("Bearer ")) {
    next(new UnauthorizedError("Authentication required"));
    return;
  }

  try {
    req.user = verifyToken(header.slice("Bearer ".length));
    next();
  } catch (err) {
    next(err);
  }
}

/** The authenticated user's id; only valid behind `authenticate`. */
export function actorId(req: Request): string {
  if (!req.user) {
    throw new UnauthorizedError("Authentication required");
  }
  return req.user.userId;
}
