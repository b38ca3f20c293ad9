import type { Request, Response, NextFunction } from "express";
import { isAppError } from "../errors.js";
import { getLogger } from "../util/logger.js";

const logger = getLogger("http");

export function notFoundHandler(_req: Request, res: Response) {
  res.status(404).json({ error: "Not found", code: "RouteNotFound" });
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  if (isAppError(err)) {
    res.status(err.status).json({ error: err.message, code: err.code });
    return;
  }

  if (isMalformedJson(err)) {
    res.status(400).json({ error: "Malformed JSON body", code: "ValidationError" });
    return;
  }

  logger.error({ err, method: req.method, path: req.path }, "Unhandled error");
  res.status(500).json({ error: "Internal server error" });
}

function isMalformedJson(err: unknown): boolean {
  return (
    err instanceof SyntaxError &&
    "type" in err &&
    err.type === "entity.parse.failed"
  );
}
