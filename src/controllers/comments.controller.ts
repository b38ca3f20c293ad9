import type { NextFunction, Request, Response } from "express";
import type { AppContext } from "../context.js";
import { actorId } from "../middleware/authenticate.js";
import {
  addComment,
  deleteComment,
  editComment,
  listComments,
} from "../services/comments.service.js";
import { asRecord, normalizeName, parseId } from "./validation.js";

const CONTENT_MAX_LENGTH = 5000;

export function createCommentsController(ctx: AppContext) {
  async function getComments(req: Request, res: Response, next: NextFunction) {
    try {
      const taskId = parseId(req.params.taskId);
      if (taskId === null) {
        res.status(400).json({ error: "Invalid task id" });
        return;
      }

      const comments = await listComments(ctx, actorId(req), taskId);
      res.status(200).json({ comments });
    } catch (err) {
      next(err);
    }
  }

  async function postComment(req: Request, res: Response, next: NextFunction) {
    try {
      const taskId = parseId(req.params.taskId);
      if (taskId === null) {
        res.status(400).json({ error: "Invalid task id" });
        return;
      }

      const content = normalizeName(asRecord(req.body).content, CONTENT_MAX_LENGTH);
      if (content === null) {
        res.status(400).json({ error: `Content must be 1-${CONTENT_MAX_LENGTH} characters` });
        return;
      }

      const comment = await addComment(ctx, actorId(req), taskId, content);
      res.status(201).json({ comment });
    } catch (err) {
      next(err);
    }
  }

  async function patchComment(req: Request, res: Response, next: NextFunction) {
    try {
      const commentId = parseId(req.params.commentId);
      if (commentId === null) {
        res.status(400).json({ error: "Invalid comment id" });
        return;
      }

      const content = normalizeName(asRecord(req.body).content, CONTENT_MAX_LENGTH);
      if (content === null) {
        res.status(400).json({ error: `Content must be 1-${CONTENT_MAX_LENGTH} characters` });
        return;
      }

      const comment = await editComment(ctx, actorId(req), commentId, content);
      res.status(200).json({ comment });
    } catch (err) {
      next(err);
    }
  }

  async function deleteCommentById(req: Request, res: Response, next: NextFunction) {
    try {
      const commentId = parseId(req.params.commentId);
      if (commentId === null) {
        res.status(400).json({ error: "Invalid comment id" });
        return;
      }

      await deleteComment(ctx, actorId(req), commentId);
      res.status(204).send();
    } catch (err) {
      next(err);
    }
  }

  return { getComments, postComment, patchComment, deleteCommentById };
}
