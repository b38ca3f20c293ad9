import { Router } from "express";
import type { AppContext } from "../context.js";
import { authenticate } from "../middleware/authenticate.js";
import { createCommentsController } from "../controllers/comments.controller.js";

export default function commentsRouter(ctx: AppContext): Router {
  const router = Router();
  const comments = createCommentsController(ctx);

  router.use(["/tasks/:taskId/comments", "/comments"], authenticate);

  router.get("/tasks/:taskId/comments", comments.getComments);
  router.post("/tasks/:taskId/comments", comments.postComment);
  router.patch("/comments/:commentId", comments.patchComment);
  router.delete("/comments/:commentId", comments.deleteCommentById);

  return router;
}
