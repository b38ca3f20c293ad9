import { Router } from "express";
import type { AppContext } from "../context.js";
import { authenticate } from "../middleware/authenticate.js";
import { createTagsController } from "../controllers/tags.controller.js";

export default function tagsRouter(ctx: AppContext): Router {
  const router = Router();
  const tags = createTagsController(ctx);

  router.use("/tags", authenticate);

  router.get("/tags", tags.getTags);
  router.post("/tags", tags.postTag);
  router.get("/tags/:tagId", tags.getTagById);
  router.patch("/tags/:tagId", tags.patchTag);
  router.delete("/tags/:tagId", tags.deleteTagById);

  return router;
}
