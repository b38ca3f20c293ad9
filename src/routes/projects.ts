import { Router } from "express";
import type { AppContext } from "../context.js";
import { authenticate } from "../middleware/authenticate.js";
import { createProjectsController } from "../controllers/projects.controller.js";

export default function projectsRouter(ctx: AppContext): Router {
  const router = Router();
  const projects = createProjectsController(ctx);

  router.use("/projects", authenticate);

  router.get("/projects", projects.getProjects);
  router.post("/projects", projects.postProject);
  router.get("/projects/:id", projects.getProjectById);
  router.patch("/projects/:id", projects.patchProject);
  router.delete("/projects/:id", projects.deleteProjectById);
  router.post("/projects/:id/archive", projects.postArchiveToggle);
  router.get("/projects/:id/activity", projects.getActivity);
  router.get("/projects/:id/members", projects.getMembers);
  router.post("/projects/:id/members", projects.postMember);
  router.patch("/projects/:id/members/:userId", projects.patchMemberRole);
  router.delete("/projects/:id/members/:userId", projects.deleteMember);

  return router;
}
