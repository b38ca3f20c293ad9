import { Router } from "express";
import type { AppContext } from "../context.js";
import { authenticate } from "../middleware/authenticate.js";
import { createTasksController } from "../controllers/tasks.controller.js";

export default function tasksRouter(ctx: AppContext): Router {
  const router = Router();
  const tasks = createTasksController(ctx);

  router.use(["/projects/:id/tasks", "/tasks"], authenticate);

  // Project-scoped routes
  router.get("/projects/:id/tasks", tasks.getProjectTasks);
  router.post("/projects/:id/tasks", tasks.createNewTask);

  // Task-scoped routes; access is resolved from the task's project
  router.get("/tasks", tasks.getTasks);
  router.get("/tasks/:taskId", tasks.getTaskById);
  router.patch("/tasks/:taskId", tasks.patchTask);
  router.delete("/tasks/:taskId", tasks.deleteTaskById);
  router.put("/tasks/:taskId/status", tasks.putTaskStatus);
  router.post("/tasks/:taskId/complete", tasks.postCompleteTask);
  router.put("/tasks/:taskId/assignee", tasks.putTaskAssignee);
  router.get("/tasks/:taskId/history", tasks.getTaskHistory);
  router.post("/tasks/:taskId/tags", tasks.postTaskTags);
  router.delete("/tasks/:taskId/tags/:tagId", tasks.deleteTaskTag);

  return router;
}
