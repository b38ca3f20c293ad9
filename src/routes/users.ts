import { Router } from "express";
import type { AppContext } from "../context.js";
import { authenticate } from "../middleware/authenticate.js";
import { createUsersController } from "../controllers/users.controller.js";

export default function usersRouter(ctx: AppContext): Router {
  const router = Router();
  const users = createUsersController(ctx);

  router.use("/users", authenticate);

  router.get("/users/me", users.getMe);
  router.patch("/users/me", users.patchMe);
  router.delete("/users/me", users.deleteMe);
  router.put("/users/me/password", users.putPassword);
  router.get("/users/search", users.getSearch);
  router.get("/users/:userId", users.getUserById);

  return router;
}
