import { Router } from "express";
import type { AppContext } from "../context.js";
import { createAuthController } from "../controllers/auth.controller.js";

export default function authRouter(ctx: AppContext): Router {
  const router = Router();
  const { signup, signin } = createAuthController(ctx);

  router.post("/auth/signup", signup);
  router.post("/auth/login", signin);

  return router;
}
