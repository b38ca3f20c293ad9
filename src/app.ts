import express, { type Express } from "express";
import cors from "cors";
import type { AppContext } from "./context.js";
import healthRouter from "./routes/health.js";
import authRouter from "./routes/auth.js";
import usersRouter from "./routes/users.js";
import projectsRouter from "./routes/projects.js";
import tasksRouter from "./routes/tasks.js";
import tagsRouter from "./routes/tags.js";
import commentsRouter from "./routes/comments.js";
import { errorHandler, notFoundHandler } from "./middleware/errorHandler.js";

export function createApp(ctx: AppContext): Express {
  const app = express();

  app.use(cors());
  app.use(express.json());

  app.use(healthRouter);
  app.use(authRouter(ctx));
  app.use(usersRouter(ctx));
  app.use(projectsRouter(ctx));
  app.use(tasksRouter(ctx));
  app.use(tagsRouter(ctx));
  app.use(commentsRouter(ctx));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
