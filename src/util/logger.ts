import pino from "pino";
import { env } from "../config/env.js";

const logger: pino.Logger = pino({
  level: env.LOG_LEVEL,
  base: { service: "taskboard" },
});

export function getLogger(component?: string): pino.Logger {
  return component ? logger.child({ component }) : logger;
}

export default logger;
