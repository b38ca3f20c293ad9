import type { Request, Response, NextFunction } from "express";
import type { AppContext } from "../context.js";
import { login, register } from "../services/auth.service.js";
import {
  asRecord,
  isEmail,
  isUsername,
  MIN_PASSWORD_LENGTH,
  normalizeName,
} from "./validation.js";

export function createAuthController(ctx: AppContext) {
  async function signup(req: Request, res: Response, next: NextFunction) {
    try {
      const { username, email, password, displayName } = asRecord(req.body);

      if (!username || !email || !password) {
        res.status(400).json({ error: "Username, email, and password are required" });
        return;
      }

      if (!isUsername(username)) {
        res.status(400).json({
          error: "Username must be 3-50 letters, digits, dots, dashes, or underscores",
        });
        return;
      }

      if (!isEmail(email)) {
        res.status(400).json({ error: "Invalid email format" });
        return;
      }

      if (typeof password !== "string" || password.length < MIN_PASSWORD_LENGTH) {
        res.status(400).json({ error: `Password must be at least ${MIN_PASSWORD_LENGTH} characters` });
        return;
      }

      const result = await register(ctx, {
        username,
        email: email.toLowerCase(),
        password,
        displayName: normalizeName(displayName, 100),
      });

      res.status(201).json(result);
    } catch (err) {
      next(err);
    }
  }

  async function signin(req: Request, res: Response, next: NextFunction) {
    try {
      const { login: loginName, password } = asRecord(req.body);

      if (typeof loginName !== "string" || !loginName || typeof password !== "string" || !password) {
        res.status(400).json({ error: "Login and password are required" });
        return;
      }

      const result = await login(ctx, {
        login: loginName.includes("@") ? loginName.toLowerCase() : loginName,
        password,
      });
      res.status(200).json(result);
    } catch (err) {
      next(err);
    }
  }

  return { signup, signin };
}
