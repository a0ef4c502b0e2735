// src/middleware/Auth.middleware.ts
import "reflect-metadata";
import { injectable } from "inversify";
import { BaseMiddleware } from "inversify-express-utils";
import * as express from "express";
import jwt from "jsonwebtoken";

// augment Express.Request with a user field
declare global {
  namespace Express {
    interface Request {
      user?: {
        id: string;
        username?: string;
      };
    }
  }
}

type AuthResult =
  | { status: "anonymous" }
  | { status: "invalid" }
  | { status: "ok"; user: NonNullable<express.Request["user"]> };

export function authenticate(req: express.Request): AuthResult {
  const auth = req.headers.authorization || "";
  const [scheme, token] = auth.split(" ");
  if (scheme !== "Bearer" || !token) return { status: "anonymous" };

  try {
    const secret = process.env.JWT_SECRET || "dev-secret";
    const payload = jwt.verify(token, secret);
    if (typeof payload === "string" || !payload.sub) return { status: "invalid" };

    const username = typeof payload.username === "string" ? payload.username : undefined;
    return { status: "ok", user: { id: payload.sub, username } };
  } catch {
    return { status: "invalid" };
  }
}

@injectable()
export class AuthMiddleware extends BaseMiddleware {
  public handler(req: express.Request, res: express.Response, next: express.NextFunction): void {
    const result = authenticate(req);
    if (result.status === "anonymous") {
      res.status(401).json({ error: "Missing bearer token" });
      return; // ensure void
    }
    if (result.status === "invalid") {
      res.status(401).json({ error: "Invalid or expired token" });
      return;
    }

    req.user = result.user;
    next(); // continue
  }
}

// Routes that anyone can read, but that show more to the owner.
@injectable()
export class OptionalAuthMiddleware extends BaseMiddleware {
  public handler(req: express.Request, _res: express.Response, next: express.NextFunction): void {
    const result = authenticate(req);
    if (result.status === "ok") req.user = result.user;
    next();
  }
}
