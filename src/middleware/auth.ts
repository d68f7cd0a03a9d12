/**
 * Auth middleware — JWT verification for the tenant-facing API.
 *
 * wa-ticket-bridge does not manage users or passwords.
 * It verifies HS256 JWTs issued by the admin surface.
 * The JWT must contain: sub (tenant id).
 */

import type { Request, Response, NextFunction, RequestHandler } from "express";
import { jwtVerify } from "jose";

declare global {
  namespace Express {
    interface Request {
      tenantId?: string;
    }
  }
}

export interface AuthOptions {
  secret: string;
  issuer?: string;
}

export function authenticate(opts: AuthOptions): RequestHandler {
  const secret = new TextEncoder().encode(opts.secret);

  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const authHeader = req.headers.authorization;
    if (!authHeader?.startsWith("Bearer ")) {
      res
        .status(401)
        .json({ error: { code: "UNAUTHORIZED", message: "Bearer token required" } });
      return;
    }

    const token = authHeader.slice(7);

    try {
      const { payload } = await jwtVerify(token, secret, {
        algorithms: ["HS256"],
        issuer: opts.issuer,
      });

      if (!payload.sub) {
        res
          .status(401)
          .json({ error: { code: "INVALID_TOKEN", message: "Token must contain sub claim" } });
        return;
      }

      req.tenantId = payload.sub;
      next();
    } catch (err) {
      console.warn("[auth] Token verification failed:", err instanceof Error ? err.message : String(err));
      res
        .status(401)
        .json({ error: { code: "INVALID_TOKEN", message: "Token verification failed" } });
    }
  };
}
