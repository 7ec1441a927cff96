import { timingSafeEqual } from "node:crypto";
import { AuthError } from "@opsreg/core";
import type { NextFunction, Request, Response } from "express";

export const CALLER_HEADER = "x-ops-user";

function bearerToken(req: Request): string | undefined {
  const authorization = req.header("authorization");
  return authorization?.startsWith("Bearer ") ? authorization.slice("Bearer ".length).trim() : undefined;
}

export function isAuthorizedAdmin(req: Request, adminToken: string): boolean {
  const providedToken = bearerToken(req);
  const providedTokenBuffer = providedToken ? Buffer.from(providedToken, "utf8") : null;
  const adminTokenBuffer = Buffer.from(adminToken, "utf8");
  return Boolean(
    providedTokenBuffer &&
    providedTokenBuffer.length === adminTokenBuffer.length &&
    timingSafeEqual(providedTokenBuffer, adminTokenBuffer)
  );
}

/**
 * Guards privileged registry routes with the `OPS_ADMIN_TOKEN` bearer token.
 */
export function requireAdminToken(adminToken: string) {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (isAuthorizedAdmin(req, adminToken)) {
      next();
      return;
    }

    res.set("WWW-Authenticate", 'Bearer realm="ops", error="invalid_token"');
    res.status(401).json({
      error: {
        code: "UNAUTHORIZED",
        message: "Invalid admin token"
      }
    });
  };
}

// Identity is verified upstream; the gateway forwards the caller in a header.
export function readCaller(req: Request): string {
  const caller = req.header(CALLER_HEADER)?.trim();
  if (!caller) {
    throw new AuthError("Missing X-Ops-User header");
  }
  return caller;
}
