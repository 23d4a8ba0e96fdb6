import type { NextFunction, Request, Response } from "express";
import { env } from "../config/env.js";
import { verifyIdentityToken } from "../utils/crypto.js";
import { HttpError } from "../utils/errors.js";

export function requireAuth(request: Request, response: Response, next: NextFunction): void {
  const header = request.headers.authorization;
  const token = header?.startsWith("Bearer ") ? header.slice("Bearer ".length) : "";
  if (!token) {
    response.status(401).json({
      error: {
        code: "UNAUTHORIZED",
        message: "Missing Bearer token.",
      },
    });
    return;
  }
  const identity = verifyIdentityToken(token, env.AUTH_SECRET);
  if (!identity) {
    response.status(401).json({
      error: {
        code: "UNAUTHORIZED",
        message: "Invalid token.",
      },
    });
    return;
  }
  request.callerId = identity;
  next();
}

export function callerOf(request: Request): string {
  if (!request.callerId) {
    throw new HttpError(401, "UNAUTHORIZED", "Caller identity missing.");
  }
  return request.callerId;
}
