/**
 * Authentication Middleware
 * Optional shared API token. EventSource cannot set headers, so the token is
 * also accepted as a `token` query parameter.
 */

import { timingSafeEqual } from "crypto";
import type { NextFunction, Request, RequestHandler, Response } from "express";
import { UnauthorizedError } from "../utils/errors.js";

const PUBLIC_PATHS = new Set(["/health", "/ready"]);

function sameToken(candidate: string | undefined, token: string): boolean {
  if (!candidate) {
    return false;
  }
  const a = Buffer.from(candidate);
  const b = Buffer.from(token);
  return a.length === b.length && timingSafeEqual(a, b);
}

export function presentedTokens(req: Request): string[] {
  const tokens: string[] = [];
  const authHeader = req.headers.authorization;
  if (authHeader?.startsWith("Bearer ")) {
    tokens.push(authHeader.substring(7));
  }
  const apiKey = req.headers["x-api-key"];
  if (typeof apiKey === "string") {
    tokens.push(apiKey);
  }
  if (typeof req.query.token === "string") {
    tokens.push(req.query.token);
  }
  return tokens;
}

/**
 * Requires the API token on every route except health checks.
 * Without a configured token the middleware lets everything through.
 */
export function requireApiToken(token: string | undefined): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    if (!token || PUBLIC_PATHS.has(req.path)) {
      next();
      return;
    }
    if (presentedTokens(req).some((candidate) => sameToken(candidate, token))) {
      next();
      return;
    }
    next(new UnauthorizedError());
  };
}
