/**
 * Rate Limiting Middleware
 * Fixed-window admission control per client, backed by FixedWindowLimiter.
 * Health and status-stream endpoints are never throttled.
 */

import type { NextFunction, Request, RequestHandler, Response } from "express";
import rateLimit, { type ClientRateLimitInfo, type Store } from "express-rate-limit";
import { FixedWindowLimiter, retryAfterSeconds } from "../services/business/admissionControl.js";
import { RateLimitError } from "../utils/errors.js";

export const RATE_LIMIT_WINDOW_MS = 60 * 1000;

const EXEMPT_PATHS = new Set(["/health", "/ready"]);

/**
 * Client identity: first X-Forwarded-For entry, then X-Real-IP, then the socket address.
 */
export function clientIdentity(req: Request): string {
  const forwarded = req.headers["x-forwarded-for"];
  const first = (Array.isArray(forwarded) ? forwarded[0] : forwarded)?.split(",")[0]?.trim();
  if (first) {
    return first;
  }
  const realIp = req.headers["x-real-ip"];
  const real = (Array.isArray(realIp) ? realIp[0] : realIp)?.trim();
  if (real) {
    return real;
  }
  return req.socket.remoteAddress || "unknown";
}

export function isExemptFromRateLimit(path: string): boolean {
  return EXEMPT_PATHS.has(path) || path.endsWith("/events");
}

/**
 * express-rate-limit store that delegates counting to FixedWindowLimiter.
 */
export class FixedWindowStore implements Store {
  localKeys = true;

  constructor(private readonly limiter: FixedWindowLimiter) {}

  increment(key: string): ClientRateLimitInfo {
    const decision = this.limiter.allow(key);
    return {
      totalHits: decision.allowed ? this.limiter.limit - decision.remaining : this.limiter.limit + 1,
      resetTime: decision.resetTime,
    };
  }

  decrement(key: string): void {
    this.limiter.release(key);
  }

  resetKey(key: string): void {
    this.limiter.reset(key);
  }

  resetAll(): void {
    this.limiter.resetAll();
  }
}

function passThrough(_req: Request, _res: Response, next: NextFunction): void {
  next();
}

/**
 * Builds the limiter middleware. A limit of 0 (or less) disables admission control.
 */
export function createRateLimiter(
  limitPerWindow: number,
  windowMs: number = RATE_LIMIT_WINDOW_MS,
  now?: () => number
): RequestHandler {
  if (limitPerWindow <= 0) {
    return passThrough;
  }

  const limiter = new FixedWindowLimiter(limitPerWindow, windowMs, now);

  return rateLimit({
    windowMs,
    limit: limitPerWindow,
    store: new FixedWindowStore(limiter),
    keyGenerator: (req) => clientIdentity(req),
    skip: (req) => isExemptFromRateLimit(req.path),
    standardHeaders: false,
    legacyHeaders: true, // X-RateLimit-Limit / X-RateLimit-Remaining
    handler: (req, _res, next) => {
      next(new RateLimitError(retryAfterSeconds(limiter.retryAfterMs(clientIdentity(req)))));
    },
    // Identity comes from forwarding headers on purpose; trust proxy is not required.
    validate: { xForwardedForHeader: false },
  });
}
