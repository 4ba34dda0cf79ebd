/**
 * Admission Control
 * Per-client fixed-window request counter. State is process-local; callers only
 * see `allow(key)` so a shared counter can replace it without touching them.
 */

export interface AdmissionDecision {
  allowed: boolean;
  /** Requests left in the current window after this one. */
  remaining: number;
  /** Time until the window resets; 0 when admitted. */
  retryAfterMs: number;
  resetTime: Date;
}

interface WindowEntry {
  count: number;
  resetAt: number;
}

export class FixedWindowLimiter {
  private readonly entries = new Map<string, WindowEntry>();
  private lastEviction: number;

  constructor(
    readonly limit: number,
    readonly windowMs: number,
    private readonly now: () => number = Date.now
  ) {
    if (limit <= 0 || windowMs <= 0) {
      throw new Error("FixedWindowLimiter requires a positive limit and window");
    }
    this.lastEviction = now();
  }

  allow(key: string): AdmissionDecision {
    const now = this.now();
    let entry = this.entries.get(key);
    if (!entry || now > entry.resetAt) {
      entry = { count: 0, resetAt: now + this.windowMs };
      this.entries.set(key, entry);
    }

    const resetTime = new Date(entry.resetAt);
    if (entry.count >= this.limit) {
      this.evictExpired(now);
      return { allowed: false, remaining: 0, retryAfterMs: Math.max(0, entry.resetAt - now), resetTime };
    }

    entry.count++;
    this.evictExpired(now);
    return { allowed: true, remaining: this.limit - entry.count, retryAfterMs: 0, resetTime };
  }

  /** Time until `key` may be admitted again; 0 when it has budget left. */
  retryAfterMs(key: string): number {
    const entry = this.entries.get(key);
    const now = this.now();
    if (!entry || now > entry.resetAt || entry.count < this.limit) {
      return 0;
    }
    return entry.resetAt - now;
  }

  /** Gives back one admission, e.g. for a request the caller decided not to count. */
  release(key: string): void {
    const entry = this.entries.get(key);
    if (entry && entry.count > 0) {
      entry.count--;
    }
  }

  reset(key: string): void {
    this.entries.delete(key);
  }

  resetAll(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  // At most one full scan per window width.
  private evictExpired(now: number): void {
    if (now - this.lastEviction < this.windowMs) {
      return;
    }
    for (const [key, entry] of this.entries) {
      if (now > entry.resetAt) {
        this.entries.delete(key);
      }
    }
    this.lastEviction = now;
  }
}

/** Whole seconds, rounded, never below 1. */
export function retryAfterSeconds(retryAfterMs: number): number {
  return Math.max(1, Math.round(retryAfterMs / 1000));
}
