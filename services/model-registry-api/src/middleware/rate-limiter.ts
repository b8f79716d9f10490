import { Request, Response, NextFunction, RequestHandler } from 'express';
import { TooManyRequestsError } from '../errors/http-errors.js';

/** Picks the bucket a request counts against */
export type RateLimitKey = (req: Request, res: Response) => string;

export interface RateLimitConfig {
  windowMs: number;
  maxRequests: number;
  key?: RateLimitKey;
  /** Used in log lines */
  name?: string;
}

interface Window {
  count: number;
  resetAt: number;
}

export const byClientIp: RateLimitKey = (req) => `ip:${req.ip ?? 'unknown'}`;

/**
 * Counts per authenticated user; must run after basic auth has set
 * `res.locals.username`, otherwise falls back to the client IP.
 */
export const byAuthenticatedUser: RateLimitKey = (req, res) =>
  typeof res.locals.username === 'string' ? `user:${res.locals.username}` : byClientIp(req, res);

/**
 * Fixed-window request counter. Rejections go to the error handler as
 * 429s carrying `Retry-After`.
 */
export class RateLimiter {
  private windows: Map<string, Window> = new Map();
  private readonly windowMs: number;
  private readonly maxRequests: number;
  private readonly key: RateLimitKey;
  private readonly name: string;
  private sweepTimer: NodeJS.Timeout;

  constructor(config: RateLimitConfig) {
    this.windowMs = config.windowMs;
    this.maxRequests = config.maxRequests;
    this.key = config.key ?? byClientIp;
    this.name = config.name ?? 'global';

    this.sweepTimer = setInterval(() => this.sweep(), 60000);
    this.sweepTimer.unref();
  }

  middleware(): RequestHandler {
    return (req: Request, res: Response, next: NextFunction): void => {
      const now = Date.now();
      const window = this.windowFor(this.key(req, res), now);
      const allowed = window.count < this.maxRequests;
      if (allowed) {
        window.count++;
      }

      res.set({
        'X-RateLimit-Limit': this.maxRequests.toString(),
        'X-RateLimit-Remaining': Math.max(0, this.maxRequests - window.count).toString(),
        'X-RateLimit-Reset': Math.ceil(window.resetAt / 1000).toString()
      });

      if (!allowed) {
        next(new TooManyRequestsError(Math.ceil((window.resetAt - now) / 1000)));
        return;
      }
      next();
    };
  }

  stop(): void {
    clearInterval(this.sweepTimer);
  }

  private windowFor(key: string, now: number): Window {
    const current = this.windows.get(key);
    if (current && current.resetAt > now) {
      return current;
    }
    const fresh = { count: 0, resetAt: now + this.windowMs };
    this.windows.set(key, fresh);
    return fresh;
  }

  private sweep(): void {
    const now = Date.now();
    let removed = 0;
    for (const [key, window] of this.windows) {
      if (window.resetAt <= now) {
        this.windows.delete(key);
        removed++;
      }
    }
    if (removed > 0) {
      console.log(`Cleaned up ${removed} expired ${this.name} rate limit windows`);
    }
  }
}

/**
 * User administration: 100 requests per 15 minutes for each authenticated user
 */
export function adminRateLimiter(): RateLimiter {
  return new RateLimiter({
    windowMs: 15 * 60 * 1000,
    maxRequests: 100,
    key: byAuthenticatedUser,
    name: 'admin'
  });
}
