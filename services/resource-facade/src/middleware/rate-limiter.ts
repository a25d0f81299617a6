import type { Request, Response, NextFunction, RequestHandler } from 'express';

export interface RateLimitConfig {
  windowMs: number;
  maxRequests: number;
  keyGenerator?: (req: Request) => string;
  now?: () => number;
}

export interface RateLimitInfo {
  limit: number;
  remaining: number;
  /** Timestamp when the window resets */
  reset: number;
  /** Seconds until retry is allowed */
  retryAfter?: number;
}

/**
 * Fixed-window request limiter, keyed per client.
 */
export class RateLimiter {
  private readonly requests: Map<string, { count: number; resetTime: number }> = new Map();
  private readonly keyGenerator: (req: Request) => string;
  private readonly now: () => number;
  private readonly cleanupTimer: NodeJS.Timeout;

  constructor(private readonly config: RateLimitConfig) {
    this.keyGenerator = config.keyGenerator ?? ((req: Request) => req.ip ?? 'unknown');
    this.now = config.now ?? Date.now;

    this.cleanupTimer = setInterval(() => this.cleanupExpiredEntries(), Math.max(config.windowMs, 1000));
    this.cleanupTimer.unref();
  }

  /**
   * Express middleware for rate limiting
   */
  middleware(): RequestHandler {
    return (req: Request, res: Response, next: NextFunction): void => {
      const key = this.keyGenerator(req);
      const now = this.now();

      let window = this.requests.get(key);
      if (!window || window.resetTime <= now) {
        window = { count: 0, resetTime: now + this.config.windowMs };
        this.requests.set(key, window);
      }

      if (window.count >= this.config.maxRequests) {
        const retryAfter = Math.ceil((window.resetTime - now) / 1000);
        res.set({
          'X-RateLimit-Limit': this.config.maxRequests.toString(),
          'X-RateLimit-Remaining': '0',
          'X-RateLimit-Reset': new Date(window.resetTime).toISOString(),
          'Retry-After': retryAfter.toString(),
        });
        res.status(429).json({
          success: false,
          error: 'RATE_LIMITED',
          message: 'Rate limit exceeded',
          retryAfter,
          timestamp: new Date(now).toISOString(),
        });
        return;
      }

      window.count++;
      const remaining = Math.max(0, this.config.maxRequests - window.count);
      res.set({
        'X-RateLimit-Limit': this.config.maxRequests.toString(),
        'X-RateLimit-Remaining': remaining.toString(),
        'X-RateLimit-Reset': new Date(window.resetTime).toISOString(),
      });

      const info: RateLimitInfo = { limit: this.config.maxRequests, remaining, reset: window.resetTime };
      res.locals['rateLimit'] = info;
      next();
    };
  }

  getInfo(key: string): RateLimitInfo | null {
    const window = this.requests.get(key);
    if (!window) return null;

    const now = this.now();
    if (window.resetTime <= now) {
      return { limit: this.config.maxRequests, remaining: this.config.maxRequests, reset: now + this.config.windowMs };
    }
    const remaining = Math.max(0, this.config.maxRequests - window.count);
    return {
      limit: this.config.maxRequests,
      remaining,
      reset: window.resetTime,
      retryAfter: remaining === 0 ? Math.ceil((window.resetTime - now) / 1000) : undefined,
    };
  }

  reset(key: string): void {
    this.requests.delete(key);
  }

  close(): void {
    clearInterval(this.cleanupTimer);
    this.requests.clear();
  }

  private cleanupExpiredEntries(): void {
    const now = this.now();
    for (const [key, window] of this.requests) {
      if (window.resetTime <= now) {
        this.requests.delete(key);
      }
    }
  }
}
