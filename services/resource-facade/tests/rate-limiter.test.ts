import { describe, it, expect, afterEach } from 'vitest';
import express, { type Express } from 'express';
import request from 'supertest';
import { RateLimiter } from '../src/middleware/rate-limiter.js';

describe('RateLimiter', () => {
  let limiter: RateLimiter;
  let now: number;

  afterEach(() => {
    limiter.close();
  });

  function appWith(maxRequests: number): Express {
    now = 1_000_000;
    limiter = new RateLimiter({ windowMs: 60_000, maxRequests, keyGenerator: () => 'client-a', now: () => now });
    const app = express();
    app.use(limiter.middleware());
    app.get('/ping', (req, res) => {
      res.json({ remaining: res.locals['rateLimit'].remaining });
    });
    return app;
  }

  it('should count down the remaining requests', async () => {
    const app = appWith(3);

    const first = await request(app).get('/ping');
    const second = await request(app).get('/ping');

    expect(first.body).toEqual({ remaining: 2 });
    expect(second.headers['x-ratelimit-remaining']).toBe('1');
    expect(second.headers['x-ratelimit-limit']).toBe('3');
  });

  it('should answer 429 with Retry-After once the window is used up', async () => {
    const app = appWith(1);
    await request(app).get('/ping');

    now += 15_000;
    const limited = await request(app).get('/ping');

    expect(limited.status).toBe(429);
    expect(limited.headers['retry-after']).toBe('45');
    expect(limited.body).toMatchObject({ success: false, error: 'RATE_LIMITED', retryAfter: 45 });
    expect(limiter.getInfo('client-a')).toEqual({ limit: 1, remaining: 0, reset: 1_060_000, retryAfter: 45 });
  });

  it('should start a new window after the old one ends', async () => {
    const app = appWith(1);
    await request(app).get('/ping');

    now += 60_000;
    const next = await request(app).get('/ping');

    expect(next.status).toBe(200);
  });

  it('should forget a client on reset', async () => {
    const app = appWith(1);
    await request(app).get('/ping');

    limiter.reset('client-a');

    expect(limiter.getInfo('client-a')).toBeNull();
    expect((await request(app).get('/ping')).status).toBe(200);
  });
});
