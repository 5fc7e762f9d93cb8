/**
 * API Key Authentication & Rate Limiting
 *
 * Keys are compared in constant time and never logged; log lines carry a
 * short sha256 fingerprint instead. Rate limiting is a per-key sliding
 * window held in memory, so limits are per API instance.
 */

import { createHash, createHmac, randomBytes, timingSafeEqual } from 'crypto';
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { logger, rateLimitRejectionsCounter, type ErrorEnvelope } from '@statement-parser/shared';

const RATE_WINDOW_MS = 60_000;

// Per-process key for digesting both sides before comparison
const COMPARE_KEY = randomBytes(32);

export function normalizeApiKey(raw: string | undefined): string {
  if (!raw) return '';
  return raw.trim().replace(/[\r\n]/g, '');
}

export function fingerprintApiKey(key: string): string {
  if (!key) return 'none';
  return createHash('sha256').update(key).digest('hex').slice(0, 16);
}

/**
 * Digests equalize lengths so timingSafeEqual never throws and the
 * comparison time does not depend on where the inputs differ.
 */
export function constantTimeEquals(a: string, b: string): boolean {
  if (!a || !b) return false;
  const left = createHmac('sha256', COMPARE_KEY).update(a).digest();
  const right = createHmac('sha256', COMPARE_KEY).update(b).digest();
  return timingSafeEqual(left, right);
}

// ============================================================================
// Rate Limiter
// ============================================================================

export interface RateLimitDecision {
  allowed: boolean;
  limit: number;
  remaining: number;
  /** Seconds until the oldest request leaves the window (0 when allowed) */
  retryAfterSeconds: number;
}

export class SlidingWindowRateLimiter {
  private readonly requests = new Map<string, number[]>();

  constructor(
    readonly limit: number,
    private readonly windowMs: number = RATE_WINDOW_MS,
    private readonly now: () => number = Date.now
  ) {}

  check(key: string): RateLimitDecision {
    const now = this.now();
    const cutoff = now - this.windowMs;
    const recent = (this.requests.get(key) ?? []).filter((t) => t > cutoff);

    if (recent.length >= this.limit) {
      this.requests.set(key, recent);
      const oldest = recent[0] ?? now;
      return {
        allowed: false,
        limit: this.limit,
        remaining: 0,
        retryAfterSeconds: Math.max(1, Math.ceil((oldest + this.windowMs - now) / 1000)),
      };
    }

    recent.push(now);
    this.requests.set(key, recent);

    return {
      allowed: true,
      limit: this.limit,
      remaining: Math.max(0, this.limit - recent.length),
      retryAfterSeconds: 0,
    };
  }

  reset(): void {
    this.requests.clear();
  }
}

// ============================================================================
// Middleware
// ============================================================================

export interface ApiKeyAuthOptions {
  masterApiKey: string;
  headerName: string;
  limiter: SlidingWindowRateLimiter;
}

function correlationIdOf(res: Response): string {
  const header: unknown = res.getHeader('X-Correlation-Id');
  return typeof header === 'string' ? header : '';
}

function reject(res: Response, status: number, code: string, message: string): void {
  const error: ErrorEnvelope = {
    error: { code, message, correlation_id: correlationIdOf(res) },
  };
  res.status(status).json(error);
}

export function apiKeyAuth(options: ApiKeyAuthOptions): RequestHandler {
  const expected = normalizeApiKey(options.masterApiKey);

  return (req: Request, res: Response, next: NextFunction) => {
    const incoming = normalizeApiKey(req.get(options.headerName));

    if (!expected) {
      logger.error('MASTER_API_KEY not configured');
      reject(res, 500, 'server_misconfigured', 'API key authentication is not configured.');
      return;
    }

    if (!incoming) {
      logger.warn('Missing API key', { ip: req.ip });
      res.setHeader('WWW-Authenticate', 'ApiKey');
      reject(res, 401, 'unauthorized', `Missing API key in ${options.headerName} header.`);
      return;
    }

    const fingerprint = fingerprintApiKey(incoming);

    if (!constantTimeEquals(incoming, expected)) {
      logger.warn('Invalid API key', { ip: req.ip, key_fingerprint: fingerprint });
      res.setHeader('WWW-Authenticate', 'ApiKey');
      reject(res, 401, 'unauthorized', 'Invalid or missing API key.');
      return;
    }

    const decision = options.limiter.check(fingerprint);
    res.setHeader('X-RateLimit-Limit', String(decision.limit));
    res.setHeader('X-RateLimit-Remaining', String(decision.remaining));

    if (!decision.allowed) {
      rateLimitRejectionsCounter.inc();
      logger.warn('Rate limit exceeded', { key_fingerprint: fingerprint, ip: req.ip });
      res.setHeader('Retry-After', String(decision.retryAfterSeconds));
      reject(
        res,
        429,
        'rate_limited',
        `Rate limit exceeded. Max ${decision.limit} requests per minute.`
      );
      return;
    }

    next();
  };
}
