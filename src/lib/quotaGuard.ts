import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { CheckResult } from '../types';
import type { KeyGenerator } from './keys';
import { silentLogger, type Logger } from './logger';
import type { QuotaGate } from './quotaGate';

export type QuotaGuardOptions = {
  gate: QuotaGate;
  // scopes the gate per caller; without it every request shares the gate's prefix
  keyGenerator?: KeyGenerator;
  tokenCost?: (req: Request) => number;
  logger?: Logger;
  hooks?: {
    onAllowed?: (info: { key?: string; result: CheckResult; req: Request }) => void;
    onBlocked?: (info: { key?: string; result: CheckResult; req: Request }) => void;
    onError?: (info: { error: unknown; req: Request }) => void;
  };
};

function gateFor(gate: QuotaGate, req: Request, keyGenerator?: KeyGenerator): { gate: QuotaGate; key?: string } {
  if (!keyGenerator) return { gate };
  const key = keyGenerator(req);
  return { gate: gate.scoped(key), key };
}

function toSeconds(ms: number): number {
  return Math.ceil(ms / 1000);
}

function setQuotaHeaders(res: Response, gate: QuotaGate, result: CheckResult): void {
  const { requestsPerMinute, tokensPerMinute, requestsPerDay } = gate.config;
  res.setHeader('X-RateLimit-Limit', String(requestsPerMinute));
  res.setHeader('X-RateLimit-Remaining', String(Math.max(0, requestsPerMinute - result.currentRequests)));
  const resetMs = result.violated === 'requests_per_day' ? result.resetDayMs : result.resetMinuteMs;
  res.setHeader('X-RateLimit-Reset', String(toSeconds(resetMs)));
  res.setHeader('X-Quota-Tokens-Remaining', String(Math.max(0, tokensPerMinute - result.currentTokens)));
  res.setHeader('X-Quota-Day-Remaining', String(Math.max(0, requestsPerDay - result.currentDayRequests)));
}

export function quotaGuard(options: QuotaGuardOptions): RequestHandler {
  const { gate, keyGenerator, tokenCost = () => 0, logger = silentLogger, hooks } = options;

  return async function quotaGuardMiddleware(req: Request, res: Response, next: NextFunction) {
    try {
      const scoped = gateFor(gate, req, keyGenerator);
      const result = await scoped.gate.checkAndIncrement(tokenCost(req));
      setQuotaHeaders(res, scoped.gate, result);

      if (!result.allowed) {
        const retryMs = result.violated === 'requests_per_day' ? result.resetDayMs : result.resetMinuteMs;
        res.setHeader('Retry-After', String(toSeconds(retryMs)));
        hooks?.onBlocked?.({ key: scoped.key, result, req });
        res.status(429).json({ error: 'Too Many Requests', reason: result.rejectionReason, violated: result.violated });
        return;
      }
      hooks?.onAllowed?.({ key: scoped.key, result, req });
      next();
    } catch (error) {
      logger.warn('quota check failed', { method: req.method, path: req.path, error });
      hooks?.onError?.({ error, req });
      next(error);
    }
  };
}

export type QuotaUsageOptions = {
  gate: QuotaGate;
  keyGenerator?: KeyGenerator;
};

/** Read-only handler reporting the caller's current usage. */
export function quotaUsage(options: QuotaUsageOptions): RequestHandler {
  const { gate, keyGenerator } = options;

  return async function quotaUsageHandler(req: Request, res: Response, next: NextFunction) {
    try {
      const scoped = gateFor(gate, req, keyGenerator);
      const usage = await scoped.gate.getCurrentUsage();
      res.setHeader('Cache-Control', 'no-cache, no-store, must-revalidate');
      res.status(200).json({ key: scoped.key, limits: scoped.gate.config, usage });
    } catch (error) {
      next(error);
    }
  };
}
