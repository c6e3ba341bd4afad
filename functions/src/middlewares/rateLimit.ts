import rateLimit, { RateLimitRequestHandler } from 'express-rate-limit';
import type { Request, Response } from 'express';
import * as functions from 'firebase-functions';
import { rateLimitConfig } from '../config';

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

/**
 * Builds the 429 handler for a named quota window.
 */
export function createRateLimitHandler(windowLabel: string) {
  return (req: Request, res: Response): void => {
    functions.logger.warn(`[rate-limit] IP ${req.ip} exceeded ${windowLabel} rate limit`);
    res.status(429).json({
      code: 'rate_limit_exceeded',
      message: `Too many requests (${windowLabel} limit reached), please try again later.`,
    });
  };
}

export function createLimiter(options: {
  windowMs: number;
  max: number;
  windowLabel: string;
}): RateLimitRequestHandler {
  return rateLimit({
    windowMs: options.windowMs,
    max: options.max,
    standardHeaders: true, // Return rate limit info in `RateLimit-*` headers
    legacyHeaders: false, // Disable `X-RateLimit-*` headers
    handler: createRateLimitHandler(options.windowLabel),
  });
}

/**
 * Daily quota per IP (default 200)
 */
export const dailyLimiter = createLimiter({
  windowMs: DAY_MS,
  max: rateLimitConfig.dailyLimit,
  windowLabel: 'daily',
});

/**
 * Hourly quota per IP (default 50)
 */
export const hourlyLimiter = createLimiter({
  windowMs: HOUR_MS,
  max: rateLimitConfig.hourlyLimit,
  windowLabel: 'hourly',
});

/**
 * Auth rate limiter - prevent brute force attacks
 * 10 failed attempts per 15 minutes per IP
 */
export const authLimiter = rateLimit({
  windowMs: 15 * 60 * 1000,
  max: 10,
  skipSuccessfulRequests: true, // Don't count successful requests
  standardHeaders: true,
  legacyHeaders: false,
  handler: createRateLimitHandler('authentication'),
});
