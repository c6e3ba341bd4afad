import express, { Router } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import * as functions from 'firebase-functions';
import { astrologyRouter } from './routes/astrology';
import { authRouter } from './routes/auth';
import { bookmarksRouter } from './routes/bookmarks';
import { chartRouter } from './routes/chart';
import { chatRouter } from './routes/chat';
import { discoverRouter } from './routes/discover';
import { ephemerisRouter } from './routes/ephemeris';
import { horoscopeRouter } from './routes/horoscope';
import { locationsRouter } from './routes/locations';
import { matchRouter } from './routes/match';
import { reportsRouter } from './routes/reports';
import { subscriptionsRouter } from './routes/subscriptions';
import { templeRouter } from './routes/temple';
import { usersRouter } from './routes/users';
import { dailyLimiter, hourlyLimiter } from './middlewares/rateLimit';
import { requireHttps } from './middlewares/httpsOnly';
import { requestLogger } from './middlewares/requestLogger';
import { notFound } from './middlewares/notFound';
import { errorHandler } from './middlewares/errorHandler';
import { corsConfig, serviceInfo } from './config';
import { sentryRequestHandler, setupSentryErrorHandler } from './utils/sentry';

export const API_PREFIX = '/api/v1';

const splitOrigins = (value: string): string[] =>
  value.split(',').map((origin) => origin.trim()).filter(Boolean);

export function resolveAllowedOrigins(
  config: { allowedOrigins: string; devOrigins: string; isDevelopment: boolean } = corsConfig,
): string[] {
  const configured = splitOrigins(config.allowedOrigins);
  return config.isDevelopment ? [...configured, ...splitOrigins(config.devOrigins)] : configured;
}

export type CreateAppOptions = {
  /** Per-IP quotas; tests turn them off. */
  rateLimits?: boolean;
};

export function createApp(options: CreateAppOptions = {}): express.Express {
  const app = express();

  // Trust proxy - required for per-IP rate limiting behind the Cloud Functions load balancer
  app.set('trust proxy', true);

  const allowedOrigins = resolveAllowedOrigins();
  if (allowedOrigins.length === 0) {
    functions.logger.warn(
      '[cors] No ALLOWED_ORIGINS configured. API will reject all CORS requests from browsers. ' +
      'Set ALLOWED_ORIGINS environment variable with comma-separated origins.'
    );
  }

  app.use(requireHttps);

  app.use(requestLogger);
  // Runs after requestLogger so the Sentry scope can carry the request id
  app.use(sentryRequestHandler);

  app.use(cors({
    origin: (origin, callback) => {
      // Native clients send no Origin header
      if (!origin) {
        return callback(null, true);
      }

      if (allowedOrigins.includes(origin)) {
        callback(null, true);
        return;
      }

      functions.logger.warn(`[cors] Rejected request from unauthorized origin: ${origin}`);
      callback(new Error(`Origin ${origin} not allowed by CORS policy`));
    },
    credentials: true,
    methods: ['GET', 'POST', 'PATCH', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-User-Id'],
    exposedHeaders: ['X-Request-ID', 'X-Next-Cursor'],
  }));

  app.use(helmet({
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'none'"],
        frameAncestors: ["'none'"],
      },
    },
    hsts: {
      maxAge: 31536000, // 1 year in seconds
      includeSubDomains: true,
      preload: true,
    },
    frameguard: {
      action: 'deny',
    },
    noSniff: true,
    hidePoweredBy: true,
    referrerPolicy: {
      policy: 'no-referrer',
    },
  }));

  app.use(express.json({ limit: '1mb' }));

  const api = Router();

  if (options.rateLimits !== false) {
    api.use(dailyLimiter, hourlyLimiter);
  }

  api.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      service: serviceInfo.name,
      version: serviceInfo.version,
      timestamp: new Date().toISOString(),
    });
  });

  api.use('/ephemeris', ephemerisRouter);
  api.use('/astrology', astrologyRouter);
  api.use('/chart', chartRouter);
  api.use('/horoscope', horoscopeRouter);
  api.use('/location', locationsRouter);
  api.use('/match', matchRouter);
  api.use('/auth', authRouter);
  api.use('/users', usersRouter);
  api.use('/subscription', subscriptionsRouter);
  api.use('/chat', chatRouter);
  api.use('/reports', reportsRouter);
  api.use('/bookmarks', bookmarksRouter);
  api.use('/discover', discoverRouter);
  api.use('/temple', templeRouter);

  app.use(API_PREFIX, api);
  app.use(notFound);

  // Sentry error handler - must come before custom error handler
  setupSentryErrorHandler(app);

  app.use(errorHandler);

  return app;
}
