/**
 * Configuration for Firebase Functions
 * Reads from environment variables (process.env)
 *
 * Required environment variables:
 * - JWT_SECRET: Signs the session tokens issued by /api/v1/auth
 * - ALLOWED_ORIGINS: Comma-separated list of allowed CORS origins
 *
 * Optional:
 * - OPENAI_API_KEY / OPENAI_MODEL: Enables AI chat replies (falls back to templates without a key)
 * - APPLE_BUNDLE_ID: Expected audience of Sign in with Apple identity tokens (default com.astrolabe.app)
 * - JWT_TTL_DAYS: Session lifetime in days (default 30)
 * - JWT_REFRESH_GRACE_DAYS: How long after expiry a token may still be refreshed (default 7)
 * - RATE_LIMIT_DAILY / RATE_LIMIT_HOURLY: Per-IP request quotas (default 200 / 50)
 * - SENTRY_DSN: Enables error tracking
 * - DEV_ALLOWED_ORIGINS: Extra CORS origins allowed outside production (default http://localhost:3000)
 * - ENFORCE_HTTPS: Reject plain http requests (default: on in production)
 *
 * For production, set secrets via Firebase Functions secrets:
 *   firebase functions:secrets:set JWT_SECRET
 */

const readPositiveInt = (value: string | undefined, fallback: number): number => {
  const parsed = Number.parseInt(value ?? '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

export const openAIConfig = {
  apiKey: process.env.OPENAI_API_KEY || '',
  model: process.env.OPENAI_MODEL || 'gpt-4.1-mini',
};

export const authConfig = {
  jwtSecret: process.env.JWT_SECRET || '',
  tokenTtlDays: readPositiveInt(process.env.JWT_TTL_DAYS, 30),
  refreshGraceDays: readPositiveInt(process.env.JWT_REFRESH_GRACE_DAYS, 7),
  issuer: 'astrolabe-api',
};

export const appleAuthConfig = {
  bundleId: process.env.APPLE_BUNDLE_ID || 'com.astrolabe.app',
};

export const rateLimitConfig = {
  dailyLimit: readPositiveInt(process.env.RATE_LIMIT_DAILY, 200),
  hourlyLimit: readPositiveInt(process.env.RATE_LIMIT_HOURLY, 50),
};

export const securityConfig = {
  enforceHttps: process.env.ENFORCE_HTTPS
    ? process.env.ENFORCE_HTTPS === 'true'
    : process.env.NODE_ENV === 'production',
};

export const corsConfig = {
  // Comma-separated list of allowed origins for CORS
  // Example: "https://app.example.com,https://example.com"
  allowedOrigins: process.env.ALLOWED_ORIGINS || '',
  // Added outside production only; the local web client by default
  devOrigins: process.env.DEV_ALLOWED_ORIGINS || 'http://localhost:3000',
  // Allow development origins when NODE_ENV is not production
  isDevelopment: process.env.NODE_ENV !== 'production',
};

export const serviceInfo = {
  name: 'astrolabe-api',
  version: process.env.SERVICE_VERSION || '0.1.0',
};
