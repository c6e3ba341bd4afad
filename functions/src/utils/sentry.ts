/**
 * Sentry error tracking for the API.
 *
 * Disabled unless SENTRY_DSN is set. Events leave without session tokens,
 * Apple identity tokens or birth details: request bodies and coordinates in
 * query strings are redacted field by field.
 */

import * as Sentry from '@sentry/node';
import type { Application, RequestHandler } from 'express';
import * as functions from 'firebase-functions';
import { serviceInfo } from '../config';

const SENTRY_DSN = process.env.SENTRY_DSN || '';
const REDACTED = '[REDACTED]';

// Body and query fields that identify a person or where they were born
const SENSITIVE_FIELDS = new Set([
    'identityToken',
    'email',
    'birthDate',
    'birthTime',
    'birthPlace',
    'birth_date',
    'birth_time',
    'latitude',
    'longitude',
    'lat',
    'lon',
    'partnerName',
    'partnerDOB',
    'partnerBirthDate',
    'gotra',
    'nakshatra',
    'specialRequests',
    'message',
]);

let isInitialized = false;

function redactValue(value: unknown): unknown {
    if (Array.isArray(value)) {
        return value.map(redactValue);
    }
    if (value !== null && typeof value === 'object') {
        return Object.fromEntries(
            Object.entries(value).map(([key, inner]) => [key, SENSITIVE_FIELDS.has(key) ? REDACTED : redactValue(inner)]),
        );
    }
    return value;
}

function redactQueryString(query: string): string {
    const redacted = new URLSearchParams();
    new URLSearchParams(query).forEach((value, key) => {
        redacted.append(key, SENSITIVE_FIELDS.has(key) ? REDACTED : value);
    });
    return redacted.toString();
}

/** `beforeSend` hook; exported for tests. */
export function scrubEvent<E extends Sentry.Event>(event: E): E {
    const request = event.request;
    if (!request) {
        return event;
    }

    if (request.headers) {
        for (const name of Object.keys(request.headers)) {
            if (name.toLowerCase() === 'authorization' || name.toLowerCase() === 'cookie') {
                request.headers[name] = REDACTED;
            }
        }
    }
    if (typeof request.data === 'string') {
        request.data = REDACTED;
    } else if (request.data !== undefined) {
        request.data = redactValue(request.data);
    }
    if (typeof request.query_string === 'string') {
        request.query_string = redactQueryString(request.query_string);
    }
    return event;
}

export function initSentry(): void {
    if (isInitialized) {
        return;
    }
    isInitialized = true;

    if (!SENTRY_DSN) {
        functions.logger.info('[sentry] SENTRY_DSN not configured. Error tracking disabled.');
        return;
    }

    Sentry.init({
        dsn: SENTRY_DSN,
        environment: process.env.NODE_ENV || 'development',
        release: `${serviceInfo.name}@${serviceInfo.version}`,
        tracesSampleRate: process.env.NODE_ENV === 'production' ? 0.1 : 1.0,
        enabled: process.env.NODE_ENV !== 'test',
        beforeSend: (event) => scrubEvent(event),
    });

    functions.logger.info(`[sentry] Initialized for ${serviceInfo.name}@${serviceInfo.version}`);
}

/**
 * Reports an error a route already answered with a 500.
 */
export function captureException(error: unknown, context?: Record<string, unknown>): string | undefined {
    if (!SENTRY_DSN) {
        return undefined;
    }

    return Sentry.withScope((scope) => {
        if (context) {
            scope.setExtras(context);
        }
        return Sentry.captureException(error);
    });
}

/** Tags later events with the signed-in user id only. */
export function setUser(userId: string): void {
    if (!SENTRY_DSN) return;
    Sentry.setUser({ id: userId });
}

/**
 * Registers Sentry's Express error handler. Goes after the routers and
 * before `errorHandler`.
 */
export function setupSentryErrorHandler(app: Application): void {
    if (!SENTRY_DSN) return;
    Sentry.setupExpressErrorHandler(app);
}

/**
 * Tags the Sentry scope with the request id assigned by requestLogger.
 */
export const sentryRequestHandler: RequestHandler = (_req, res, next) => {
    if (SENTRY_DSN) {
        const requestId = res.getHeader('X-Request-ID');
        if (typeof requestId === 'string') {
            Sentry.getCurrentScope().setTag('request_id', requestId);
        }
    }
    next();
};
