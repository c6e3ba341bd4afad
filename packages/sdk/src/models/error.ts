/**
 * API Error Model
 */

export type ApiErrorKind =
  | 'offline'
  | 'timeout'
  | 'tokenExpired'
  | 'serverError'
  | 'decodingError'
  | 'noData';

export interface ApiErrorInit {
  status?: number;
  code?: string;
  userMessage?: string;
  details?: unknown;
  body?: unknown;
  retriable?: boolean;
}

export class ApiError extends Error {
  readonly kind: ApiErrorKind;
  readonly status?: number;
  readonly code?: string;
  readonly userMessage?: string;
  readonly details?: unknown;
  readonly body?: unknown;
  readonly retriable: boolean;

  constructor(kind: ApiErrorKind, message: string, init: ApiErrorInit = {}) {
    super(message);
    this.name = 'ApiError';
    this.kind = kind;
    this.status = init.status;
    this.code = init.code;
    this.userMessage = init.userMessage;
    this.details = init.details;
    this.body = init.body;
    this.retriable = init.retriable ?? false;
  }
}

export function isApiError(error: unknown): error is ApiError {
  return error instanceof ApiError;
}

/** Worth retrying later without user action. */
export function isRecoverable(error: ApiError): boolean {
  switch (error.kind) {
    case 'offline':
    case 'timeout':
      return true;
    case 'serverError':
      return typeof error.status === 'number' && error.status >= 500;
    default:
      return false;
  }
}

export function requiresReauthentication(error: ApiError): boolean {
  return error.kind === 'tokenExpired';
}
