/**
 * Shared API Client
 * HTTP client with retry logic, timeout handling, and error mapping
 */

import type { ZodType } from 'zod';
import {
  ApiError,
  ApiErrorInit,
  authSessionSchema,
  discoverSnapshotSchema,
  ephemerisResponseSchema,
  namedPositionsSchema,
  userProfileSchema,
} from './models';
import type {
  AppleSignInRequest,
  Aspect,
  AuthSession,
  BirthDataInput,
  BookingStatus,
  BookmarkedReading,
  CancelBookingResponse,
  ChatMessage,
  ChatResponse,
  ChartResponse,
  CompleteDashaRequest,
  CompleteDashaResponse,
  Conversation,
  CreateBookingRequest,
  CreateBookingResponse,
  CreateBookmarkRequest,
  DashaQuery,
  DashaResponse,
  DetailedReport,
  DiscoverSnapshot,
  EphemerisResponse,
  GenerateReportRequest,
  Horoscope,
  HoroscopeType,
  KundaliMatch,
  LocationResult,
  MatchRequest,
  NamedPositions,
  PoojaType,
  ReportStatusResponse,
  SendMessageRequest,
  SubscriptionStatus,
  TempleBooking,
  UpdateProfileRequest,
  UserProfile,
  ZodiacSystem,
} from './models';

const DEFAULT_TIMEOUT_MS = 20_000;
const DEFAULT_MAX_RETRIES = 2;
const RETRY_BACKOFF_MS = 250;
const DEFAULT_REPORT_POLL_INTERVAL_MS = 2_000;
const DEFAULT_REPORT_POLL_ATTEMPTS = 30;

const NETWORK_ERROR_MESSAGE =
  "We couldn't reach the server right now. Please check your connection and try again.";
const SERVER_ERROR_MESSAGE =
  'We ran into an issue on our end. Please try again in a moment.';
const UNAUTHORIZED_MESSAGE = 'Your session expired. Please sign in again.';
const DECODING_ERROR_MESSAGE =
  'We received an unexpected response from the server. Please try again.';

export interface ApiClientConfig {
  baseUrl: string;
  getAuthToken: () => Promise<string | null>;
  /** Sent as `X-User-Id` when known. */
  getUserId?: () => string | null | Promise<string | null>;
  enableLogging?: boolean;
  timeoutMs?: number;
  /** Retries for GET requests; 0 disables them. */
  maxRetries?: number;
  /** Called once for every request that ends in a `tokenExpired` error. */
  onTokenExpired?: () => void;
}

interface RequestOptions {
  method?: 'GET' | 'POST' | 'PATCH' | 'PUT' | 'DELETE';
  body?: unknown;
  headers?: Record<string, string>;
  requireAuth?: boolean;
  timeoutMs?: number;
  retry?: number;
}

interface JsonRequestOptions<T> extends RequestOptions {
  schema?: ZodType<T>;
}

export interface Page<T> {
  items: T[];
  nextCursor: string | null;
}

export interface PageParams {
  limit?: number;
  cursor?: string;
}

export interface WaitForReportOptions {
  intervalMs?: number;
  maxAttempts?: number;
}

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

function buildQuery(params: Record<string, string | number | boolean | undefined>): string {
  const searchParams = new URLSearchParams();
  Object.entries(params).forEach(([key, value]) => {
    if (value !== undefined) {
      searchParams.append(key, String(value));
    }
  });
  const query = searchParams.toString();
  return query ? `?${query}` : '';
}

function readField(body: unknown, key: string): unknown {
  if (typeof body !== 'object' || body === null || !(key in body)) {
    return undefined;
  }
  return Object.entries(body).find(([entryKey]) => entryKey === key)?.[1];
}

function readString(body: unknown, key: string): string | undefined {
  const value = readField(body, key);
  return typeof value === 'string' ? value : undefined;
}

function mapUserMessage(status: number): string {
  if (status === 404) return "We couldn't find what you were looking for.";
  if (status === 429) {
    return "You're doing that a little too quickly. Please wait a moment and try again.";
  }
  if (status >= 500) return SERVER_ERROR_MESSAGE;
  return 'Something went wrong with that request.';
}

async function buildHttpError(response: Response): Promise<ApiError> {
  let parsedBody: unknown = null;
  let rawBody: string | null = null;
  try {
    rawBody = await response.text();
    if (rawBody) {
      parsedBody = JSON.parse(rawBody);
    }
  } catch {
    parsedBody = null;
  }

  const code = readString(parsedBody, 'code');
  const message =
    readString(parsedBody, 'message') ??
    readString(parsedBody, 'error') ??
    readString(parsedBody, 'detail') ??
    (response.statusText || 'Request failed');

  const init: ApiErrorInit = {
    status: response.status,
    code,
    details: readField(parsedBody, 'details'),
    body: parsedBody ?? rawBody,
  };

  console.error('[API] HTTP Error', {
    status: response.status,
    code,
    message,
  });

  if (response.status === 401) {
    return new ApiError('tokenExpired', message, { ...init, userMessage: UNAUTHORIZED_MESSAGE });
  }

  return new ApiError('serverError', message, {
    ...init,
    userMessage: readString(parsedBody, 'userMessage') ?? mapUserMessage(response.status),
    retriable: response.status >= 500,
  });
}

function buildNetworkError(original: unknown, timedOut: boolean): ApiError {
  if (timedOut) {
    return new ApiError('timeout', 'Request timed out', {
      code: 'timeout',
      userMessage: NETWORK_ERROR_MESSAGE,
      retriable: true,
    });
  }

  const message = original instanceof Error ? original.message : 'Network request failed';
  return new ApiError('offline', message, {
    code: 'network_error',
    userMessage: NETWORK_ERROR_MESSAGE,
    details: original,
    retriable: true,
  });
}

function buildDecodingError(message: string, details?: unknown): ApiError {
  return new ApiError('decodingError', message, {
    code: 'decoding_error',
    userMessage: DECODING_ERROR_MESSAGE,
    details,
  });
}

type BodyReader<B> = (response: Response) => Promise<B>;

interface ReceivedResponse<B> {
  status: number;
  headers: Headers;
  body: B;
}

const readText: BodyReader<string> = (response) =>
  response.status === 204 ? Promise.resolve('') : response.text();

const readBinary: BodyReader<ArrayBuffer> = (response) => response.arrayBuffer();

const discardBody: BodyReader<void> = async (response) => {
  await response.text();
};

function isRetryable(error: ApiError, method: string): boolean {
  if (method !== 'GET') return false;
  if (error.kind === 'offline' || error.kind === 'timeout') return true;
  return error.kind === 'serverError' && typeof error.status === 'number' && error.status >= 500;
}

function decodeJson<T>(rawBody: string, schema?: ZodType<T>): T {
  let payload: T;
  try {
    payload = JSON.parse(rawBody);
  } catch (parseError) {
    throw buildDecodingError('Response body is not valid JSON', parseError);
  }

  if (!schema) {
    return payload;
  }

  const result = schema.safeParse(payload);
  if (!result.success) {
    throw buildDecodingError('Response body did not match the expected shape', result.error.issues);
  }
  return result.data;
}

export function createApiClient(config: ApiClientConfig) {
  const {
    baseUrl,
    getAuthToken,
    getUserId,
    enableLogging = false,
    timeoutMs: defaultTimeoutMs = DEFAULT_TIMEOUT_MS,
    maxRetries: defaultMaxRetries = DEFAULT_MAX_RETRIES,
    onTokenExpired,
  } = config;

  function reportTokenExpired(error: ApiError): ApiError {
    if (error.kind === 'tokenExpired') {
      onTokenExpired?.();
    }
    return error;
  }

  async function buildHeaders(options: RequestOptions): Promise<Record<string, string>> {
    const headers: Record<string, string> = { ...options.headers };

    if (options.body !== undefined && !headers['Content-Type']) {
      headers['Content-Type'] = 'application/json';
    }

    const token = await getAuthToken();
    if (token) {
      headers['Authorization'] = `Bearer ${token}`;
    } else if (options.requireAuth !== false) {
      throw reportTokenExpired(
        new ApiError('tokenExpired', 'Authentication required', {
          status: 401,
          code: 'auth_required',
          userMessage: UNAUTHORIZED_MESSAGE,
        }),
      );
    }

    const userId = getUserId ? await getUserId() : null;
    if (userId) {
      headers['X-User-Id'] = userId;
    }

    return headers;
  }

  /**
   * One attempt, body included: the timeout covers reading the body and a
   * connection that drops mid-body maps to `offline`.
   */
  async function fetchOnce<B>(
    url: string,
    init: RequestInit,
    timeoutMs: number,
    readBody: BodyReader<B>,
  ): Promise<ReceivedResponse<B>> {
    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);

    try {
      const response = await fetch(url, { ...init, signal: controller.signal });
      if (!response.ok) {
        throw await buildHttpError(response);
      }
      return {
        status: response.status,
        headers: response.headers,
        body: await readBody(response),
      };
    } catch (err) {
      if (err instanceof ApiError) {
        throw err;
      }
      throw buildNetworkError(err, timedOut);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Sends the request and maps failures to `ApiError`. GETs retry on
   * offline, timeout and 5xx errors with a linear backoff.
   */
  async function send<B>(
    endpoint: string,
    options: RequestOptions,
    readBody: BodyReader<B>,
  ): Promise<ReceivedResponse<B>> {
    const method = options.method ?? 'GET';
    const headers = await buildHeaders(options);
    const url = `${baseUrl}${endpoint}`;
    const timeoutMs = options.timeoutMs ?? defaultTimeoutMs;
    const maxRetries = method === 'GET' ? options.retry ?? defaultMaxRetries : 0;

    const init: RequestInit = {
      method,
      headers,
      body: options.body === undefined ? undefined : JSON.stringify(options.body),
    };

    let attempt = 0;
    while (true) {
      try {
        if (enableLogging) {
          console.log(`[API] ${method} ${url} (attempt ${attempt + 1})`);
        }
        return await fetchOnce(url, init, timeoutMs, readBody);
      } catch (err) {
        const error = err instanceof ApiError ? err : buildNetworkError(err, false);

        if (attempt < maxRetries && isRetryable(error, method)) {
          attempt += 1;
          await sleep(RETRY_BACKOFF_MS * attempt);
          continue;
        }

        throw reportTokenExpired(error);
      }
    }
  }

  async function apiRequest<T>(endpoint: string, options: JsonRequestOptions<T> = {}): Promise<T> {
    const response = await send(endpoint, options, readText);
    const rawBody = response.body;

    if (!rawBody.trim()) {
      throw new ApiError('noData', 'Response body was empty', {
        status: response.status,
        code: 'no_data',
        userMessage: DECODING_ERROR_MESSAGE,
      });
    }

    return decodeJson(rawBody, options.schema);
  }

  async function apiRequestVoid(endpoint: string, options: RequestOptions = {}): Promise<void> {
    await send(endpoint, options, discardBody);
  }

  async function apiPage<T>(endpoint: string, params: PageParams = {}): Promise<Page<T>> {
    const query = buildQuery({ limit: params.limit, cursor: params.cursor });
    const response = await send(`${endpoint}${query}`, {}, readText);
    const items: T[] = response.body.trim() ? decodeJson(response.body) : [];

    return {
      items,
      nextCursor: response.headers.get('X-Next-Cursor'),
    };
  }

  async function currentPositions(): Promise<NamedPositions> {
    try {
      return await apiRequest('/v1/astrology/positions', {
        requireAuth: false,
        schema: namedPositionsSchema,
      });
    } catch (originalError) {
      let fallback: EphemerisResponse;
      try {
        fallback = await apiRequest('/v1/ephemeris/current', {
          requireAuth: false,
          schema: ephemerisResponseSchema,
        });
      } catch {
        throw originalError;
      }

      if (fallback.planets.length === 0) {
        throw originalError;
      }

      if (enableLogging) {
        console.log('[API] Positions served from /v1/ephemeris/current');
      }
      return fallback.planets.reduce<NamedPositions>((positions, planet) => {
        positions[planet.name] = { degree: planet.degree, sign: planet.sign };
        return positions;
      }, {});
    }
  }

  async function waitForReport(
    reportId: string,
    options: WaitForReportOptions = {},
  ): Promise<ReportStatusResponse> {
    const intervalMs = options.intervalMs ?? DEFAULT_REPORT_POLL_INTERVAL_MS;
    const maxAttempts = options.maxAttempts ?? DEFAULT_REPORT_POLL_ATTEMPTS;

    let latest: ReportStatusResponse | null = null;
    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      latest = await apiRequest<ReportStatusResponse>(`/v1/reports/${reportId}/status`);
      if (latest.status === 'completed' || latest.status === 'failed') {
        return latest;
      }
      if (attempt < maxAttempts) {
        await sleep(intervalMs);
      }
    }

    throw new ApiError('timeout', 'Report did not finish in time', {
      code: 'report_pending',
      userMessage: 'Your report is still being prepared. Please check back shortly.',
      details: { reportId, status: latest?.status ?? null },
      retriable: true,
    });
  }

  return {
    // Health check
    health: () =>
      apiRequest<{ status: string; service: string; version: string; timestamp: string }>(
        '/v1/health',
        { requireAuth: false },
      ),

    ephemeris: {
      current: (params?: { lat?: number; lon?: number; system?: ZodiacSystem }) =>
        apiRequest(`/v1/ephemeris/current${buildQuery({ ...params })}`, {
          requireAuth: false,
          schema: ephemerisResponseSchema,
        }),
      at: (date: string, params?: { lat?: number; lon?: number; system?: ZodiacSystem }) =>
        apiRequest(`/v1/ephemeris/at${buildQuery({ date, ...params })}`, {
          requireAuth: false,
          schema: ephemerisResponseSchema,
        }),
    },

    astrology: {
      /** Falls back to `/v1/ephemeris/current` when the positions endpoint fails. */
      currentPositions,
      dashas: (query: DashaQuery) =>
        apiRequest<DashaResponse>(
          `/v1/astrology/dashas${buildQuery({
            birth_date: query.birthDate,
            target_date: query.targetDate,
            birth_time: query.birthTime,
            timezone: query.timezone,
            lat: query.latitude,
            lon: query.longitude,
            include_boundaries: query.includeBoundaries,
            debug: query.debug,
          })}`,
          { requireAuth: false },
        ),
      completeDashas: (data: CompleteDashaRequest) =>
        apiRequest<CompleteDashaResponse>('/v1/astrology/dashas/complete', {
          method: 'POST',
          body: data,
          requireAuth: false,
        }),
    },

    chart: {
      generate: (birthData: BirthDataInput, chartType?: string) =>
        apiRequest<ChartResponse>('/v1/chart/generate', {
          method: 'POST',
          body: { birthData, chartType },
          requireAuth: false,
        }),
      aspectsOn: (date: string) =>
        apiRequest<Aspect[]>(`/v1/chart/aspects${buildQuery({ date })}`, { requireAuth: false }),
      aspectsFor: (birthData?: BirthDataInput) =>
        apiRequest<Aspect[]>('/v1/chart/aspects', {
          method: 'POST',
          body: birthData ? { birthData } : {},
          requireAuth: false,
        }),
    },

    horoscope: {
      get: (sign: string, type: HoroscopeType = 'daily', date?: string) =>
        apiRequest<Horoscope>(`/v1/horoscope${buildQuery({ sign, type, date })}`, {
          requireAuth: false,
        }),
    },

    locations: {
      search: async (q: string, limit?: number) => {
        const result = await apiRequest<{ locations: LocationResult[] }>(
          `/v1/location/search${buildQuery({ q, limit })}`,
          { requireAuth: false },
        );
        return result.locations;
      },
    },

    match: {
      compare: (data: MatchRequest) =>
        apiRequest<KundaliMatch>('/v1/match', {
          method: 'POST',
          body: data,
          requireAuth: Boolean(data.save),
        }),
      history: (params?: PageParams) => apiPage<KundaliMatch>('/v1/match/history', params),
      delete: (id: string) =>
        apiRequestVoid(`/v1/match/${id}`, {
          method: 'DELETE',
        }),
    },

    auth: {
      signInWithApple: (data: AppleSignInRequest) =>
        apiRequest<AuthSession>('/v1/auth/apple', {
          method: 'POST',
          body: data,
          requireAuth: false,
          schema: authSessionSchema,
        }),
      validate: () =>
        apiRequest<{ valid: boolean }>('/v1/auth/validate', { requireAuth: false }),
      refresh: () =>
        apiRequest<AuthSession>('/v1/auth/refresh', {
          method: 'POST',
          schema: authSessionSchema,
        }),
      logout: () =>
        apiRequestVoid('/v1/auth/logout', {
          method: 'POST',
        }),
      deleteAccount: () =>
        apiRequestVoid('/v1/auth/delete-account', {
          method: 'DELETE',
        }),
    },

    // User Profile
    users: {
      getProfile: () => apiRequest<UserProfile>('/v1/users/me', { schema: userProfileSchema }),
      updateProfile: (data: UpdateProfileRequest) =>
        apiRequest<UserProfile>('/v1/users/me', {
          method: 'PATCH',
          body: data,
          schema: userProfileSchema,
        }),
    },

    subscription: {
      status: () => apiRequest<SubscriptionStatus>('/v1/subscription/status'),
    },

    chat: {
      send: (data: SendMessageRequest) =>
        apiRequest<ChatResponse>('/v1/chat', {
          method: 'POST',
          body: data,
        }),
      conversations: (params?: PageParams) =>
        apiPage<Conversation>('/v1/chat/conversations', params),
      messages: (conversationId: string, limit?: number) =>
        apiRequest<ChatMessage[]>(
          `/v1/chat/conversations/${conversationId}/messages${buildQuery({ limit })}`,
        ),
    },

    reports: {
      generate: (data: GenerateReportRequest) =>
        apiRequest<DetailedReport>('/v1/reports/generate', {
          method: 'POST',
          body: data,
        }),
      listForUser: (userId: string, params?: PageParams) =>
        apiPage<DetailedReport>(`/v1/reports/user/${userId}`, params),
      status: (reportId: string) =>
        apiRequest<ReportStatusResponse>(`/v1/reports/${reportId}/status`),
      /** Polls the status endpoint until the report is completed or failed. */
      waitForCompletion: waitForReport,
      downloadPdf: async (reportId: string): Promise<ArrayBuffer> => {
        const response = await send(`/v1/reports/${reportId}/pdf`, {}, readBinary);
        return response.body;
      },
    },

    bookmarks: {
      list: (params?: PageParams) => apiPage<BookmarkedReading>('/v1/bookmarks', params),
      create: (data: CreateBookmarkRequest) =>
        apiRequest<BookmarkedReading>('/v1/bookmarks', {
          method: 'POST',
          body: data,
        }),
      delete: (id: string) =>
        apiRequestVoid(`/v1/bookmarks/${id}`, {
          method: 'DELETE',
        }),
    },

    discover: {
      snapshot: (sign: string, date?: string): Promise<DiscoverSnapshot> =>
        apiRequest(`/v1/discover/snapshot${buildQuery({ sign, date })}`, {
          requireAuth: false,
          schema: discoverSnapshotSchema,
        }),
    },

    temple: {
      poojas: async () => {
        const result = await apiRequest<{ poojas: PoojaType[] }>('/v1/temple/poojas', {
          requireAuth: false,
        });
        return result.poojas;
      },
      pooja: (id: string) =>
        apiRequest<PoojaType>(`/v1/temple/poojas/${id}`, { requireAuth: false }),
      createBooking: (data: CreateBookingRequest) =>
        apiRequest<CreateBookingResponse>('/v1/temple/bookings', {
          method: 'POST',
          body: data,
        }),
      bookings: async (status?: BookingStatus) => {
        const result = await apiRequest<{ bookings: TempleBooking[] }>(
          `/v1/temple/bookings${buildQuery({ status })}`,
        );
        return result.bookings;
      },
      booking: (id: string) => apiRequest<TempleBooking>(`/v1/temple/bookings/${id}`),
      cancelBooking: (id: string) =>
        apiRequest<CancelBookingResponse>(`/v1/temple/bookings/${id}/cancel`, {
          method: 'POST',
        }),
    },
  };
}

export type ApiClient = ReturnType<typeof createApiClient>;
