export class MarketDataError extends Error {
  readonly code: string;
  readonly statusCode?: number;

  constructor(message: string, code: string, statusCode?: number) {
    super(message);
    this.name = 'MarketDataError';
    this.code = code;
    this.statusCode = statusCode;
  }
}

export class ApiError extends MarketDataError {
  readonly response?: unknown;

  constructor(message: string, statusCode: number, response?: unknown) {
    super(message, 'API_ERROR', statusCode);
    this.name = 'ApiError';
    this.response = response;
  }

  static fromResponse(statusCode: number, body: unknown): ApiError {
    const message = extractMessage(body) ?? extractMessage(errorField(body)) ?? 'API request failed';
    return new ApiError(message, statusCode, body);
  }
}

function errorField(body: unknown): unknown {
  return body != null && typeof body === 'object' && 'error' in body ? body.error : undefined;
}

function extractMessage(body: unknown): string | undefined {
  if (body == null || typeof body !== 'object' || !('message' in body)) return undefined;
  return typeof body.message === 'string' && body.message.length > 0 ? body.message : undefined;
}

export class AuthError extends MarketDataError {
  constructor(message: string) {
    super(message, 'AUTH_ERROR', 401);
    this.name = 'AuthError';
  }

  static missingCredentials(): AuthError {
    return new AuthError(
      'API_ACCESS_TOKEN or API_USERNAME/API_PASSWORD/API_APP_KEY must be configured',
    );
  }

  static invalidCredentials(): AuthError {
    return new AuthError('Invalid API credentials');
  }
}

export class RateLimitError extends MarketDataError {
  readonly retryAfterSeconds: number;
  readonly limit: number;

  constructor(message: string, retryAfterSeconds: number, limit: number) {
    super(message, 'RATE_LIMIT_ERROR', 429);
    this.name = 'RateLimitError';
    this.retryAfterSeconds = retryAfterSeconds;
    this.limit = limit;
  }

  static fromHeaders(headers: Record<string, string | undefined>): RateLimitError {
    const retryAfter = Number.parseInt(headers['retry-after'] ?? '0', 10) || 0;
    const limit = Number.parseInt(headers['x-ratelimit-limit'] ?? '0', 10) || 0;
    const remaining = headers['x-ratelimit-remaining'] ?? 'unknown';
    return new RateLimitError(
      `Rate limit exceeded. Limit: ${limit}, Remaining: ${remaining}, retry after ${retryAfter}s`,
      retryAfter,
      limit,
    );
  }
}

export interface ValidationIssue {
  path: (string | number)[];
  message: string;
}

export class ValidationError extends MarketDataError {
  readonly issues?: ValidationIssue[];

  constructor(message: string, issues?: ValidationIssue[]) {
    super(message, 'VALIDATION_ERROR', 400);
    this.name = 'ValidationError';
    this.issues = issues;
  }

  static fromZodError(err: { issues: ValidationIssue[] }, message = 'Invalid API response'): ValidationError {
    return new ValidationError(message, err.issues);
  }
}

export function serializeError(err: unknown): Record<string, unknown> {
  if (err instanceof MarketDataError) {
    const out: Record<string, unknown> = {
      name: err.name,
      message: err.message,
      code: err.code,
      statusCode: err.statusCode,
    };
    if (err instanceof ValidationError && err.issues) out.issues = err.issues;
    return out;
  }
  if (err instanceof Error) {
    return { name: err.name, message: err.message };
  }
  return { name: 'UnknownError', message: String(err) };
}
