/** Non-2xx response (or transport failure) from the Dashboard API. */
export class ApiError extends Error {
  readonly status: number;
  readonly method: string;
  readonly path: string;
  /** Parsed JSON error body, or `{ statusCode, message }` when the body was not JSON */
  readonly detail: unknown;
  /** Raw response text */
  readonly body: string;

  constructor(init: { status: number; method: string; path: string; detail: unknown; body: string; message?: string }) {
    super(init.message ?? `HTTP ${init.status}`);
    this.name = "ApiError";
    this.status = init.status;
    this.method = init.method;
    this.path = init.path;
    this.detail = init.detail;
    this.body = init.body;
  }
}

export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "NotFoundError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class InputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InputError";
  }
}

export interface ErrorPayload {
  error: string;
  detail?: unknown;
}

/** Shape an error for JSON output (stderr, MCP tool results, HTTP bodies) */
export function describeError(err: unknown): ErrorPayload {
  if (err instanceof ApiError) {
    return { error: err.message, detail: err.detail };
  }
  if (err instanceof Error) return { error: err.message };
  return { error: String(err) };
}
