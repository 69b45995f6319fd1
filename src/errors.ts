export type ErrorKind =
  | 'not_found'
  | 'disabled'
  | 'missing_credential'
  | 'unsupported_provider'
  | 'conflict'
  | 'upstream_timeout'
  | 'upstream_connection'
  | 'upstream_status'
  | 'upstream_protocol'
  | 'internal';

export interface GatewayErrorOptions {
  status?: number;
  provider?: string;
  model?: string;
  cause?: unknown;
}

export class GatewayError extends Error {
  readonly kind: ErrorKind;
  readonly status?: number;
  readonly provider?: string;
  readonly model?: string;

  constructor(kind: ErrorKind, message: string, options: GatewayErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'GatewayError';
    this.kind = kind;
    this.status = options.status;
    this.provider = options.provider;
    this.model = options.model;
  }
}

const MAX_ERROR_BODY_LENGTH = 500;

/** Cuts by code points, so a surrogate pair is never split. */
export function truncate(text: string, maxLength: number = MAX_ERROR_BODY_LENGTH): string {
  if (text.length <= maxLength) return text;
  const codePoints = Array.from(text);
  return codePoints.length > maxLength ? codePoints.slice(0, maxLength).join('') : text;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function upstreamTimeout(label: string, timeoutMs: number, cause?: unknown): GatewayError {
  return new GatewayError('upstream_timeout', `${label} API timeout after ${timeoutMs}ms`, { cause });
}

export function upstreamConnection(label: string, cause: unknown): GatewayError {
  return new GatewayError('upstream_connection', `${label} API connection error: ${errorMessage(cause)}`, {
    cause,
  });
}

/**
 * Non-success upstream status. The body is serialized and cut to 500 characters.
 */
export function upstreamStatus(label: string, status: number, body: unknown, cause?: unknown): GatewayError {
  const text = typeof body === 'string' ? body : JSON.stringify(body) ?? '';
  return new GatewayError('upstream_status', `${label} API error (${status}): ${truncate(text)}`, {
    status,
    cause,
  });
}

export function upstreamProtocol(label: string, detail: string): GatewayError {
  return new GatewayError('upstream_protocol', `${label} API returned an unexpected response: ${detail}`);
}

export const HTTP_STATUS_BY_KIND: Record<ErrorKind, number> = {
  not_found: 404,
  disabled: 400,
  missing_credential: 400,
  unsupported_provider: 400,
  conflict: 409,
  upstream_timeout: 504,
  upstream_connection: 502,
  upstream_status: 502,
  upstream_protocol: 502,
  internal: 500,
};

export function buildErrorBody(error: GatewayError) {
  return {
    error: error.kind,
    message: error.message,
    ...(error.provider ? { provider: error.provider } : {}),
    ...(error.model ? { model: error.model } : {}),
  };
}
