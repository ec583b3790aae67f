import type { VendorId } from './types/provider.js';

export type LlmErrorKind =
  | 'transport'
  | 'timeout'
  | 'authentication'
  | 'rate_limit'
  | 'invalid_request'
  | 'context_length_exceeded'
  | 'not_found'
  | 'server'
  | 'malformed_response'
  | 'api'
  | 'config'
  | 'unsupported';

export interface LlmErrorOptions {
  status?: number;
  vendor?: VendorId;
  /** Raw vendor body, truncated */
  body?: string;
  cause?: unknown;
}

const MAX_BODY_EXCERPT = 500;

const RETRYABLE_KINDS: ReadonlySet<LlmErrorKind> = new Set<LlmErrorKind>([
  'transport',
  'timeout',
  'rate_limit',
  'server',
]);

/**
 * Every failure the library surfaces. Nothing in this package retries;
 * `retryable` only tells the caller which kinds are worth another attempt.
 */
export class LlmError extends Error {
  readonly status?: number;
  readonly vendor?: VendorId;
  readonly body?: string;

  constructor(
    message: string,
    public readonly kind: LlmErrorKind,
    options: LlmErrorOptions = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'LlmError';
    this.status = options.status;
    this.vendor = options.vendor;
    this.body = options.body === undefined ? undefined : excerpt(options.body);
  }

  get retryable(): boolean {
    return RETRYABLE_KINDS.has(this.kind);
  }

  get isAuthError(): boolean {
    return this.kind === 'authentication';
  }
}

export function isLlmError(err: unknown): err is LlmError {
  return err instanceof LlmError;
}

export function excerpt(body: string): string {
  return body.length > MAX_BODY_EXCERPT ? body.slice(0, MAX_BODY_EXCERPT) : body;
}

const CONTEXT_HINTS = ['context length', 'context window', 'too long', 'maximum context', 'too many tokens'];

function mentionsContextLimit(message: string): boolean {
  const lower = message.toLowerCase();
  return CONTEXT_HINTS.some(hint => lower.includes(hint));
}

/**
 * Map an HTTP status (plus the vendor's own message) onto an error kind.
 */
export function errorKindFromStatus(status: number, message = ''): LlmErrorKind {
  if (status === 401 || status === 403) return 'authentication';
  if (status === 429) return 'rate_limit';
  if (status === 400) return mentionsContextLimit(message) ? 'context_length_exceeded' : 'invalid_request';
  if (status === 404) return 'not_found';
  if (status === 408) return 'timeout';
  if (status === 413) return 'context_length_exceeded';
  if (status >= 500) return 'server';
  return 'api';
}

/**
 * Map a vendor's error type/code string (as found in error envelopes and
 * mid-stream error events) onto an error kind. Returns undefined when the
 * string is not recognized.
 */
export function errorKindFromVendorType(type: string, message = ''): LlmErrorKind | undefined {
  switch (type) {
    case 'authentication_error':
    case 'permission_error':
    case 'invalid_api_key':
    case 'UNAUTHENTICATED':
    case 'PERMISSION_DENIED':
    case 'InvalidApiKey':
    case 'AccessDenied':
      return 'authentication';
    case 'rate_limit_error':
    case 'rate_limit_exceeded':
    case 'insufficient_quota':
    case 'RESOURCE_EXHAUSTED':
    case 'Throttling':
    case 'Throttling.RateQuota':
      return 'rate_limit';
    case 'invalid_request_error':
    case 'INVALID_ARGUMENT':
    case 'InvalidParameter':
      return mentionsContextLimit(message) ? 'context_length_exceeded' : 'invalid_request';
    case 'context_length_exceeded':
      return 'context_length_exceeded';
    case 'not_found_error':
    case 'model_not_found':
    case 'NOT_FOUND':
      return 'not_found';
    case 'overloaded_error':
    case 'api_error':
    case 'server_error':
    case 'INTERNAL':
    case 'UNAVAILABLE':
    case 'InternalError':
      return 'server';
    case 'DEADLINE_EXCEEDED':
    case 'timeout':
      return 'timeout';
    default:
      return undefined;
  }
}
