import { getLogger } from '@kernel/logger';

const logger = getLogger('auth-errors');

/**
* Authentication Error Model
*
* Every credential or verification failure is an AuthError of a fixed kind.
* The kind alone determines the HTTP status code, the summary message and the
* log severity. How much of the error reaches the client is decided once, at
* the response boundary, by renderAuthError() and the configured
* ErrorVerbosity; business logic never consults the verbosity.
*
* Response shapes by verbosity:
*   none        -> 204, empty body, no headers
*   status-only -> kind status, empty body
*   message     -> { error }
*   type-only   -> { error, code }
*   full        -> { error, code, details: { reason, ...context } }
*/

// ============================================================================
// Error Kinds
// ============================================================================

export const AuthErrorKinds = {
  /** No credential was presented */
  MISSING_CREDENTIAL: 'MISSING_CREDENTIAL',
  /** Header present but not parseable as the expected scheme */
  MALFORMED_CREDENTIAL: 'MALFORMED_CREDENTIAL',
  /** Base64 or UTF-8 decoding of the credential failed */
  DECODE_FAILURE: 'DECODE_FAILURE',
  /** Well-formed credential rejected by the allow-list */
  INVALID_CREDENTIAL: 'INVALID_CREDENTIAL',
  TOKEN_EXPIRED: 'TOKEN_EXPIRED',
  TOKEN_INVALID: 'TOKEN_INVALID',
  /** Valid principal lacking an allowed role */
  INSUFFICIENT_ROLE: 'INSUFFICIENT_ROLE',
  /** Failure unrelated to the presented credential (key set, provider, claims shape) */
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type AuthErrorKind = typeof AuthErrorKinds[keyof typeof AuthErrorKinds];

/** Scheme announced in WWW-Authenticate */
export type AuthChallenge = 'Basic' | 'Bearer';

interface KindDescriptor {
  statusCode: number;
  summary: string;
  severity: 'warn' | 'error';
}

const KIND_DESCRIPTORS: Readonly<Record<AuthErrorKind, KindDescriptor>> = {
  MISSING_CREDENTIAL: {
    statusCode: 401,
    summary: 'Authentication credentials are missing',
    severity: 'warn',
  },
  MALFORMED_CREDENTIAL: {
    statusCode: 401,
    summary: 'Authentication credentials are malformed',
    severity: 'warn',
  },
  DECODE_FAILURE: {
    statusCode: 401,
    summary: 'Authentication credentials could not be decoded',
    severity: 'warn',
  },
  INVALID_CREDENTIAL: {
    statusCode: 403,
    summary: 'Authentication credentials are invalid',
    severity: 'warn',
  },
  TOKEN_EXPIRED: {
    statusCode: 401,
    summary: 'Token has expired',
    severity: 'warn',
  },
  TOKEN_INVALID: {
    statusCode: 401,
    summary: 'Token is invalid',
    severity: 'warn',
  },
  INSUFFICIENT_ROLE: {
    statusCode: 403,
    summary: 'Insufficient role to access this resource',
    severity: 'warn',
  },
  INTERNAL_ERROR: {
    statusCode: 500,
    summary: 'An internal server error has occurred',
    severity: 'error',
  },
};

/**
* HTTP status code for an error kind
*/
export function getStatusCodeForKind(kind: AuthErrorKind): number {
  return KIND_DESCRIPTORS[kind].statusCode;
}

/**
* Fixed client-facing summary for an error kind
*/
export function getSummaryForKind(kind: AuthErrorKind): string {
  return KIND_DESCRIPTORS[kind].summary;
}

// ============================================================================
// Verbosity
// ============================================================================

/**
* How much of an error is serialized to the client.
*
* 'none' answers every error with 204 No Content and an empty body, hiding
* even the fact that a request was rejected. Clients then cannot distinguish
* a rejection from a successful empty response by status code.
*/
export const ERROR_VERBOSITIES = ['none', 'status-only', 'message', 'type-only', 'full'] as const;

export type ErrorVerbosity = typeof ERROR_VERBOSITIES[number];

export function isErrorVerbosity(value: unknown): value is ErrorVerbosity {
  return ERROR_VERBOSITIES.some(verbosity => verbosity === value);
}

/**
* Parse a configured verbosity level
* @throws Error when the value is not a known level
*/
export function parseErrorVerbosity(value: string): ErrorVerbosity {
  const normalized = value.trim().toLowerCase();
  const verbosity = ERROR_VERBOSITIES.find(candidate => candidate === normalized);
  if (verbosity === undefined) {
    throw new Error(`Unknown error verbosity "${value}", expected one of: ${ERROR_VERBOSITIES.join(', ')}`);
  }
  return verbosity;
}

// ============================================================================
// AuthError
// ============================================================================

export interface AuthErrorOptions {
  /** Detailed reason; serialized only at 'full' verbosity */
  reason?: string | undefined;
  /** Extra structured detail; serialized only at 'full' verbosity */
  context?: Record<string, unknown> | undefined;
  challenge?: AuthChallenge | undefined;
  cause?: unknown;
}

export class AuthError extends Error {
  public readonly kind: AuthErrorKind;
  public readonly statusCode: number;
  public readonly summary: string;
  public readonly reason: string;
  public readonly context: Readonly<Record<string, unknown>>;
  public readonly challenge: AuthChallenge | undefined;

  constructor(kind: AuthErrorKind, options: AuthErrorOptions = {}) {
    const descriptor = KIND_DESCRIPTORS[kind];
    super(descriptor.summary, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'AuthError';
    this.kind = kind;
    this.statusCode = descriptor.statusCode;
    this.summary = descriptor.summary;
    this.reason = options.reason ?? descriptor.summary;
    this.context = Object.freeze({ ...options.context });
    this.challenge = options.challenge;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }

    // Logged regardless of verbosity: operators see what clients may not
    const metadata = { kind, reason: this.reason, ...this.context };
    if (descriptor.severity === 'error') {
      logger.error('Internal authentication failure', toError(options.cause), metadata);
    } else {
      logger.warn(`Rejection. ${this.reason}`, metadata);
    }
  }

  static missingCredential(reason: string, challenge?: AuthChallenge): AuthError {
    return new AuthError(AuthErrorKinds.MISSING_CREDENTIAL, { reason, challenge });
  }

  static malformedCredential(reason: string, challenge?: AuthChallenge, cause?: unknown): AuthError {
    return new AuthError(AuthErrorKinds.MALFORMED_CREDENTIAL, { reason, challenge, cause });
  }

  static decodeFailure(reason: string, challenge?: AuthChallenge, cause?: unknown): AuthError {
    return new AuthError(AuthErrorKinds.DECODE_FAILURE, { reason, challenge, cause });
  }

  static invalidCredential(reason: string, challenge?: AuthChallenge): AuthError {
    return new AuthError(AuthErrorKinds.INVALID_CREDENTIAL, { reason, challenge });
  }

  static tokenExpired(expiredAt?: Date, cause?: unknown): AuthError {
    return new AuthError(AuthErrorKinds.TOKEN_EXPIRED, {
      reason: expiredAt ? `Token expired at ${expiredAt.toISOString()}` : 'Token expired',
      context: expiredAt ? { expiredAt: expiredAt.toISOString() } : undefined,
      challenge: 'Bearer',
      cause,
    });
  }

  static tokenInvalid(reason: string, cause?: unknown, context?: Record<string, unknown>): AuthError {
    return new AuthError(AuthErrorKinds.TOKEN_INVALID, { reason, challenge: 'Bearer', cause, context });
  }

  static insufficientRole(required: readonly string[], challenge?: AuthChallenge): AuthError {
    return new AuthError(AuthErrorKinds.INSUFFICIENT_ROLE, {
      reason: `Principal has none of the required roles: ${required.join(', ')}`,
      context: { requiredRoles: [...required] },
      challenge,
    });
  }

  static internal(reason: string, cause?: unknown, context?: Record<string, unknown>): AuthError {
    return new AuthError(AuthErrorKinds.INTERNAL_ERROR, { reason, cause, context });
  }
}

/**
* Translate anything thrown into an AuthError.
* Foreign errors become INTERNAL_ERROR; the original is kept as the cause.
*/
export function toAuthError(error: unknown, challenge?: AuthChallenge): AuthError {
  if (error instanceof AuthError) {
    return error;
  }
  return new AuthError(AuthErrorKinds.INTERNAL_ERROR, {
    reason: getErrorMessage(error),
    cause: error,
    challenge,
  });
}

// ============================================================================
// Rendering
// ============================================================================

export interface AuthErrorDetails {
  reason: string;
  [key: string]: unknown;
}

/**
* Client-facing body. Which fields are present depends on the verbosity.
*/
export interface AuthErrorResponse {
  /** Fixed summary for the kind */
  error: string;
  code?: AuthErrorKind;
  details?: AuthErrorDetails;
}

export interface RenderedAuthError {
  statusCode: number;
  headers: Readonly<Record<string, string>>;
  /** Undefined means an empty body */
  body: AuthErrorResponse | undefined;
}

const NO_CONTENT = 204;

/**
* Shape an AuthError for the wire. Total over every (error, verbosity) pair.
*/
export function renderAuthError(error: AuthError, verbosity: ErrorVerbosity): RenderedAuthError {
  if (verbosity === 'none') {
    return { statusCode: NO_CONTENT, headers: {}, body: undefined };
  }

  const headers: Record<string, string> = error.challenge
    ? { 'WWW-Authenticate': error.challenge }
    : {};

  switch (verbosity) {
    case 'status-only':
      return { statusCode: error.statusCode, headers, body: undefined };
    case 'message':
      return { statusCode: error.statusCode, headers, body: { error: error.summary } };
    case 'type-only':
      return {
        statusCode: error.statusCode,
        headers,
        body: { error: error.summary, code: error.kind },
      };
    case 'full':
      return {
        statusCode: error.statusCode,
        headers,
        body: {
          error: error.summary,
          code: error.kind,
          details: { ...error.context, reason: error.reason },
        },
      };
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Extract error message from unknown catch parameter.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

function toError(value: unknown): Error | undefined {
  if (value === undefined) return undefined;
  return value instanceof Error ? value : new Error(String(value));
}

export { sendAuthError } from './responses';
