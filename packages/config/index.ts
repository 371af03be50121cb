/**
 * Authentication Configuration
 *
 * Reads and validates the auth layer's environment once, at startup, and
 * returns a frozen AuthConfig. Nothing here changes after boot; in particular
 * the error verbosity is fixed for the lifetime of the process.
 *
 * @example
 * ```typescript
 * import { loadAuthConfig } from '@config';
 *
 * const config = loadAuthConfig();
 * const cache = config.jwt ? await KeySetCache.create({ ... }) : undefined;
 * ```
 *
 * @module @config
 */

import type { ErrorVerbosity } from '@errors';
import { getLogger } from '@kernel/logger';

import { authEnvSchema } from './schema';

const logger = getLogger('config');

export interface BasicAuthUser {
  username: string;
  password: string;
}

export interface JwtConfig {
  issuers: readonly string[];
  audiences: readonly string[];
  /** Key set location; discovered from the first issuer when absent */
  jwksUri?: string | undefined;
  jwksTtlSeconds: number;
  fetchTimeoutMs: number;
  validateNotBefore: boolean;
  clockToleranceSeconds: number;
}

export interface AuthConfig {
  errorVerbosity: ErrorVerbosity;
  apiKey: {
    /** Lower-cased header name */
    headerName: string;
    keys: readonly string[];
  };
  basicAuth: {
    users: readonly BasicAuthUser[];
  };
  /** Undefined when no issuer is configured: bearer authentication is disabled */
  jwt?: JwtConfig | undefined;
}

/**
 * Validate the environment and build the auth configuration.
 * @throws Error listing every invalid variable
 */
export function loadAuthConfig(env: NodeJS.ProcessEnv = process.env): Readonly<AuthConfig> {
  const result = authEnvSchema.safeParse(env);

  if (!result.success) {
    const problems = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`AUTH_CONFIG_INVALID: ${problems.join('; ')}`);
  }

  const parsed = result.data;

  const config: AuthConfig = {
    errorVerbosity: parsed.ERROR_VERBOSITY,
    apiKey: {
      headerName: parsed.API_KEY_HEADER,
      keys: Object.freeze([...parsed.API_KEYS]),
    },
    basicAuth: {
      users: Object.freeze(parsed.BASIC_AUTH_USERS.map(user => Object.freeze(user))),
    },
    jwt: parsed.JWT_ISSUER.length > 0
      ? Object.freeze({
        issuers: Object.freeze([...parsed.JWT_ISSUER]),
        audiences: Object.freeze([...parsed.JWT_AUDIENCE]),
        jwksUri: parsed.JWKS_URI,
        jwksTtlSeconds: parsed.JWKS_TTL_SECONDS,
        fetchTimeoutMs: parsed.JWKS_FETCH_TIMEOUT_MS,
        validateNotBefore: parsed.JWT_VALIDATE_NOT_BEFORE,
        clockToleranceSeconds: parsed.JWT_CLOCK_TOLERANCE_SECONDS,
      })
      : undefined,
  };

  logger.info('Auth configuration loaded', {
    errorVerbosity: config.errorVerbosity,
    apiKeyHeader: config.apiKey.headerName,
    apiKeyCount: config.apiKey.keys.length,
    basicAuthUserCount: config.basicAuth.users.length,
    jwtEnabled: config.jwt !== undefined,
  });

  return Object.freeze(config);
}

export { authEnvSchema, type AuthEnv } from './schema';
